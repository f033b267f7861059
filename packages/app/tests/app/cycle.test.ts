import { describe, expect, it } from "@effect/vitest"
import { Duration, Effect } from "effect"

import { describeCycleError, makeCycleRunner } from "../../src/app/cycle.js"
import { MessageId } from "../../src/core/brand.js"
import type { LinkerSettings } from "../../src/core/domain.js"
import { initialSettings } from "../../src/core/domain.js"
import type { TelegramServiceShape } from "../../src/shell/telegram.js"
import {
  configuredSettings,
  firstMessageId,
  makeSettingsStoreStub,
  makeTelegramStub,
  source,
  targetChat
} from "./test-utils.js"

const runWith = (settings: LinkerSettings, failingSources: ReadonlyArray<string> = []) =>
  Effect.gen(function*(_) {
    const stub = makeTelegramStub({ failingSources })
    const storeStub = makeSettingsStoreStub(settings)
    const runner = yield* _(makeCycleRunner({ telegram: stub.telegram, store: storeStub.store }))
    const outcome = yield* _(Effect.either(runner.runCycleOnce("manual")))
    return { ...stub, ...storeStub, outcome }
  })

describe("cycle", () => {
  it.effect("fails without a configured target", () =>
    Effect.gen(function*(_) {
      const { inviteCalls, messageCalls, outcome } = yield* _(runWith(initialSettings()))
      expect(outcome._tag).toBe("Left")
      if (outcome._tag === "Left") {
        expect(outcome.left._tag).toBe("NotConfigured")
      }
      expect(inviteCalls).toHaveLength(0)
      expect(messageCalls).toHaveLength(0)
    }))

  it.effect("publishes nothing when every link fails", () =>
    Effect.gen(function*(_) {
      const previous = { chatId: targetChat, messageId: MessageId(3) }
      const settings = configuredSettings([source("@a"), source("@b")], { published: previous })
      const { deleteCalls, editCalls, getCurrent, messageCalls, outcome } = yield* _(
        runWith(settings, ["@a", "@b"])
      )
      expect(outcome._tag).toBe("Left")
      if (outcome._tag === "Left") {
        expect(outcome.left._tag).toBe("AllLinksFailed")
        expect(describeCycleError(outcome.left)).toBe("no invite link could be generated for 2 source(s)")
      }
      expect(messageCalls).toHaveLength(0)
      expect(editCalls).toHaveLength(0)
      expect(deleteCalls).toHaveLength(0)
      expect(getCurrent().published).toEqual(previous)
    }))

  it.effect("renders and sends the announcement", () =>
    Effect.gen(function*(_) {
      const settings = configuredSettings([source("-100", "Main"), source("@b")], {
        template: "<b>Join</b>\n{links_list}"
      })
      const { getCurrent, inviteCalls, messageCalls, outcome } = yield* _(runWith(settings, ["@b"]))
      expect(outcome._tag).toBe("Right")
      if (outcome._tag === "Right") {
        expect(outcome.right.render).toBe("linksList")
        expect(outcome.right.publication.kind).toBe("sent")
      }
      expect(messageCalls).toEqual([{
        chatId: targetChat,
        text: "<b>Join</b>\nMain: https://t.me/+L1\n<code>@b</code>: Not available"
      }])
      expect(inviteCalls.map((call) => call.expireDate)).toEqual([300, 300])
      expect(getCurrent().published).toEqual({ chatId: targetChat, messageId: MessageId(firstMessageId) })
    }))

  it.effect("edits the previous announcement in edit mode", () =>
    Effect.gen(function*(_) {
      const previous = { chatId: targetChat, messageId: MessageId(3) }
      const settings = configuredSettings([source("@a")], { updateMode: "edit", published: previous })
      const { editCalls, messageCalls, outcome } = yield* _(runWith(settings))
      expect(outcome._tag).toBe("Right")
      expect(editCalls).toEqual([{
        chatId: targetChat,
        messageId: MessageId(3),
        text: "<b>Secure Access</b>: https://t.me/+L1"
      }])
      expect(messageCalls).toHaveLength(0)
    }))

  it.live("runs overlapping cycles one after another", () =>
    Effect.gen(function*(_) {
      const stub = makeTelegramStub()
      const events: Array<string> = []
      const slowTelegram: TelegramServiceShape = {
        ...stub.telegram,
        createInviteLink: (chatId, expireDate, memberLimit) =>
          Effect.sync(() => events.push("gen")).pipe(
            Effect.zipRight(Effect.sleep(Duration.millis(20))),
            Effect.zipRight(stub.telegram.createInviteLink(chatId, expireDate, memberLimit))
          ),
        sendMessage: (chatId, text) =>
          Effect.sync(() => events.push("send")).pipe(
            Effect.zipRight(stub.telegram.sendMessage(chatId, text))
          )
      }
      const storeStub = makeSettingsStoreStub(configuredSettings([source("@a")]))
      const runner = yield* _(makeCycleRunner({ telegram: slowTelegram, store: storeStub.store }))
      yield* _(Effect.all([runner.runCycleOnce("manual"), runner.runCycleOnce("timer")], {
        concurrency: "unbounded"
      }))
      expect(events).toEqual(["gen", "send", "gen", "send"])
      expect(stub.deleteCalls).toEqual([{ chatId: targetChat, messageId: MessageId(firstMessageId) }])
      expect(storeStub.getCurrent().published).toEqual({
        chatId: targetChat,
        messageId: MessageId(firstMessageId + 1)
      })
    }))
})
