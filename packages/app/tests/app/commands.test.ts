import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { handleCommands } from "../../src/app/commands.js"
import { makeCycleRunner } from "../../src/app/cycle.js"
import { ChatId } from "../../src/core/brand.js"
import type { LinkerSettings } from "../../src/core/domain.js"
import { initialSettings } from "../../src/core/domain.js"
import {
  formatHelp,
  formatPrivateNotice,
  replyChannelsConfigured,
  replyModeChanged,
  replyNoActiveJob,
  replyNotConfigured,
  replyPostingStarted,
  replySourceErrors,
  replyUnauthorized
} from "../../src/core/text.js"
import {
  configuredSettings,
  makeMessageUpdate,
  makeSchedulerStub,
  makeSettingsStoreStub,
  makeTelegramStub,
  ownerId,
  source,
  targetChat
} from "./test-utils.js"

const runCommand = (params: {
  readonly text: string
  readonly settings?: LinkerSettings
  readonly fromId?: number | undefined
}) =>
  Effect.gen(function*(_) {
    const stub = makeTelegramStub()
    const storeStub = makeSettingsStoreStub(params.settings ?? initialSettings())
    const runner = yield* _(makeCycleRunner({ telegram: stub.telegram, store: storeStub.store }))
    const schedulerStub = makeSchedulerStub(runner.runCycleOnce("start"))
    yield* _(handleCommands(
      {
        telegram: stub.telegram,
        store: storeStub.store,
        runner,
        scheduler: schedulerStub.scheduler,
        ownerId,
        botUsername: "relay_bot"
      },
      [makeMessageUpdate({ updateId: 1, text: params.text, fromId: params.fromId ?? ownerId })]
    ))
    return { ...stub, ...storeStub, ...schedulerStub }
  })

const ownerChat = ChatId("42")

describe("command surface", () => {
  it.effect("rejects configuration commands from other users", () =>
    Effect.gen(function*(_) {
      const { getCurrent, messageCalls } = yield* _(runCommand({ text: "/set_timer 10", fromId: 7 }))
      expect(messageCalls).toEqual([{ chatId: ownerChat, text: replyUnauthorized() }])
      expect(getCurrent().policy.timerMinutes).toBe(5)
    }))

  it.effect("shows the help only to the owner", () =>
    Effect.gen(function*(_) {
      const owner = yield* _(runCommand({ text: "/help" }))
      expect(owner.messageCalls).toEqual([{ chatId: ownerChat, text: formatHelp() }])
      const stranger = yield* _(runCommand({ text: "/start", fromId: 7 }))
      expect(stranger.messageCalls).toEqual([{ chatId: ownerChat, text: formatPrivateNotice() }])
    }))

  it.effect("sets the timer", () =>
    Effect.gen(function*(_) {
      const { getCurrent, messageCalls } = yield* _(runCommand({ text: "/set_timer 10" }))
      expect(getCurrent().policy.timerMinutes).toBe(10)
      expect(messageCalls).toEqual([{ chatId: ownerChat, text: "⏰ Timer set to 10 minutes" }])
    }))

  it.effect("rejects an invalid limit without changing it", () =>
    Effect.gen(function*(_) {
      const { getCurrent, updateCalls } = yield* _(runCommand({ text: "/set_limit 100000" }))
      expect(updateCalls).toHaveLength(0)
      expect(getCurrent().policy.userLimit).toBe(1)
    }))

  it.effect("configures channels and aliases", () =>
    Effect.gen(function*(_) {
      const { getCurrent, messageCalls } = yield* _(
        runCommand({ text: "/set_channels @relay_target @grp:\"My Group\" -100123" })
      )
      const sources = [source("@grp", "My Group"), source("-100123")]
      expect(getCurrent().target).toBe(targetChat)
      expect(getCurrent().sources).toEqual(sources)
      expect(messageCalls).toEqual([{ chatId: ownerChat, text: replyChannelsConfigured(targetChat, sources) }])
    }))

  it.effect("keeps the previous layout when a definition is invalid", () =>
    Effect.gen(function*(_) {
      const settings = configuredSettings([source("@a")])
      const { getCurrent, messageCalls } = yield* _(
        runCommand({ text: "/set_channels @relay_target @b grp:Alias", settings })
      )
      expect(getCurrent()).toEqual(settings)
      expect(messageCalls).toEqual([{
        chatId: ownerChat,
        text: replySourceErrors([{ kind: "identifier", id: "grp", token: "grp:Alias" }])
      }])
    }))

  it.effect("stores multi-line templates verbatim", () =>
    Effect.gen(function*(_) {
      const { getCurrent } = yield* _(runCommand({ text: "/set_template <b>Join</b>\n{links_list}" }))
      expect(getCurrent().template).toBe("<b>Join</b>\n{links_list}")
    }))

  it.effect("toggles the update mode", () =>
    Effect.gen(function*(_) {
      const { getCurrent, messageCalls } = yield* _(runCommand({ text: "/toggle_update_mode" }))
      expect(getCurrent().updateMode).toBe("edit")
      expect(messageCalls).toEqual([{ chatId: ownerChat, text: replyModeChanged("edit") }])
    }))

  it.effect("refuses to start posting before channels are set", () =>
    Effect.gen(function*(_) {
      const { messageCalls, scheduleCalls } = yield* _(runCommand({ text: "/start_posting" }))
      expect(scheduleCalls).toHaveLength(0)
      expect(messageCalls).toEqual([{ chatId: ownerChat, text: replyNotConfigured() }])
    }))

  it.effect("starts posting with the configured timer", () =>
    Effect.gen(function*(_) {
      const settings = configuredSettings([source("@a")])
      const { messageCalls, scheduleCalls } = yield* _(runCommand({ text: "/start_posting", settings }))
      expect(scheduleCalls).toEqual([5])
      expect(messageCalls.map((call) => call.text)).toEqual([
        "<b>Secure Access</b>: https://t.me/+L1",
        replyPostingStarted(5)
      ])
    }))

  it.effect("reports a stop without an active job", () =>
    Effect.gen(function*(_) {
      const { messageCalls } = yield* _(runCommand({ text: "/stop_posting" }))
      expect(messageCalls).toEqual([{ chatId: ownerChat, text: replyNoActiveJob() }])
    }))

  it.effect("posts once on demand", () =>
    Effect.gen(function*(_) {
      const settings = configuredSettings([source("@a"), source("@b")])
      const { messageCalls } = yield* _(runCommand({ text: "/post_now", settings }))
      expect(messageCalls).toEqual([
        { chatId: targetChat, text: "<b>Secure Access</b>: https://t.me/+L1" },
        { chatId: ownerChat, text: "✅ Posted message 500 with 2/2 links" }
      ])
    }))

  it.effect("ignores commands for another bot", () =>
    Effect.gen(function*(_) {
      const { messageCalls } = yield* _(runCommand({ text: "/get_config@other_bot" }))
      expect(messageCalls).toHaveLength(0)
    }))

  it.effect("treats messages without a sender as unauthorized", () =>
    Effect.gen(function*(_) {
      const stub = makeTelegramStub()
      const storeStub = makeSettingsStoreStub()
      const runner = yield* _(makeCycleRunner({ telegram: stub.telegram, store: storeStub.store }))
      const { scheduler } = makeSchedulerStub(runner.runCycleOnce("start"))
      yield* _(handleCommands(
        { telegram: stub.telegram, store: storeStub.store, runner, scheduler, ownerId },
        [makeMessageUpdate({ updateId: 1, text: "/get_config", chatId: "-100", chatType: "channel" })]
      ))
      expect(stub.messageCalls).toEqual([{ chatId: ChatId("-100"), text: replyUnauthorized() }])
    }))
})
