import { Clock, Data, Effect, Match, pipe } from "effect"

import type { LinkResult } from "../core/domain.js"
import { isGenerated } from "../core/domain.js"
import { type RenderedAnnouncement, type RenderMode, renderAnnouncement } from "../core/render.js"
import { postingTarget } from "../core/settings.js"
import { describeTemplateError } from "../core/template.js"
import {
  logAllLinksFailed,
  logCycleStarted,
  logRenderDefault,
  logRenderFallback,
  logRenderLegacy
} from "../core/text.js"
import type { SettingsStoreShape } from "../shell/settings-store.js"
import type { TelegramServiceShape } from "../shell/telegram.js"
import { generateInviteLinks } from "./invite-links.js"
import { type PublicationOutcome, publishAnnouncement, type PublishFailed } from "./publish.js"

export class NotConfigured extends Data.TaggedError("NotConfigured")<{
  readonly message: string
}> {}

export class AllLinksFailed extends Data.TaggedError("AllLinksFailed")<{
  readonly message: string
  readonly attempted: number
}> {}

export type CycleError = NotConfigured | AllLinksFailed | PublishFailed

export type CycleTrigger = "start" | "timer" | "manual"

export type CycleReport = {
  readonly results: ReadonlyArray<LinkResult>
  readonly render: RenderMode
  readonly publication: PublicationOutcome
}

export type CycleRunner = {
  readonly runCycleOnce: (trigger: CycleTrigger) => Effect.Effect<CycleReport, CycleError>
}

export type CycleDeps = {
  readonly telegram: TelegramServiceShape
  readonly store: SettingsStoreShape
}

const logRender = (rendered: RenderedAnnouncement): Effect.Effect<void> =>
  Match.value(rendered.mode).pipe(
    Match.when("fallback", () =>
      Effect.logWarning(
        logRenderFallback(rendered.error === null ? "unknown" : describeTemplateError(rendered.error))
      )),
    Match.when("inviteLink", () => Effect.logInfo(logRenderLegacy())),
    Match.when("default", () => Effect.logInfo(logRenderDefault())),
    Match.when("linksList", () => Effect.void),
    Match.exhaustive
  )

const runCycle = (
  deps: CycleDeps,
  trigger: CycleTrigger
): Effect.Effect<CycleReport, CycleError> =>
  Effect.gen(function*(_) {
    yield* _(Effect.logInfo(logCycleStarted(trigger)))
    const settings = yield* _(deps.store.get)
    const posting = postingTarget(settings)
    if (posting === null) {
      return yield* _(
        Effect.fail(new NotConfigured({ message: "target channel and at least one source chat are required" }))
      )
    }
    const nowMillis = yield* _(Clock.currentTimeMillis)
    const results = yield* _(generateInviteLinks({
      telegram: deps.telegram,
      sources: posting.sources,
      policy: settings.policy,
      nowMillis
    }))
    if (!results.some(isGenerated)) {
      yield* _(Effect.logError(logAllLinksFailed(trigger)))
      return yield* _(
        Effect.fail(
          new AllLinksFailed({
            message: `no invite link could be generated for ${results.length} source(s)`,
            attempted: results.length
          })
        )
      )
    }
    const rendered = renderAnnouncement(settings.template, posting.sources, results)
    yield* _(logRender(rendered))
    const publication = yield* _(publishAnnouncement({
      telegram: deps.telegram,
      store: deps.store,
      target: posting.target,
      text: rendered.text,
      mode: settings.updateMode,
      previous: settings.published
    }))
    return { results, render: rendered.mode, publication }
  })

// CHANGE: serialize regeneration cycles behind one permit
// WHY: the timer, /post_now and /start_posting may fire together and must not race on the published handle
// QUOTE(TZ): "Regenerate links and update the channel message"
// REF: user-2025-05-02-invite-relay
// SOURCE: https://effect.website/docs/concurrency/semaphore
// FORMAT THEOREM: forall t1,t2: run(t1) ∥ run(t2) = run(t1); run(t2) ∨ run(t2); run(t1)
// PURITY: SHELL
// EFFECT: Effect<CycleRunner, never, never>
// INVARIANT: settings are read after the permit is taken
// COMPLEXITY: O(n)/O(n)
export const makeCycleRunner = (deps: CycleDeps): Effect.Effect<CycleRunner> =>
  pipe(
    Effect.makeSemaphore(1),
    Effect.map((semaphore): CycleRunner => ({
      runCycleOnce: (trigger) => semaphore.withPermits(1)(runCycle(deps, trigger))
    }))
  )

export const describeCycleError = (error: CycleError): string =>
  Match.value(error).pipe(
    Match.tag("NotConfigured", (value) => value.message),
    Match.tag("AllLinksFailed", (value) => value.message),
    Match.tag("PublishFailed", (value) => `could not send to ${value.chatId}: ${value.message}`),
    Match.exhaustive
  )
