import { Effect, Either, Match, pipe } from "effect"

import type { UserId } from "../core/brand.js"
import { parseChannelsCommand } from "../core/channels.js"
import { argumentText, parseTimerMinutes, parseUserLimit, splitArguments } from "../core/commands.js"
import { isGenerated } from "../core/domain.js"
import { previewTemplate } from "../core/render.js"
import {
  configureChannels,
  postingTarget,
  setTemplate,
  setTimerMinutes,
  setUserLimit,
  toggleUpdateMode
} from "../core/settings.js"
import {
  formatConfig,
  formatHelp,
  formatPrivateNotice,
  logCommandReceived,
  replyChannelsConfigured,
  replyChannelsUsage,
  replyCycleFailed,
  replyInvalidTarget,
  replyLimitSet,
  replyLimitUsage,
  replyModeChanged,
  replyNoActiveJob,
  replyNotConfigured,
  replyPostedNow,
  replyPostingStarted,
  replyPostingStartedWithFailure,
  replyPostingStopped,
  replySourceErrors,
  replyTemplateSet,
  replyTemplateUsage,
  replyTimerSet,
  replyTimerUsage
} from "../core/text.js"
import type { IncomingUpdate } from "../core/updates.js"
import type { SchedulerShape } from "../shell/scheduler.js"
import type { SettingsStoreShape } from "../shell/settings-store.js"
import type { TelegramError, TelegramServiceShape } from "../shell/telegram.js"
import { allowOwnerOnly, type CommandEnvelope, isOwner, toCommandEnvelope } from "./command-utils.js"
import { type CycleError, type CycleReport, type CycleRunner, describeCycleError } from "./cycle.js"
import { logAndIgnore } from "./diagnostics.js"

export type CommandContext = {
  readonly telegram: TelegramServiceShape
  readonly store: SettingsStoreShape
  readonly runner: CycleRunner
  readonly scheduler: SchedulerShape<CycleReport, CycleError>
  readonly ownerId: UserId
  readonly botUsername?: string | undefined
}

type Handler = (context: CommandContext, envelope: CommandEnvelope) => Effect.Effect<void, TelegramError>

const reply = (
  context: CommandContext,
  envelope: CommandEnvelope,
  text: string
): Effect.Effect<void, TelegramError> => pipe(context.telegram.sendMessage(envelope.chatId, text), Effect.asVoid)

const handleHelp: Handler = (context, envelope) =>
  reply(context, envelope, isOwner(envelope, context.ownerId) ? formatHelp() : formatPrivateNotice())

// CHANGE: apply /set_channels only when every definition is valid
// WHY: a typo in one source must not silently drop the rest of the layout
// QUOTE(TZ): "Do not update config if there are errors"
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall a: parse(a).kind != configured -> settings' = settings
// PURITY: SHELL
// EFFECT: Effect<void, TelegramError, never>
// INVARIANT: exactly one reply per command
// COMPLEXITY: O(n)/O(n)
const handleSetChannels: Handler = (context, envelope) =>
  Match.value(parseChannelsCommand(splitArguments(argumentText(envelope.text)))).pipe(
    Match.when({ kind: "usage" }, () => reply(context, envelope, replyChannelsUsage())),
    Match.when({ kind: "invalidTarget" }, (value) => reply(context, envelope, replyInvalidTarget(value.target))),
    Match.when({ kind: "invalidSources" }, (value) => reply(context, envelope, replySourceErrors(value.errors))),
    Match.when({ kind: "configured" }, (value) =>
      pipe(
        context.store.update((settings) => configureChannels(settings, value.target, value.sources)),
        Effect.flatMap(() => reply(context, envelope, replyChannelsConfigured(value.target, value.sources)))
      )),
    Match.exhaustive
  )

const handleSetTimer: Handler = (context, envelope) => {
  const minutes = parseTimerMinutes(envelope.text)
  return minutes === null
    ? reply(context, envelope, replyTimerUsage())
    : pipe(
      context.store.update((settings) => setTimerMinutes(settings, minutes)),
      Effect.flatMap(() => reply(context, envelope, replyTimerSet(minutes)))
    )
}

const handleSetLimit: Handler = (context, envelope) => {
  const limit = parseUserLimit(envelope.text)
  return limit === null
    ? reply(context, envelope, replyLimitUsage())
    : pipe(
      context.store.update((settings) => setUserLimit(settings, limit)),
      Effect.flatMap(() => reply(context, envelope, replyLimitSet(limit)))
    )
}

const handleSetTemplate: Handler = (context, envelope) => {
  const template = argumentText(envelope.text)
  return template.length === 0
    ? reply(context, envelope, replyTemplateUsage())
    : pipe(
      context.store.update((settings) => setTemplate(settings, template)),
      Effect.flatMap(() => reply(context, envelope, replyTemplateSet(template, previewTemplate(template))))
    )
}

const handleToggleMode: Handler = (context, envelope) =>
  pipe(
    context.store.update(toggleUpdateMode),
    Effect.flatMap((settings) => reply(context, envelope, replyModeChanged(settings.updateMode)))
  )

// CHANGE: start the recurring job and report the immediate cycle
// WHY: the owner should learn right away when the first post could not be made, while the timer keeps retrying
// QUOTE(TZ): "Start auto-posting with immediate first post"
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall s: ready(s) -> active(scheduler)
// PURITY: SHELL
// EFFECT: Effect<void, TelegramError, never>
// INVARIANT: nothing is scheduled while channels are not configured
// COMPLEXITY: O(n)/O(n)
const handleStartPosting: Handler = (context, envelope) =>
  Effect.gen(function*(_) {
    const settings = yield* _(context.store.get)
    if (postingTarget(settings) === null) {
      return yield* _(reply(context, envelope, replyNotConfigured()))
    }
    const minutes = settings.policy.timerMinutes
    const outcome = yield* _(Effect.either(context.scheduler.scheduleRecurring(minutes)))
    const text = Either.match(outcome, {
      onLeft: (error) => replyPostingStartedWithFailure(minutes, describeCycleError(error)),
      onRight: () => replyPostingStarted(minutes)
    })
    return yield* _(reply(context, envelope, text))
  })

const handleStopPosting: Handler = (context, envelope) =>
  pipe(
    context.scheduler.cancelRecurring,
    Effect.flatMap((outcome) =>
      reply(context, envelope, outcome === "stopped" ? replyPostingStopped() : replyNoActiveJob())
    )
  )

const describePostNow = (outcome: Either.Either<CycleReport, CycleError>): string =>
  Either.match(outcome, {
    onLeft: (error) => error._tag === "NotConfigured" ? replyNotConfigured() : replyCycleFailed(describeCycleError(error)),
    onRight: (report) =>
      replyPostedNow({
        generated: report.results.filter(isGenerated).length,
        total: report.results.length,
        messageId: report.publication.message.messageId,
        edited: report.publication.kind === "edited"
      })
  })

const handlePostNow: Handler = (context, envelope) =>
  pipe(
    Effect.either(context.runner.runCycleOnce("manual")),
    Effect.flatMap((outcome) => reply(context, envelope, describePostNow(outcome)))
  )

const handleGetConfig: Handler = (context, envelope) =>
  Effect.gen(function*(_) {
    const settings = yield* _(context.store.get)
    const active = yield* _(context.scheduler.isActive)
    return yield* _(reply(context, envelope, formatConfig(settings, active)))
  })

const handlerFor = (envelope: CommandEnvelope): Handler =>
  Match.value(envelope.command).pipe(
    Match.whenOr("/start", "/help", () => handleHelp),
    Match.when("/set_channels", () => handleSetChannels),
    Match.when("/set_timer", () => handleSetTimer),
    Match.when("/set_limit", () => handleSetLimit),
    Match.when("/set_template", () => handleSetTemplate),
    Match.when("/toggle_update_mode", () => handleToggleMode),
    Match.when("/start_posting", () => handleStartPosting),
    Match.when("/stop_posting", () => handleStopPosting),
    Match.when("/post_now", () => handlePostNow),
    Match.when("/get_config", () => handleGetConfig),
    Match.exhaustive
  )

const isPublicCommand = (envelope: CommandEnvelope): boolean =>
  envelope.command === "/start" || envelope.command === "/help"

const handleCommand = (
  context: CommandContext,
  envelope: CommandEnvelope
): Effect.Effect<void, TelegramError> =>
  Effect.gen(function*(_) {
    yield* _(Effect.logInfo(logCommandReceived(envelope.command, envelope.chatId)))
    const allowed = isPublicCommand(envelope)
      ? true
      : yield* _(allowOwnerOnly(context.telegram, context.ownerId, envelope))
    if (!allowed) {
      return
    }
    yield* _(handlerFor(envelope)(context, envelope))
  })

// CHANGE: dispatch every command of a long-poll batch in order
// WHY: one failing reply must not stop the remaining commands or the update loop
// QUOTE(TZ): n/a
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall us: handled(us) = commands(us) in update order
// PURITY: SHELL
// EFFECT: Effect<void, never, never>
// INVARIANT: Telegram failures are logged per command
// COMPLEXITY: O(n)/O(1)
export const handleCommands = (
  context: CommandContext,
  updates: ReadonlyArray<IncomingUpdate>
): Effect.Effect<void> =>
  Effect.forEach(
    updates,
    (update) => {
      const envelope = toCommandEnvelope(update, context.botUsername)
      return envelope === null ? Effect.void : logAndIgnore(handleCommand(context, envelope))
    },
    { discard: true }
  )
