import { Effect, pipe, Ref } from "effect"

import { logPollingStarted } from "../core/text.js"
import { nextOffset } from "../core/updates.js"
import { type Config, loadConfig } from "../shell/config.js"
import { makeScheduler } from "../shell/scheduler.js"
import { makeSettingsStore, SettingsStore } from "../shell/settings-store.js"
import { makeTelegramService, TelegramService } from "../shell/telegram.js"
import { type CommandContext, handleCommands } from "./commands.js"
import { makeCycleRunner } from "./cycle.js"
import { logAndFallback, logAndIgnore, logUpdates } from "./diagnostics.js"

const longPollSeconds = 25

const pollOnce = (
  context: CommandContext,
  offset: Ref.Ref<number>
): Effect.Effect<void> =>
  logAndIgnore(
    Effect.gen(function*(_) {
      const current = yield* _(Ref.get(offset))
      const updates = yield* _(context.telegram.getUpdates(current, longPollSeconds))
      yield* _(logUpdates(updates))
      yield* _(Ref.set(offset, nextOffset(current, updates)))
      yield* _(handleCommands(context, updates))
    })
  )

const makeContext = (config: Config): Effect.Effect<CommandContext, never, TelegramService | SettingsStore> =>
  Effect.gen(function*(_) {
    const telegram = yield* _(TelegramService)
    const store = yield* _(SettingsStore)
    const runner = yield* _(makeCycleRunner({ telegram, store }))
    const scheduler = yield* _(makeScheduler({
      runNow: runner.runCycleOnce("start"),
      tick: logAndIgnore(pipe(runner.runCycleOnce("timer"), Effect.asVoid))
    }))
    const profile = yield* _(logAndFallback(pipe(telegram.getMe, Effect.map((me) => me.username)), undefined))
    yield* _(Effect.logInfo(logPollingStarted(profile)))
    return {
      telegram,
      store,
      runner,
      scheduler,
      ownerId: config.ownerId,
      botUsername: profile
    }
  })

const runBot = (config: Config): Effect.Effect<never, never, TelegramService | SettingsStore> =>
  pipe(
    makeContext(config),
    Effect.flatMap((context) =>
      pipe(
        Ref.make(0),
        Effect.flatMap((offset) => Effect.forever(pollOnce(context, offset)))
      )
    )
  )

// CHANGE: compose the bot runtime program with Effect services
// WHY: run the command loop and the regeneration timer through typed effects
// QUOTE(TZ): "Periodically regenerate invite links and republish them"
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall t: program(t) -> effects only through services
// PURITY: SHELL
// EFFECT: Effect<never, ConfigError, FileSystem | Path>
// INVARIANT: one settings store and one Telegram client per process
// COMPLEXITY: O(n)/O(n)
export const program = pipe(
  loadConfig,
  Effect.flatMap((config) =>
    pipe(
      makeSettingsStore(),
      Effect.flatMap((store) =>
        runBot(config).pipe(
          Effect.provideService(SettingsStore, store),
          Effect.provideService(TelegramService, makeTelegramService(config.token, config.requestTimeout))
        )
      )
    )
  )
)
