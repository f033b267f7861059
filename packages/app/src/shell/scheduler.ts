import { Effect, Fiber, Option, pipe, Ref, Schedule } from "effect"

import { regenerationInterval } from "../core/schedule.js"
import { logJobArmed, logJobCancelled } from "../core/text.js"

export type CancelOutcome = "stopped" | "noActiveJob"

export type RecurringJob<A, E> = {
  readonly runNow: Effect.Effect<A, E>
  readonly tick: Effect.Effect<void>
}

export type SchedulerShape<A, E> = {
  readonly scheduleRecurring: (intervalMinutes: number) => Effect.Effect<A, E>
  readonly cancelRecurring: Effect.Effect<CancelOutcome>
  readonly isActive: Effect.Effect<boolean>
}

type JobFiber = Fiber.RuntimeFiber<void, never>

const arm = (tick: Effect.Effect<void>, intervalMinutes: number): Effect.Effect<JobFiber> => {
  const interval = regenerationInterval(intervalMinutes)
  return pipe(
    Effect.uninterruptible(tick),
    Effect.repeat(Schedule.fixed(interval)),
    Effect.delay(interval),
    Effect.asVoid,
    Effect.interruptible,
    Effect.forkDaemon
  )
}

// CHANGE: own at most one recurring job and replace it atomically
// WHY: /start_posting twice must not leave two timers posting in parallel
// QUOTE(TZ): "Remove existing job if any"
// REF: user-2025-05-02-invite-relay
// SOURCE: https://effect.website/docs/scheduling/repetition "Effect.repeat"
// FORMAT THEOREM: forall n: scheduleRecurring(n); scheduleRecurring(n) -> |jobs| = 1
// PURITY: SHELL
// EFFECT: Effect<SchedulerShape<A, E>, never, never>
// INVARIANT: the job is armed even when the immediate run fails; a tick in flight is never cut off
// COMPLEXITY: O(1)/O(1)
export const makeScheduler = <A, E>(job: RecurringJob<A, E>): Effect.Effect<SchedulerShape<A, E>> =>
  Effect.gen(function*(_) {
    const current = yield* _(Ref.make(Option.none<JobFiber>()))
    const lock = yield* _(Effect.makeSemaphore(1))

    const cancel: Effect.Effect<boolean> = pipe(
      Ref.getAndSet(current, Option.none()),
      Effect.flatMap(Option.match({
        onNone: () => Effect.succeed(false),
        onSome: (fiber) => pipe(Fiber.interruptFork(fiber), Effect.as(true))
      }))
    )

    const scheduleRecurring = (intervalMinutes: number): Effect.Effect<A, E> =>
      lock.withPermits(1)(
        Effect.gen(function*(_) {
          yield* _(cancel)
          const outcome = yield* _(Effect.either(job.runNow))
          const fiber = yield* _(arm(job.tick, intervalMinutes))
          yield* _(Ref.set(current, Option.some(fiber)))
          yield* _(Effect.logInfo(logJobArmed(intervalMinutes)))
          return yield* _(outcome)
        })
      )

    const cancelRecurring: Effect.Effect<CancelOutcome> = lock.withPermits(1)(
      pipe(
        cancel,
        Effect.flatMap((stopped) =>
          stopped
            ? pipe(Effect.logInfo(logJobCancelled()), Effect.as<CancelOutcome>("stopped"))
            : Effect.succeed<CancelOutcome>("noActiveJob")
        )
      )
    )

    const isActive = pipe(Ref.get(current), Effect.map(Option.isSome))

    return { scheduleRecurring, cancelRecurring, isActive }
  })
