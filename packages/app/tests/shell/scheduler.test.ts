import { describe, expect, it } from "@effect/vitest"
import { Duration, Effect, Option, pipe, Queue, TestClock } from "effect"

import { makeScheduler } from "../../src/shell/scheduler.js"

const oneMinute = Duration.minutes(1)

const expectNoTick = (ticks: Queue.Queue<number>) =>
  pipe(
    Queue.poll(ticks),
    Effect.map((value) => {
      expect(Option.isNone(value)).toBe(true)
    })
  )

describe("scheduler", () => {
  it.effect("runs immediately, then once per interval", () =>
    Effect.gen(function*(_) {
      const ticks = yield* _(Queue.unbounded<number>())
      let runs = 0
      const scheduler = yield* _(makeScheduler({
        runNow: Effect.sync(() => {
          runs += 1
          return runs
        }),
        tick: Queue.offer(ticks, 1)
      }))
      const first = yield* _(scheduler.scheduleRecurring(1))
      expect(first).toBe(1)
      yield* _(TestClock.adjust(Duration.seconds(59)))
      yield* _(expectNoTick(ticks))
      yield* _(TestClock.adjust(Duration.seconds(1)))
      expect(yield* _(Queue.take(ticks))).toBe(1)
      yield* _(TestClock.adjust(oneMinute))
      expect(yield* _(Queue.take(ticks))).toBe(1)
      yield* _(expectNoTick(ticks))
    }))

  it.effect("keeps a single job when started twice", () =>
    Effect.gen(function*(_) {
      const ticks = yield* _(Queue.unbounded<number>())
      const scheduler = yield* _(makeScheduler({ runNow: Effect.void, tick: Queue.offer(ticks, 1) }))
      yield* _(scheduler.scheduleRecurring(1))
      yield* _(scheduler.scheduleRecurring(1))
      yield* _(TestClock.adjust(oneMinute))
      yield* _(Queue.take(ticks))
      yield* _(expectNoTick(ticks))
      expect(yield* _(scheduler.isActive)).toBe(true)
    }))

  it.effect("reports a stop without an active job", () =>
    Effect.gen(function*(_) {
      const scheduler = yield* _(makeScheduler({ runNow: Effect.void, tick: Effect.void }))
      expect(yield* _(scheduler.cancelRecurring)).toBe("noActiveJob")
      expect(yield* _(scheduler.isActive)).toBe(false)
    }))

  it.effect("stops future ticks", () =>
    Effect.gen(function*(_) {
      const ticks = yield* _(Queue.unbounded<number>())
      const scheduler = yield* _(makeScheduler({ runNow: Effect.void, tick: Queue.offer(ticks, 1) }))
      yield* _(scheduler.scheduleRecurring(1))
      expect(yield* _(scheduler.cancelRecurring)).toBe("stopped")
      yield* _(TestClock.adjust(Duration.minutes(3)))
      yield* _(expectNoTick(ticks))
      expect(yield* _(scheduler.isActive)).toBe(false)
    }))

  it.effect("arms the timer even when the immediate run fails", () =>
    Effect.gen(function*(_) {
      const ticks = yield* _(Queue.unbounded<number>())
      const scheduler = yield* _(makeScheduler({ runNow: Effect.fail("boom"), tick: Queue.offer(ticks, 1) }))
      const error = yield* _(Effect.flip(scheduler.scheduleRecurring(1)))
      expect(error).toBe("boom")
      expect(yield* _(scheduler.isActive)).toBe(true)
      yield* _(TestClock.adjust(oneMinute))
      expect(yield* _(Queue.take(ticks))).toBe(1)
    }))

  it.effect("lets an in-flight tick finish after a stop", () =>
    Effect.gen(function*(_) {
      const started = yield* _(Queue.unbounded<number>())
      const finished = yield* _(Queue.unbounded<number>())
      const tick = pipe(
        Queue.offer(started, 1),
        Effect.zipRight(Effect.sleep(Duration.seconds(30))),
        Effect.zipRight(Queue.offer(finished, 1))
      )
      const scheduler = yield* _(makeScheduler({ runNow: Effect.void, tick }))
      yield* _(scheduler.scheduleRecurring(1))
      yield* _(TestClock.adjust(oneMinute))
      yield* _(Queue.take(started))
      expect(yield* _(scheduler.cancelRecurring)).toBe("stopped")
      yield* _(TestClock.adjust(Duration.seconds(30)))
      expect(yield* _(Queue.take(finished))).toBe(1)
      yield* _(TestClock.adjust(Duration.minutes(2)))
      yield* _(expectNoTick(started))
    }))
})
