import { Context, Effect, pipe, Ref } from "effect"

import type { LinkerSettings } from "../core/domain.js"
import { initialSettings } from "../core/domain.js"

export type SettingsStoreShape = {
  readonly get: Effect.Effect<LinkerSettings>
  readonly update: (f: (settings: LinkerSettings) => LinkerSettings) => Effect.Effect<LinkerSettings>
}

export class SettingsStore extends Context.Tag("SettingsStore")<
  SettingsStore,
  SettingsStoreShape
>() {}

// CHANGE: keep the settings record in memory for the process lifetime
// WHY: configuration is rebuilt by the owner after a restart; nothing is written to disk
// QUOTE(TZ): "Configuration storage"
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall f: update(f); get = f(previous)
// PURITY: SHELL
// EFFECT: Effect<SettingsStoreShape, never, never>
// INVARIANT: every update is applied atomically on the latest value
// COMPLEXITY: O(1)/O(1)
export const makeSettingsStore = (
  initial: LinkerSettings = initialSettings()
): Effect.Effect<SettingsStoreShape> =>
  pipe(
    Ref.make(initial),
    Effect.map((ref): SettingsStoreShape => ({
      get: Ref.get(ref),
      update: (f) => Ref.updateAndGet(ref, f)
    }))
  )
