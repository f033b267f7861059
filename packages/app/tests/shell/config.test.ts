import { describe, expect, it } from "@effect/vitest"
import { Duration, Effect } from "effect"

import { decodeEnv } from "../../src/shell/config.js"

describe("config", () => {
  it.effect("decodes the required variables with a default timeout", () =>
    Effect.gen(function*(_) {
      const config = yield* _(decodeEnv({ BOT_TOKEN: "test-token", BOT_OWNER_ID: "42" }))
      expect(config.token).toBe("test-token")
      expect(config.ownerId).toBe(42)
      expect(Duration.toMillis(config.requestTimeout)).toBe(15_000)
    }))

  it.effect("reads an explicit request timeout", () =>
    Effect.gen(function*(_) {
      const config = yield* _(
        decodeEnv({ BOT_TOKEN: "test-token", BOT_OWNER_ID: "42", BOT_REQUEST_TIMEOUT_MS: "2500" })
      )
      expect(Duration.toMillis(config.requestTimeout)).toBe(2_500)
    }))

  it.effect("requires an owner id", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decodeEnv({ BOT_TOKEN: "test-token" })))
      expect(error._tag).toBe("ConfigError")
    }))

  it.effect("rejects a non-positive owner id", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decodeEnv({ BOT_TOKEN: "test-token", BOT_OWNER_ID: "0" })))
      expect(error._tag).toBe("ConfigError")
    }))

  it.effect("rejects an empty token", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decodeEnv({ BOT_TOKEN: "", BOT_OWNER_ID: "42" })))
      expect(error._tag).toBe("ConfigError")
    }))
})
