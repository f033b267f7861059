import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import * as S from "@effect/schema/Schema"
import dotenv from "dotenv"
import { Data, Duration, Effect, pipe } from "effect"

import { UserId } from "../core/brand.js"

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string
}> {}

const positiveIntFromString = S.NumberFromString.pipe(S.int(), S.positive())

const envSchema = S.Struct({
  BOT_TOKEN: S.NonEmptyString,
  BOT_OWNER_ID: positiveIntFromString,
  BOT_REQUEST_TIMEOUT_MS: S.optionalWith(positiveIntFromString, { default: () => 15_000 })
})

type Env = S.Schema.Type<typeof envSchema>

export type Config = {
  readonly token: string
  readonly ownerId: UserId
  readonly requestTimeout: Duration.Duration
}

const toConfigError = (
  error: ConfigError | Error | string
): ConfigError =>
  error instanceof ConfigError
    ? error
    : new ConfigError({
      message: error instanceof Error ? error.message : error
    })

const toConfig = (env: Env): Config => ({
  token: env.BOT_TOKEN,
  ownerId: UserId(env.BOT_OWNER_ID),
  requestTimeout: Duration.millis(env.BOT_REQUEST_TIMEOUT_MS)
})

// CHANGE: decode bot configuration from a raw environment record
// WHY: keep boundary data validated before entering the domain
// QUOTE(TZ): "Only the owner can manage the bot"
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall env: decode(env) = config -> config.token != "" ∧ config.ownerId > 0
// PURITY: SHELL
// EFFECT: Effect<Config, ConfigError, never>
// INVARIANT: request timeout defaults to 15 seconds
// COMPLEXITY: O(1)/O(1)
export const decodeEnv = (env: Readonly<Record<string, string | undefined>>): Effect.Effect<Config, ConfigError> =>
  pipe(
    S.decodeUnknown(envSchema)(env),
    Effect.map(toConfig),
    Effect.mapError((error) => toConfigError(error))
  )

const loadEnv = pipe(
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const path = yield* _(Path.Path)
    const modulePath = yield* _(path.fromFileUrl(new URL(import.meta.url)))
    const moduleDir = path.dirname(modulePath)
    const cwd = process.cwd()
    const candidateEnvPaths = [
      path.resolve(cwd, ".env"),
      path.resolve(cwd, "../.env"),
      path.resolve(cwd, "../../.env"),
      path.resolve(moduleDir, ".env"),
      path.resolve(moduleDir, "../.env"),
      path.resolve(moduleDir, "../../.env")
    ]

    let resolvedEnvPath: string | null = null
    for (const envPath of candidateEnvPaths) {
      const exists = yield* _(fs.exists(envPath))
      if (exists) {
        resolvedEnvPath = envPath
        break
      }
    }

    if (resolvedEnvPath) {
      dotenv.config({ path: resolvedEnvPath })
    } else {
      dotenv.config()
    }
  }),
  Effect.mapError((error) => toConfigError(error instanceof Error ? error : String(error))),
  Effect.asVoid
)

export const loadConfig = pipe(
  loadEnv,
  Effect.flatMap(() => Effect.sync(() => process.env)),
  Effect.flatMap(decodeEnv)
)
