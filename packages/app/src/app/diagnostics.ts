import { Effect, pipe } from "effect"

import { logTelegramNoUpdates, logTelegramReceivedUpdates } from "../core/text.js"
import type { IncomingUpdate } from "../core/updates.js"

export const logUpdates = (
  updates: ReadonlyArray<IncomingUpdate>
): Effect.Effect<void> =>
  updates.length === 0
    ? Effect.logDebug(logTelegramNoUpdates())
    : Effect.logInfo(logTelegramReceivedUpdates(updates.length))

type TaggedError = {
  readonly _tag?: string
  readonly message?: string
  readonly description?: string
  readonly errorCode?: number
  readonly method?: string
}

export type LoggableError = Error | string | TaggedError

const hasTag = (error: LoggableError): error is TaggedError => typeof error !== "string" && "_tag" in error

const formatCode = (error: TaggedError): string => error.errorCode === undefined ? "" : ` code=${error.errorCode}`

const formatMethod = (error: TaggedError): string => error.method ? ` method=${error.method}` : ""

const formatTaggedError = (error: TaggedError): string => {
  const tag = error._tag ?? "UnknownError"
  const message = error.message ?? error.description ?? ""
  const base = message ? `${tag}: ${message}` : tag
  return `${base}${formatCode(error)}${formatMethod(error)}`
}

// CHANGE: render any failure as a single log line
// WHY: Telegram, config and cycle errors all end up in the same log stream
// QUOTE(TZ): n/a
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall e: formatError(e) != ""
// PURITY: CORE
// INVARIANT: tagged errors are prefixed with their tag
// COMPLEXITY: O(1)/O(1)
export const formatError = (error: LoggableError): string => {
  if (typeof error === "string") {
    return error
  }
  if (hasTag(error)) {
    return formatTaggedError(error)
  }
  return `${error.name}: ${error.message}`
}

export const logAndIgnore = <E extends LoggableError, R>(
  effect: Effect.Effect<void, E, R>
): Effect.Effect<void, never, R> =>
  effect.pipe(
    Effect.matchEffect({
      onFailure: (error) => Effect.logError(formatError(error)),
      onSuccess: () => Effect.void
    })
  )

export const logAndFallback = <A, E extends LoggableError, R>(
  effect: Effect.Effect<A, E, R>,
  fallback: A
): Effect.Effect<A, never, R> =>
  effect.pipe(
    Effect.matchEffect({
      onFailure: (error) =>
        pipe(
          Effect.logError(formatError(error)),
          Effect.as(fallback)
        ),
      onSuccess: (value) => Effect.succeed(value)
    })
  )
