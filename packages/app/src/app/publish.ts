import { Data, Effect, pipe } from "effect"

import type { ChatId } from "../core/brand.js"
import type { PublishedMessage, UpdateMode } from "../core/domain.js"
import { clearPublished, recordPublished } from "../core/settings.js"
import {
  logDeleteFailed,
  logEditFailed,
  logMessageDeleted,
  logMessageEdited,
  logMessageSent,
  logSendFailed
} from "../core/text.js"
import type { SettingsStoreShape } from "../shell/settings-store.js"
import type { TelegramServiceShape } from "../shell/telegram.js"
import { formatError } from "./diagnostics.js"

export class PublishFailed extends Data.TaggedError("PublishFailed")<{
  readonly message: string
  readonly chatId: ChatId
}> {}

export type PublicationOutcome =
  | { readonly kind: "edited"; readonly message: PublishedMessage }
  | {
    readonly kind: "sent"
    readonly message: PublishedMessage
    readonly replaced: PublishedMessage | null
    readonly editFailed: boolean
    readonly deleteFailed: boolean
  }

export type PublishParams = {
  readonly telegram: TelegramServiceShape
  readonly store: SettingsStoreShape
  readonly target: ChatId
  readonly text: string
  readonly mode: UpdateMode
  readonly previous: PublishedMessage | null
}

const tryEdit = (
  params: PublishParams,
  previous: PublishedMessage
): Effect.Effect<boolean> =>
  pipe(
    params.telegram.editMessageText(previous.chatId, previous.messageId, params.text),
    Effect.matchEffect({
      onFailure: (error) => pipe(Effect.logWarning(logEditFailed(previous, formatError(error))), Effect.as(false)),
      onSuccess: () => pipe(Effect.logInfo(logMessageEdited(previous)), Effect.as(true))
    })
  )

const deletePrevious = (
  params: PublishParams,
  previous: PublishedMessage
): Effect.Effect<boolean> =>
  pipe(
    params.telegram.deleteMessage(previous.chatId, previous.messageId),
    Effect.matchEffect({
      onFailure: (error) => pipe(Effect.logWarning(logDeleteFailed(previous, formatError(error))), Effect.as(false)),
      onSuccess: () => pipe(Effect.logInfo(logMessageDeleted(previous)), Effect.as(true))
    }),
    Effect.zipLeft(params.store.update(clearPublished))
  )

const sendFresh = (params: PublishParams): Effect.Effect<PublishedMessage, PublishFailed> =>
  pipe(
    params.telegram.sendMessage(params.target, params.text),
    Effect.map((messageId): PublishedMessage => ({ chatId: params.target, messageId })),
    Effect.tap((message) => params.store.update((settings) => recordPublished(settings, message))),
    Effect.tap((message) => Effect.logInfo(logMessageSent(message))),
    Effect.tapError((error) => Effect.logError(logSendFailed(params.target, formatError(error)))),
    Effect.mapError((error) =>
      new PublishFailed({
        message: formatError(error),
        chatId: params.target
      })
    )
  )

const canEdit = (params: PublishParams, previous: PublishedMessage): boolean =>
  params.mode === "edit" && previous.chatId === params.target

// CHANGE: reconcile the announcement with the previously published message
// WHY: edit keeps one stable post in the channel; replace pushes a fresh notification
// QUOTE(TZ): "If edit fails, fall back to delete and send new"
// REF: user-2025-05-02-invite-relay
// SOURCE: https://core.telegram.org/bots/api#editmessagetext
// FORMAT THEOREM: forall p: publish(p).kind = edited -> store.published = p.previous
// PURITY: SHELL
// EFFECT: Effect<PublicationOutcome, PublishFailed, never>
// INVARIANT: the stored handle is cleared before any replacement is sent
// COMPLEXITY: O(1)/O(1)
export const publishAnnouncement = (
  params: PublishParams
): Effect.Effect<PublicationOutcome, PublishFailed> =>
  Effect.gen(function*(_) {
    const previous = params.previous
    if (previous === null) {
      const message = yield* _(sendFresh(params))
      return { kind: "sent", message, replaced: null, editFailed: false, deleteFailed: false } satisfies PublicationOutcome
    }
    const attemptedEdit = canEdit(params, previous)
    if (attemptedEdit) {
      const edited = yield* _(tryEdit(params, previous))
      if (edited) {
        return { kind: "edited", message: previous } satisfies PublicationOutcome
      }
    }
    const deleted = yield* _(deletePrevious(params, previous))
    const message = yield* _(sendFresh(params))
    return {
      kind: "sent",
      message,
      replaced: previous,
      editFailed: attemptedEdit,
      deleteFailed: !deleted
    } satisfies PublicationOutcome
  })
