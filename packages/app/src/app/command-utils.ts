import { Effect, pipe } from "effect"

import type { ChatId, UserId } from "../core/brand.js"
import { type Command, parseCommand } from "../core/commands.js"
import { replyUnauthorized } from "../core/text.js"
import type { IncomingUpdate } from "../core/updates.js"
import type { TelegramError, TelegramServiceShape } from "../shell/telegram.js"

export type CommandEnvelope = {
  readonly chatId: ChatId
  readonly senderId: UserId | null
  readonly command: Command
  readonly text: string
}

export const toCommandEnvelope = (
  update: IncomingUpdate,
  botUsername?: string
): CommandEnvelope | null => {
  const message = update.message
  if (!message) {
    return null
  }
  const command = parseCommand(message.text, botUsername)
  if (!command) {
    return null
  }
  return {
    chatId: message.chatId,
    senderId: message.from?.id ?? null,
    command,
    text: message.text
  }
}

export const isOwner = (envelope: CommandEnvelope, ownerId: UserId): boolean => envelope.senderId === ownerId

// CHANGE: gate configuration commands behind the configured owner id
// WHY: the bot creates invite links in the owner's chats; nobody else may steer it
// QUOTE(TZ): "Only the owner can manage the bot"
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall e: allow(e) = true -> e.senderId = ownerId
// PURITY: SHELL
// EFFECT: Effect<boolean, TelegramError, never>
// INVARIANT: everyone else receives the unauthorized reply
// COMPLEXITY: O(1)/O(1)
export const allowOwnerOnly = (
  telegram: TelegramServiceShape,
  ownerId: UserId,
  envelope: CommandEnvelope
): Effect.Effect<boolean, TelegramError> =>
  isOwner(envelope, ownerId)
    ? Effect.succeed(true)
    : pipe(
      telegram.sendMessage(envelope.chatId, replyUnauthorized()),
      Effect.as(false)
    )
