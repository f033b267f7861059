import type { ChatId } from "./brand.js"
import type { ChatType, Sender } from "./domain.js"

export type ChatMessage = {
  readonly chatId: ChatId
  readonly chatType: ChatType
  readonly text: string
  readonly from?: Sender | undefined
}

export type IncomingUpdate = {
  readonly updateId: number
  readonly message?: ChatMessage | undefined
}

// CHANGE: advance the long-poll offset past every received update
// WHY: Telegram redelivers updates until getUpdates is called with offset > update_id
// QUOTE(TZ): n/a
// REF: user-2025-05-02-invite-relay
// SOURCE: https://core.telegram.org/bots/api#getupdates "An update is considered confirmed as soon as getUpdates is called with an offset higher than its update_id."
// FORMAT THEOREM: forall o,us: nextOffset(o,us) >= o
// PURITY: CORE
// INVARIANT: an empty batch keeps the offset
// COMPLEXITY: O(n)/O(1)
export const nextOffset = (
  offset: number,
  updates: ReadonlyArray<IncomingUpdate>
): number => updates.reduce((current, update) => Math.max(current, update.updateId + 1), offset)
