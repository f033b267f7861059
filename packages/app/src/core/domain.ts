import type { ChatId, MessageId, UserId } from "./brand.js"

export type ChatType = "private" | "group" | "supergroup" | "channel"

export type Sender = {
  readonly id: UserId
  readonly username?: string | undefined
}

export type UpdateMode = "edit" | "replace"

export type SourceChat = {
  readonly id: ChatId
  readonly alias: string | null
}

export type RegenerationPolicy = {
  readonly timerMinutes: number
  readonly userLimit: number
}

export type PublishedMessage = {
  readonly chatId: ChatId
  readonly messageId: MessageId
}

export type LinkerSettings = {
  readonly target: ChatId | null
  readonly sources: ReadonlyArray<SourceChat>
  readonly policy: RegenerationPolicy
  readonly template: string
  readonly updateMode: UpdateMode
  readonly published: PublishedMessage | null
}

export type LinkResult =
  | { readonly kind: "generated"; readonly link: string }
  | { readonly kind: "failed"; readonly reason: string }

export const defaultTemplate = "<b>Secure Access</b>: {invite_link}"

export const minTimerMinutes = 1

// Longest interval the runtime timer can wait: 2^31 - 1 ms, in whole minutes.
export const maxTimerMinutes = 35_791

export const minUserLimit = 1

// Telegram rejects member_limit above this value.
export const maxUserLimit = 99_999

// CHANGE: provide a pure initializer for the settings record
// WHY: the bot starts unconfigured on every process start; nothing is persisted
// QUOTE(TZ): "Configuration storage"
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: init().target = null ∧ init().sources = []
// PURITY: CORE
// INVARIANT: initial settings are never ready to post
// COMPLEXITY: O(1)/O(1)
export const initialSettings = (): LinkerSettings => ({
  target: null,
  sources: [],
  policy: {
    timerMinutes: 5,
    userLimit: 1
  },
  template: defaultTemplate,
  updateMode: "replace",
  published: null
})

export const isGenerated = (
  result: LinkResult
): result is { readonly kind: "generated"; readonly link: string } => result.kind === "generated"
