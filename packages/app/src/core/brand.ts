// CHANGE: introduce branded identifiers to keep domain ids distinct without unsafe casts
// WHY: enforce type-level separation of Telegram ids while keeping conversions local and axiomatic
// QUOTE(TZ): "Use @username for public, ID for private. Bot must be admin."
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall x in IdDomain: brand(x) -> preserves(value(x))
// PURITY: CORE
// INVARIANT: brands are only created in this axiomatic module
// COMPLEXITY: O(1)/O(1)
export type Brand<T, Name extends string> = T & { readonly __brand: Name }

export type UserId = Brand<number, "UserId">
export type ChatId = Brand<string, "ChatId">
export type MessageId = Brand<number, "MessageId">

export const UserId = (value: number): UserId => value as UserId

// CHANGE: keep chat identifiers as strings
// WHY: a source or target is either a numeric id ("-100123") or a public handle ("@group")
// QUOTE(TZ): "Use @username for public, ID for private."
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall s in String: ChatId(s) = s
// PURITY: CORE
// INVARIANT: chat id string stays unchanged
// COMPLEXITY: O(1)/O(1)
export const ChatId = (value: string): ChatId => value as ChatId

export const MessageId = (value: number): MessageId => value as MessageId
