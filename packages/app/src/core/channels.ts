import { ChatId } from "./brand.js"
import type { SourceChat } from "./domain.js"

export type SourceDefinitionError =
  | { readonly kind: "format"; readonly token: string }
  | { readonly kind: "identifier"; readonly id: string; readonly token: string }

export type ChannelsCommand =
  | { readonly kind: "usage" }
  | { readonly kind: "invalidTarget"; readonly target: string }
  | { readonly kind: "invalidSources"; readonly errors: ReadonlyArray<SourceDefinitionError> }
  | { readonly kind: "configured"; readonly target: ChatId; readonly sources: ReadonlyArray<SourceChat> }

type SourceParse =
  | { readonly kind: "ok"; readonly source: SourceChat }
  | { readonly kind: "error"; readonly error: SourceDefinitionError }

const sourceDefinitionPattern = /^([^:]+)(?::(?:"([^"]+)"|([^:]+)))?$/

// CHANGE: accept public handles and numeric chat ids
// WHY: Telegram addresses public chats by @username and private ones by id
// QUOTE(TZ): "Use @username for public, ID for private."
// REF: user-2025-05-02-invite-relay
// SOURCE: https://core.telegram.org/bots/api#createchatinvitelink "chat_id: Integer or String"
// FORMAT THEOREM: forall s: valid(s) <-> s ~ /^@\w+$/ ∨ s ~ /^-?\d+$/
// PURITY: CORE
// INVARIANT: surrounding whitespace is never accepted
// COMPLEXITY: O(n)/O(1)
export const isValidChatIdentifier = (value: string): boolean => /^@\w+$/u.test(value) || /^-?\d+$/.test(value)

const normalizeAlias = (raw: string | undefined): string | null => {
  const trimmed = raw?.trim()
  return trimmed ? trimmed : null
}

export const parseSourceDefinition = (token: string): SourceParse => {
  const match = sourceDefinitionPattern.exec(token)
  const id = match?.[1]
  if (!match || id === undefined) {
    return { kind: "error", error: { kind: "format", token } }
  }
  if (!isValidChatIdentifier(id)) {
    return { kind: "error", error: { kind: "identifier", id, token } }
  }
  return {
    kind: "ok",
    source: {
      id: ChatId(id),
      alias: normalizeAlias(match[2] ?? match[3])
    }
  }
}

// CHANGE: validate a full /set_channels argument list before touching settings
// WHY: a single bad source must leave the previous layout in place
// QUOTE(TZ): "Do not update config if there are errors"
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall a: parse(a).kind = configured -> |sources| = |a| - 1
// PURITY: CORE
// INVARIANT: duplicates are kept in the given order
// COMPLEXITY: O(n)/O(n)
export const parseChannelsCommand = (args: ReadonlyArray<string>): ChannelsCommand => {
  const [target, ...definitions] = args
  if (target === undefined || definitions.length === 0) {
    return { kind: "usage" }
  }
  if (!isValidChatIdentifier(target)) {
    return { kind: "invalidTarget", target }
  }
  const sources: Array<SourceChat> = []
  const errors: Array<SourceDefinitionError> = []
  for (const definition of definitions) {
    const parsed = parseSourceDefinition(definition)
    if (parsed.kind === "ok") {
      sources.push(parsed.source)
    } else {
      errors.push(parsed.error)
    }
  }
  return errors.length > 0
    ? { kind: "invalidSources", errors }
    : { kind: "configured", target: ChatId(target), sources }
}
