import * as S from "@effect/schema/Schema"
import { Option } from "effect"

import { maxTimerMinutes, maxUserLimit, minTimerMinutes, minUserLimit } from "./domain.js"

export type Command =
  | "/start"
  | "/help"
  | "/set_channels"
  | "/set_timer"
  | "/set_limit"
  | "/set_template"
  | "/start_posting"
  | "/stop_posting"
  | "/post_now"
  | "/toggle_update_mode"
  | "/get_config"

const commands: ReadonlyArray<Command> = [
  "/start",
  "/help",
  "/set_channels",
  "/set_timer",
  "/set_limit",
  "/set_template",
  "/start_posting",
  "/stop_posting",
  "/post_now",
  "/toggle_update_mode",
  "/get_config"
]

const isCommand = (value: string): value is Command => commands.some((command) => command === value)

const normalizeUsername = (value: string): string => value.replace(/^@/, "").toLowerCase()

const extractToken = (text: string): string => text.trim().split(/\s+/)[0] ?? ""

// CHANGE: normalize telegram command tokens
// WHY: ignore bot username suffix and trailing arguments
// QUOTE(TZ): n/a
// REF: user-2025-05-02-commands
// SOURCE: n/a
// FORMAT THEOREM: forall s: normalize(s) = head(tokenize(s))
// PURITY: CORE
// INVARIANT: output contains no whitespace
// COMPLEXITY: O(n)/O(n)
export const normalizeCommand = (text: string): string => {
  const token = extractToken(text)
  return token.split("@")[0] ?? ""
}

const parseCommandTarget = (
  text: string
): { readonly command: string; readonly target?: string | undefined } => {
  const [rawCommand, rawTarget] = extractToken(text).split("@")
  return {
    command: normalizeCommand(rawCommand ?? ""),
    target: rawTarget ? normalizeUsername(rawTarget) : undefined
  }
}

const matchesTarget = (target: string | undefined, botUsername?: string): boolean =>
  !target || !botUsername || normalizeUsername(botUsername) === target

export const parseCommand = (text: string, botUsername?: string): Command | null => {
  if (!text.startsWith("/")) {
    return null
  }
  const parsed = parseCommandTarget(text)
  if (!matchesTarget(parsed.target, botUsername)) {
    return null
  }
  return isCommand(parsed.command) ? parsed.command : null
}

// CHANGE: keep the raw text that follows the command token
// WHY: /set_template takes multi-line HTML, so splitting on whitespace would lose the layout
// QUOTE(TZ): "Extract the template text more reliably for multi-line input"
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall c,a: argumentText(c + " " + a) = trim(a)
// PURITY: CORE
// INVARIANT: inner newlines are preserved
// COMPLEXITY: O(n)/O(n)
export const argumentText = (text: string): string => text.trim().replace(/^\S+/, "").trim()

// CHANGE: split command arguments on whitespace outside double quotes
// WHY: aliases with spaces are written as @grp:"My Group"
// QUOTE(TZ): "Alias with spaces must be in quotes after colon."
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall s without quotes: split(s) = s.trim().split(/\s+/)
// PURITY: CORE
// INVARIANT: quote characters are kept inside their token
// COMPLEXITY: O(n)/O(n)
export const splitArguments = (text: string): ReadonlyArray<string> => {
  const tokens: Array<string> = []
  let current = ""
  let quoted = false
  for (const char of text) {
    if (char === "\"") {
      quoted = !quoted
      current += char
    } else if (!quoted && /\s/u.test(char)) {
      if (current.length > 0) {
        tokens.push(current)
        current = ""
      }
    } else {
      current += char
    }
  }
  if (current.length > 0) {
    tokens.push(current)
  }
  return tokens
}

const timerMinutesSchema = S.NumberFromString.pipe(
  S.int(),
  S.between(minTimerMinutes, maxTimerMinutes)
)

const userLimitSchema = S.NumberFromString.pipe(
  S.int(),
  S.between(minUserLimit, maxUserLimit)
)

const firstArgument = (text: string): string | undefined => splitArguments(argumentText(text))[0]

const decodeFirstArgument = (
  schema: S.Schema<number, string>,
  text: string
): number | null => {
  const raw = firstArgument(text)
  if (raw === undefined || !/^\d+$/.test(raw)) {
    return null
  }
  return Option.getOrNull(S.decodeOption(schema)(raw))
}

export const parseTimerMinutes = (text: string): number | null => decodeFirstArgument(timerMinutesSchema, text)

export const parseUserLimit = (text: string): number | null => decodeFirstArgument(userLimitSchema, text)
