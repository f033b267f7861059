import { Either } from "effect"

export type PlaceholderKey = "links_list" | "invite_link"

export type PlaceholderValues = Partial<Readonly<Record<PlaceholderKey, string>>>

export type TemplateError =
  | { readonly kind: "unknownPlaceholder"; readonly name: string }
  | { readonly kind: "unbalancedBrace"; readonly position: number }

const isPlaceholderKey = (name: string): name is PlaceholderKey => name === "links_list" || name === "invite_link"

export const hasPlaceholder = (template: string, key: PlaceholderKey): boolean => template.includes(`{${key}}`)

const lookup = (values: PlaceholderValues, name: string): string | undefined =>
  isPlaceholderKey(name) ? values[name] : undefined

// CHANGE: substitute the closed set of announcement placeholders
// WHY: templates are operator-written HTML; only {links_list} and {invite_link} are meaningful
// QUOTE(TZ): "Use {links_list} to show all generated invite links."
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall t,v: fill(t,v) = right(s) -> s has no placeholder fields
// PURITY: CORE
// INVARIANT: "{{" and "}}" render as literal braces; any other field without a value is an error
// COMPLEXITY: O(n)/O(n)
export const fillTemplate = (
  template: string,
  values: PlaceholderValues
): Either.Either<string, TemplateError> => {
  let output = ""
  let index = 0
  while (index < template.length) {
    const char = template.charAt(index)
    const next = template.charAt(index + 1)
    if (char === "{" && next === "{") {
      output += "{"
      index += 2
      continue
    }
    if (char === "}" && next === "}") {
      output += "}"
      index += 2
      continue
    }
    if (char === "}") {
      return Either.left({ kind: "unbalancedBrace", position: index })
    }
    if (char === "{") {
      const close = template.indexOf("}", index + 1)
      const name = close === -1 ? "" : template.slice(index + 1, close)
      if (close === -1 || name.includes("{")) {
        return Either.left({ kind: "unbalancedBrace", position: index })
      }
      const value = lookup(values, name)
      if (value === undefined) {
        return Either.left({ kind: "unknownPlaceholder", name })
      }
      output += value
      index = close + 1
      continue
    }
    output += char
    index += 1
  }
  return Either.right(output)
}

export const describeTemplateError = (error: TemplateError): string =>
  error.kind === "unknownPlaceholder"
    ? `unknown placeholder {${error.name}}`
    : `unbalanced brace at position ${error.position}`
