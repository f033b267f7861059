import { Either, Match, pipe } from "effect"

import { ChatId } from "./brand.js"
import type { LinkResult, SourceChat } from "./domain.js"
import { isGenerated } from "./domain.js"
import { fillTemplate, hasPlaceholder, type TemplateError } from "./template.js"
import { escapeHtml } from "./text.js"

export type RenderMode = "linksList" | "inviteLink" | "fallback" | "default"

export type RenderedAnnouncement = {
  readonly text: string
  readonly mode: RenderMode
  readonly error: TemplateError | null
}

const defaultHeader = "<b>Updated Invite Links:</b>"

const notAvailable = "Not available"

const displayName = (source: SourceChat | undefined, index: number): string => {
  if (!source) {
    return `Unknown Source ${index + 1}`
  }
  return source.alias === null ? `<code>${escapeHtml(source.id)}</code>` : escapeHtml(source.alias)
}

const formatLinkLine = (result: LinkResult, source: SourceChat | undefined, index: number): string =>
  Match.value(result).pipe(
    Match.when({ kind: "generated" }, (value) => `${displayName(source, index)}: ${value.link}`),
    Match.when({ kind: "failed" }, () => `${displayName(source, index)}: ${notAvailable}`),
    Match.exhaustive
  )

// CHANGE: format one display row per generated result
// WHY: operators read aliases; unaliased sources are shown as their raw id in code style
// QUOTE(TZ): "If an alias is set for a source, it's used: \"Alias Name: <invite_url>\""
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall xs,rs: lines(formatLinksList(xs,rs)) = |rs|
// PURITY: CORE
// INVARIANT: row k belongs to result k; rows without a source are labelled "Unknown Source k"
// COMPLEXITY: O(n)/O(n)
export const formatLinksList = (
  sources: ReadonlyArray<SourceChat>,
  results: ReadonlyArray<LinkResult>
): string => results.map((result, index) => formatLinkLine(result, sources[index], index)).join("\n")

const defaultFormat = (linksList: string): string => `${defaultHeader}\n${linksList}`

const firstGeneratedLink = (results: ReadonlyArray<LinkResult>): string | undefined =>
  results.find(isGenerated)?.link

const fromFill = (
  filled: Either.Either<string, TemplateError>,
  mode: RenderMode,
  linksList: string
): RenderedAnnouncement =>
  pipe(
    filled,
    Either.match({
      onLeft: (error) => ({ text: defaultFormat(linksList), mode: "fallback" as const, error }),
      onRight: (text) => ({ text, mode, error: null })
    })
  )

// CHANGE: render the announcement from the operator template
// WHY: one function decides between {links_list}, the legacy {invite_link} and the default layout
// QUOTE(TZ): "Old {invite_link} placeholder shows only the first link if multiple sources are set"
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall t,xs,rs: render(t,xs,rs) = render(t,xs,rs)
// PURITY: CORE
// INVARIANT: never fails; template errors produce the default layout with mode = fallback
// COMPLEXITY: O(n)/O(n)
export const renderAnnouncement = (
  template: string,
  sources: ReadonlyArray<SourceChat>,
  results: ReadonlyArray<LinkResult>
): RenderedAnnouncement => {
  const linksList = formatLinksList(sources, results)
  const firstLink = firstGeneratedLink(results)
  if (hasPlaceholder(template, "links_list")) {
    return fromFill(
      fillTemplate(template, firstLink === undefined ? { links_list: linksList } : {
        links_list: linksList,
        invite_link: firstLink
      }),
      "linksList",
      linksList
    )
  }
  if (firstLink !== undefined && hasPlaceholder(template, "invite_link")) {
    return fromFill(fillTemplate(template, { invite_link: firstLink }), "inviteLink", linksList)
  }
  return { text: defaultFormat(linksList), mode: "default", error: null }
}

const previewSources: ReadonlyArray<SourceChat> = [
  { id: ChatId("@alias_source"), alias: "My Channel Alias" },
  { id: ChatId("@dummy_source_id"), alias: null },
  { id: ChatId("-1001234567890"), alias: "Another Alias" }
]

const previewResults: ReadonlyArray<LinkResult> = [
  { kind: "generated", link: "https://t.me/+ALIASLINK" },
  { kind: "generated", link: "https://t.me/+IDLINK" },
  { kind: "failed", reason: "preview" }
]

export const previewTemplate = (template: string): RenderedAnnouncement =>
  renderAnnouncement(template, previewSources, previewResults)
