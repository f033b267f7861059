import type { ChatId } from "./brand.js"
import type { LinkerSettings, PublishedMessage, SourceChat, UpdateMode } from "./domain.js"

export type PostingTarget = {
  readonly target: ChatId
  readonly sources: ReadonlyArray<SourceChat>
}

// CHANGE: replace target, sources and aliases in one step
// WHY: /set_channels redefines the whole channel layout, aliases included
// QUOTE(TZ): "Set target channel & source groups. Aliases for sources are optional."
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall s,t,xs: configure(s,t,xs).sources = xs ∧ .target = t
// PURITY: CORE
// INVARIANT: published handle and policy are untouched
// COMPLEXITY: O(1)/O(1)
export const configureChannels = (
  settings: LinkerSettings,
  target: ChatId,
  sources: ReadonlyArray<SourceChat>
): LinkerSettings => ({
  ...settings,
  target,
  sources
})

export const setTimerMinutes = (settings: LinkerSettings, timerMinutes: number): LinkerSettings => ({
  ...settings,
  policy: { ...settings.policy, timerMinutes }
})

export const setUserLimit = (settings: LinkerSettings, userLimit: number): LinkerSettings => ({
  ...settings,
  policy: { ...settings.policy, userLimit }
})

export const setTemplate = (settings: LinkerSettings, template: string): LinkerSettings => ({
  ...settings,
  template
})

export const nextUpdateMode = (mode: UpdateMode): UpdateMode => mode === "replace" ? "edit" : "replace"

export const toggleUpdateMode = (settings: LinkerSettings): LinkerSettings => ({
  ...settings,
  updateMode: nextUpdateMode(settings.updateMode)
})

export const recordPublished = (
  settings: LinkerSettings,
  published: PublishedMessage
): LinkerSettings => ({
  ...settings,
  published
})

export const clearPublished = (settings: LinkerSettings): LinkerSettings =>
  settings.published === null ? settings : { ...settings, published: null }

// CHANGE: decide whether a cycle may run
// WHY: a cycle needs a target channel and at least one source chat
// QUOTE(TZ): "Configure target channel and at least one source chat first"
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall s: ready(s) != null <-> s.target != null ∧ |s.sources| > 0
// PURITY: CORE
// INVARIANT: returned sources are never empty
// COMPLEXITY: O(1)/O(1)
export const postingTarget = (settings: LinkerSettings): PostingTarget | null =>
  settings.target !== null && settings.sources.length > 0
    ? { target: settings.target, sources: settings.sources }
    : null
