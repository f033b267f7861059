import type { ChatId, MessageId } from "./brand.js"
import type { LinkerSettings, PublishedMessage, SourceChat, UpdateMode } from "./domain.js"
import { maxTimerMinutes, maxUserLimit, minTimerMinutes } from "./domain.js"
import type { SourceDefinitionError } from "./channels.js"
import type { RenderedAnnouncement } from "./render.js"

export const escapeHtml = (value: string): string =>
  value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll("\"", "&quot;")
    .replaceAll("'", "&#39;")

const code = (value: string): string => `<code>${escapeHtml(value)}</code>`

const formatSourceLine = (source: SourceChat): string =>
  source.alias === null
    ? `  - ${code(source.id)}`
    : `  - ${code(source.id)} (Alias: "${escapeHtml(source.alias)}")`

const formatSources = (sources: ReadonlyArray<SourceChat>): string =>
  sources.length === 0
    ? "  No source chats configured."
    : sources.map((source) => formatSourceLine(source)).join("\n")

const formatMode = (mode: UpdateMode): string => mode.toUpperCase()

// CHANGE: format the owner help text
// WHY: centralize user-facing command text in a single module
// QUOTE(TZ): "Initial welcome with detailed command overview"
// REF: user-2025-05-02-messages
// SOURCE: n/a
// FORMAT THEOREM: forall _: message != ""
// PURITY: CORE
// INVARIANT: every registered command is listed
// COMPLEXITY: O(1)/O(1)
export const formatHelp = (): string =>
  [
    "🚀 <b>Invite Relay - Admin Commands</b>",
    "",
    "<u>Configuration Commands</u>",
    "/set_channels &lt;target&gt; &lt;src_id&gt;[:\"Alias\"] [src_id2:\"Alias2\"...]",
    "→ Set the target channel and the source groups. Aliases are optional.",
    "→ Use @username for public chats and the numeric id for private ones. The bot must be admin everywhere.",
    "→ Example: <code>/set_channels @link_ch @group_A:\"Main Chat\" -100123:\"Private Archive\"</code>",
    "",
    "/set_timer &lt;minutes&gt;",
    `→ Minutes between regenerations (${minTimerMinutes} to ${maxTimerMinutes}, used by the next /start_posting)`,
    "",
    `/set_limit &lt;number&gt;`,
    `→ Max users per link (1 to ${maxUserLimit})`,
    "",
    "/set_template &lt;HTML text&gt;",
    "→ <code>{links_list}</code> lists every source: \"Alias: link\" or \"<code>id</code>: link\"",
    "→ <code>{invite_link}</code> shows only the first generated link",
    "→ Example: <code>&lt;b&gt;Join our communities:&lt;/b&gt;\n{links_list}</code>",
    "",
    "<u>Operation Commands</u>",
    "/start_posting → Post now and keep regenerating on the timer",
    "/stop_posting → Stop the timer",
    "/post_now → Regenerate and post once",
    "/toggle_update_mode → Switch between editing the post and sending a new one",
    "/get_config → View current settings"
  ].join("\n")

export const formatPrivateNotice = (): string => "🔒 This bot is privately managed. Contact owner for assistance."

export const replyUnauthorized = (): string => "⛔ Unauthorized: This command is owner-only"

export const replyChannelsUsage = (): string =>
  [
    "❌ <b>Usage</b>: /set_channels &lt;target_channel&gt; &lt;source_chat_1&gt; [source_chat_2...]",
    "<b>Example</b>:",
    "<code>/set_channels @my_public_channel @group_alpha -1001234567890</code>",
    "Ensure the bot is an admin in all specified channels/groups."
  ].join("\n")

export const replyInvalidTarget = (target: string): string => `❌ Invalid target channel identifier: ${code(target)}`

const formatSourceError = (error: SourceDefinitionError): string =>
  error.kind === "format"
    ? `Invalid format for source definition: ${code(error.token)}`
    : `Invalid channel identifier in definition: ${code(error.id)} (from ${code(error.token)})`

export const replySourceErrors = (errors: ReadonlyArray<SourceDefinitionError>): string =>
  ["❌ Errors found in source definitions:", ...errors.map((error) => formatSourceError(error))].join("\n")

export const replyChannelsConfigured = (target: ChatId, sources: ReadonlyArray<SourceChat>): string =>
  [
    "✅ <b>Channels Configured</b>",
    `<b>Target Channel</b>: ${code(target)}`,
    "<b>Source Chats &amp; Aliases</b>:",
    formatSources(sources)
  ].join("\n")

export const replyTimerUsage = (): string =>
  `❌ Usage: /set_timer &lt;minutes&gt; (${minTimerMinutes} to ${maxTimerMinutes})`

export const replyTimerSet = (minutes: number): string => `⏰ Timer set to ${minutes} minutes`

export const replyLimitUsage = (): string => `❌ Usage: /set_limit &lt;number&gt; (1 to ${maxUserLimit})`

export const replyLimitSet = (limit: number): string => `👥 User limit set to ${limit}`

export const replyTemplateUsage = (): string =>
  [
    "❌ Provide HTML template text after the command.",
    "Use {links_list} for all generated links or {invite_link} for the first one.",
    "Example:",
    "<code>/set_template &lt;b&gt;Join Us:&lt;/b&gt;\n{links_list}</code>"
  ].join("\n")

const formatPreviewNote = (preview: RenderedAnnouncement): string | null => {
  if (preview.mode === "fallback") {
    return "⚠️ The template could not be filled, the default layout will be used:"
  }
  if (preview.mode === "default") {
    return "ℹ️ The template has no {links_list} or {invite_link}, the default layout will be used:"
  }
  return null
}

// CHANGE: confirm a stored template with a rendered preview
// WHY: operators see how their HTML looks before the next cycle posts it
// QUOTE(TZ): "Generate a more comprehensive preview"
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall t,p: reply(t,p) contains escape(t)
// PURITY: CORE
// INVARIANT: raw template is escaped; preview is the renderer output as-is
// COMPLEXITY: O(n)/O(n)
export const replyTemplateSet = (template: string, preview: RenderedAnnouncement): string => {
  const note = formatPreviewNote(preview)
  return [
    "📝 <b>Template Set</b>",
    `<b>Raw</b>: ${code(template)}`,
    "",
    "<b>Preview with sample data</b>:",
    ...(note === null ? [] : [note]),
    preview.text
  ].join("\n")
}

export const replyModeChanged = (mode: UpdateMode): string =>
  [
    `⚙️ Message update mode set to: <b>${formatMode(mode)}</b>`,
    "",
    "<b>EDIT Mode</b>: The bot will try to edit the last sent message with the new links.",
    "<b>REPLACE Mode</b>: The bot will delete the old message and send a new one."
  ].join("\n")

export const replyNotConfigured = (): string =>
  "❌ Configure target channel and at least one source chat first using /set_channels"

export const replyPostingStarted = (minutes: number): string =>
  `🔄 Auto-posting activated! Links are regenerated every ${minutes} minutes.`

export const replyPostingStartedWithFailure = (minutes: number, reason: string): string =>
  `${replyPostingStarted(minutes)}\n⚠️ The first post failed: ${escapeHtml(reason)}`

export const replyPostingStopped = (): string => "⏹️ Auto-posting stopped"

export const replyNoActiveJob = (): string => "❌ No active posting job"

export type PostSummary = {
  readonly generated: number
  readonly total: number
  readonly messageId: MessageId
  readonly edited: boolean
}

export const replyPostedNow = (summary: PostSummary): string =>
  `✅ ${summary.edited ? "Edited" : "Posted"} message ${summary.messageId} with ${summary.generated}/${summary.total} links`

export const replyCycleFailed = (reason: string): string => `❌ Posting failed: ${escapeHtml(reason)}`

const formatPublished = (published: PublishedMessage | null): string =>
  published === null ? "None" : `${published.messageId}`

// CHANGE: render the current settings snapshot
// WHY: /get_config shows everything an operator can change plus the job state
// QUOTE(TZ): "Display current configuration"
// REF: user-2025-05-02-invite-relay
// SOURCE: n/a
// FORMAT THEOREM: forall s,a: formatConfig(s,a) mentions every settings field
// PURITY: CORE
// INVARIANT: template is shown escaped
// COMPLEXITY: O(n)/O(n)
export const formatConfig = (settings: LinkerSettings, jobActive: boolean): string =>
  [
    "⚙️ <b>Current Configuration</b>",
    "",
    "<b>Source Chats</b>:",
    formatSources(settings.sources),
    `<b>Target Channel</b>: ${code(settings.target ?? "Not Set")}`,
    `<b>Regeneration Timer</b>: ${settings.policy.timerMinutes} minutes`,
    `<b>User Limit/Link</b>: ${settings.policy.userLimit}`,
    `<b>Message Update Mode</b>: ${formatMode(settings.updateMode)}`,
    "<b>Message Template</b>:",
    code(settings.template),
    `<b>Active Job</b>: ${jobActive ? "✅ Running" : "❌ Stopped"}`,
    `<b>Last Message ID</b>: ${formatPublished(settings.published)}`
  ].join("\n")

export const logTelegramNoUpdates = (): string => "Telegram: no updates"

export const logTelegramReceivedUpdates = (count: number): string => `Telegram: received ${count} update(s)`

export const logCommandReceived = (command: string, chatId: ChatId): string =>
  `Command: ${command} chat=${chatId}`

export const logCycleStarted = (trigger: string): string => `Cycle: started trigger=${trigger}`

export const logInviteLinkGenerated = (chatId: ChatId): string => `Invite link generated for chat=${chatId}`

export const logInviteLinkFailed = (chatId: ChatId, reason: string): string =>
  `Invite link failed for chat=${chatId}: ${reason}`

export const logAllLinksFailed = (trigger: string): string =>
  `Cycle: no invite link could be generated trigger=${trigger}`

export const logRenderFallback = (reason: string): string =>
  `Render: template could not be filled (${reason}), using default layout`

export const logRenderLegacy = (): string => "Render: template uses {invite_link}, only the first link is shown"

export const logRenderDefault = (): string => "Render: no known placeholder in template, using default layout"

export const logMessageEdited = (message: PublishedMessage): string =>
  `Publish: edited message=${message.messageId} chat=${message.chatId}`

export const logEditFailed = (message: PublishedMessage, reason: string): string =>
  `Publish: edit of message=${message.messageId} failed (${reason}), falling back to replace`

export const logMessageDeleted = (message: PublishedMessage): string =>
  `Publish: deleted message=${message.messageId} chat=${message.chatId}`

export const logDeleteFailed = (message: PublishedMessage, reason: string): string =>
  `Publish: delete of message=${message.messageId} failed: ${reason}`

export const logMessageSent = (message: PublishedMessage): string =>
  `Publish: sent message=${message.messageId} chat=${message.chatId}`

export const logSendFailed = (chatId: ChatId, reason: string): string =>
  `Publish: send to chat=${chatId} failed: ${reason}`

export const logJobArmed = (minutes: number): string => `Scheduler: armed every ${minutes} minute(s)`

export const logJobCancelled = (): string => "Scheduler: cancelled"

export const logPollingStarted = (username: string | undefined): string =>
  `Bot started polling as @${username ?? "unknown"}`
