import { Effect, pipe } from "effect"

import type { LinkResult, RegenerationPolicy, SourceChat } from "../core/domain.js"
import { inviteExpiry } from "../core/schedule.js"
import { logInviteLinkFailed, logInviteLinkGenerated } from "../core/text.js"
import type { TelegramServiceShape } from "../shell/telegram.js"
import { formatError } from "./diagnostics.js"

export type GenerateInviteLinksParams = {
  readonly telegram: TelegramServiceShape
  readonly sources: ReadonlyArray<SourceChat>
  readonly policy: RegenerationPolicy
  readonly nowMillis: number
}

const generateOne = (
  telegram: TelegramServiceShape,
  source: SourceChat,
  expireDate: number,
  memberLimit: number
): Effect.Effect<LinkResult> =>
  pipe(
    telegram.createInviteLink(source.id, expireDate, memberLimit),
    Effect.matchEffect({
      onFailure: (error) => {
        const reason = formatError(error)
        return pipe(
          Effect.logError(logInviteLinkFailed(source.id, reason)),
          Effect.as<LinkResult>({ kind: "failed", reason })
        )
      },
      onSuccess: (link) =>
        pipe(
          Effect.logInfo(logInviteLinkGenerated(source.id)),
          Effect.as<LinkResult>({ kind: "generated", link })
        )
    })
  )

// CHANGE: request one expiring invite link per source chat
// WHY: a source the bot cannot administer must not prevent the others from being posted
// QUOTE(TZ): "Generate links for multiple source chats"
// REF: user-2025-05-02-invite-relay
// SOURCE: https://core.telegram.org/bots/api#createchatinvitelink
// FORMAT THEOREM: forall xs: |generate(xs)| = |xs| ∧ generate(xs)[k] belongs to xs[k]
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<LinkResult>, never, never>
// INVARIANT: requests run one after another in source order; failures are captured per source
// COMPLEXITY: O(n)/O(n)
export const generateInviteLinks = (
  params: GenerateInviteLinksParams
): Effect.Effect<ReadonlyArray<LinkResult>> => {
  const expireDate = inviteExpiry(params.nowMillis, params.policy.timerMinutes)
  return Effect.forEach(
    params.sources,
    (source) => generateOne(params.telegram, source, expireDate, params.policy.userLimit)
  )
}
