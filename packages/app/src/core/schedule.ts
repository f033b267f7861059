import { Duration } from "effect"

// CHANGE: derive the invite link expiry from the regeneration interval
// WHY: a link must stop working once the next cycle has replaced it
// QUOTE(TZ): "Links expire after the timer duration"
// REF: user-2025-05-02-invite-relay
// SOURCE: https://core.telegram.org/bots/api#createchatinvitelink "expire_date: Point in time (Unix timestamp) when the link will expire"
// FORMAT THEOREM: forall n,m: inviteExpiry(n,m) = floor(n / 1000) + 60m
// PURITY: CORE
// INVARIANT: result is a whole number of seconds strictly after now
// COMPLEXITY: O(1)/O(1)
export const inviteExpiry = (nowMillis: number, timerMinutes: number): number =>
  Math.floor(nowMillis / 1000) + timerMinutes * 60

export const regenerationInterval = (timerMinutes: number): Duration.Duration => Duration.minutes(timerMinutes)
