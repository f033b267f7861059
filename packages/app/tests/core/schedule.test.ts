import { describe, expect, it } from "@effect/vitest"
import { Duration } from "effect"

import { inviteExpiry, regenerationInterval } from "../../src/core/schedule.js"

describe("schedule", () => {
  it("expires links one interval after now, in unix seconds", () => {
    expect(inviteExpiry(1_700_000_000_500, 5)).toBe(1_700_000_300)
  })

  it("converts minutes to an interval", () => {
    expect(Duration.toMillis(regenerationInterval(3))).toBe(180_000)
  })
})
