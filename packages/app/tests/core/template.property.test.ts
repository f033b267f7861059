import { describe, expect, it } from "@effect/vitest"
import { Either } from "effect"
import fc from "fast-check"

import { fillTemplate } from "../../src/core/template.js"
import { alphaString } from "./property-helpers.js"

describe("template properties", () => {
  it("leaves brace-free text unchanged", () => {
    fc.assert(
      fc.property(fc.array(alphaString, { maxLength: 6 }), (words) => {
        const text = words.join(" ")
        expect(fillTemplate(text, { links_list: "ignored" })).toEqual(Either.right(text))
      })
    )
  })
})
