import { describe, it, expect } from "vitest"
import { createTestMatch } from "@/test/factories"
import { deduplicate } from "./deduplicate"

describe("deduplicate", () => {
  it("returns an empty list unchanged", () => {
    expect(deduplicate([])).toEqual([])
  })

  it("keeps the first of equally confident duplicates", () => {
    const first = createTestMatch({
      affiliationType: "education",
      context: "at Boston University in 2005",
    })
    const second = createTestMatch({
      affiliationType: "education",
      context: "He studied at Boston University in 2005 with honors",
    })

    expect(deduplicate([first, second])).toEqual([first])
  })

  it("compares names case-insensitively and contexts ignoring whitespace", () => {
    const first = createTestMatch({ personName: "Jane Doe", context: "at Boston University" })
    const second = createTestMatch({ personName: " JANE DOE ", context: "at  Boston\nUniversity" })

    expect(deduplicate([first, second])).toEqual([first])
  })

  it("keeps the more confident duplicate in the earlier slot", () => {
    const unrelated = createTestMatch({ personName: "John Smith" })
    const weak = createTestMatch({ context: "visited Boston University" })
    const strong = createTestMatch({
      context: "Jane Doe visited Boston University often",
      confidence: "high",
    })

    expect(deduplicate([weak, unrelated, strong])).toEqual([strong, unrelated])
  })

  it("keeps matches that differ in person, type or context", () => {
    const matches = [
      createTestMatch({ personName: "Jane Doe" }),
      createTestMatch({ personName: "John Smith" }),
      createTestMatch({ affiliationType: "degree" }),
      createTestMatch({ context: "an unrelated passage about Boston University" }),
    ]

    expect(deduplicate(matches)).toEqual(matches)
  })

  it("collapses a match that bridges two survivors", () => {
    const left = createTestMatch({ context: "alpha Boston University" })
    const unrelated = createTestMatch({ personName: "John Smith" })
    const right = createTestMatch({ context: "Boston University beta" })
    const bridge = createTestMatch({ context: "alpha Boston University beta" })

    expect(deduplicate([left, unrelated, right, bridge])).toEqual([left, unrelated])
  })

  it("is idempotent and never grows the list", () => {
    const matches = [
      createTestMatch({ context: "alpha Boston University" }),
      createTestMatch({ personName: "John Smith", affiliationType: "degree" }),
      createTestMatch({ context: "Boston University beta" }),
      createTestMatch({ context: "alpha Boston University beta", confidence: "high" }),
      createTestMatch({ personName: "John Smith", affiliationType: "degree", context: "x" }),
      createTestMatch({ personName: "Unknown", affiliationType: "employment" }),
    ]

    const once = deduplicate(matches)

    expect(once.length).toBeLessThanOrEqual(matches.length)
    expect(deduplicate(once)).toEqual(once)
  })
})
