import { describe, it, expect, vi } from "vitest"
import {
  isLikelyPersonName,
  NerNameRecognizer,
  PatternNameRecognizer,
  selectNameRecognizer,
  trimToPersonName,
} from "./person-names"
import type { NerBackend, PersonNameSpan } from "./types"

function createBackend(available: boolean, spans: PersonNameSpan[] = []): NerBackend {
  return {
    isAvailable: vi.fn(() => available),
    extractPersonNames: vi.fn(() => spans),
  }
}

describe("isLikelyPersonName", () => {
  it("accepts ordinary names", () => {
    expect(isLikelyPersonName("John Smith")).toBe(true)
    expect(isLikelyPersonName("Robert J. Brown")).toBe(true)
    expect(isLikelyPersonName("Mary O'Brien-Jones")).toBe(true)
  })

  it("accepts a middle initial that spells an article", () => {
    expect(isLikelyPersonName("Jane A. Doe")).toBe(true)
  })

  it("rejects organizations", () => {
    expect(isLikelyPersonName("Boston University")).toBe(false)
    expect(isLikelyPersonName("Acme Holdings")).toBe(false)
    expect(isLikelyPersonName("New York Life")).toBe(false)
  })

  it("rejects headings and acronyms", () => {
    expect(isLikelyPersonName("ACME CORP")).toBe(false)
    expect(isLikelyPersonName("Listed On NYSE")).toBe(false)
    expect(isLikelyPersonName("Executive Officers")).toBe(false)
  })

  it("rejects single tokens", () => {
    expect(isLikelyPersonName("Smith")).toBe(false)
  })
})

describe("trimToPersonName", () => {
  it("drops leading heading words", () => {
    expect(trimToPersonName("Directors John Smith")).toEqual({ name: "John Smith", offset: 10 })
  })

  it("drops a leading honorific", () => {
    expect(trimToPersonName("Mr. John Smith")).toEqual({ name: "John Smith", offset: 4 })
  })

  it("returns null when nothing person-like remains", () => {
    expect(trimToPersonName("The Board")).toBeNull()
  })
})

describe("PatternNameRecognizer", () => {
  it("finds names and skips organizations", () => {
    const recognizer = new PatternNameRecognizer()

    const spans = recognizer.extractPersonNames(
      "Mr. John Smith joined Acme Holdings after working with Jane Doe."
    )

    expect(spans).toEqual([
      { name: "John Smith", startOffset: 4, endOffset: 14 },
      { name: "Jane Doe", startOffset: 55, endOffset: 63 },
    ])
  })

  it("does not join names across lines", () => {
    const spans = new PatternNameRecognizer().extractPersonNames("BOARD OF DIRECTORS\nJohn Smith")

    expect(spans).toEqual([{ name: "John Smith", startOffset: 19, endOffset: 29 }])
  })

  it("is always available", () => {
    const recognizer = new PatternNameRecognizer()

    expect(recognizer.isAvailable()).toBe(true)
    expect(recognizer.source).toBe("pattern")
  })
})

describe("NerNameRecognizer", () => {
  it("filters backend spans and orders them by offset", () => {
    const backend = createBackend(true, [
      { name: "Acme Corp", startOffset: 10, endOffset: 19 },
      { name: "Jane Doe", startOffset: 30, endOffset: 38 },
      { name: "John Smith", startOffset: 0, endOffset: 10 },
    ])

    const spans = new NerNameRecognizer(backend).extractPersonNames("ignored")

    expect(spans.map((s) => s.name)).toEqual(["John Smith", "Jane Doe"])
  })
})

describe("selectNameRecognizer", () => {
  it("falls back to patterns without a backend", () => {
    expect(selectNameRecognizer().source).toBe("pattern")
  })

  it("falls back to patterns when the backend is unavailable", () => {
    const backend = createBackend(false)

    expect(selectNameRecognizer(backend).source).toBe("pattern")
    expect(backend.isAvailable).toHaveBeenCalledTimes(1)
  })

  it("uses the backend when available", () => {
    expect(selectNameRecognizer(createBackend(true)).source).toBe("ner")
  })
})
