import { describe, it, expect } from "vitest"
import { ConfigurationError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import { htmlDocument } from "@/test/factories"
import {
  BASE_HEADING_RULES,
  BIO_HEADING_RULES,
  compileHeadingRules,
  findBioSections,
  locateBioSections,
} from "./section-locator"
import type { BioSection } from "./types"

function reconstruct(text: string, sections: BioSection[]): string {
  return text.slice(0, sections[0].startOffset) + sections.map((s) => s.text).join("")
}

describe("BIO_HEADING_RULES", () => {
  it("extends the base rules without replacing them", () => {
    expect(BIO_HEADING_RULES.slice(0, BASE_HEADING_RULES.length)).toEqual(BASE_HEADING_RULES)
    expect(BIO_HEADING_RULES.length).toBeGreaterThan(BASE_HEADING_RULES.length)
  })
})

describe("findBioSections", () => {
  it("returns no sections when no heading matches", () => {
    expect(findBioSections("Quarterly results improved.\nMismanagement claims were dismissed.")).toEqual(
      []
    )
  })

  it("opens one section per repeated heading", () => {
    const text = [
      "Annual Report",
      "BOARD OF DIRECTORS",
      "John Smith, age 45, director.",
      "BOARD OF DIRECTORS",
      "Jane Doe, age 61, director.",
    ].join("\n")
    const second = text.lastIndexOf("BOARD OF DIRECTORS")

    const sections = findBioSections(text)

    expect(sections.map((s) => [s.label, s.startOffset, s.endOffset])).toEqual([
      ["Directors & Officers", 14, second],
      ["Directors & Officers", second, text.length],
    ])
    expect(sections[0].text).toBe("BOARD OF DIRECTORS\nJohn Smith, age 45, director.\n")
    expect(reconstruct(text, sections)).toBe(text)
  })

  it("matches headings in any case", () => {
    const [section] = findBioSections("Board of Directors\nJohn Smith, age 45.")

    expect(section.heading).toBe("Board of Directors")
    expect(section.label).toBe("Directors & Officers")
  })

  it("absorbs headings that start inside an accepted heading", () => {
    const sections = findBioSections(
      "DIRECTORS AND EXECUTIVE OFFICERS\nJohn Smith, age 45, director."
    )

    expect(sections).toHaveLength(1)
    expect(sections[0].heading).toBe("DIRECTORS AND EXECUTIVE OFFICERS")
  })

  it("prefers the longest heading at one offset", () => {
    const [section] = findBioSections("MANAGEMENT'S DISCUSSION AND ANALYSIS\nRevenue grew.")

    expect(section.label).toBe("Management Discussion")
    expect(section.heading).toBe("MANAGEMENT'S DISCUSSION")
  })

  it("recognizes proposal and item headings", () => {
    expect(findBioSections("PROPOSAL 1 - ELECTION OF DIRECTORS\nNominees follow.")).toEqual([
      expect.objectContaining({
        label: "Election of Directors",
        heading: "PROPOSAL 1 - ELECTION OF DIRECTORS",
      }),
    ])
    expect(
      findBioSections("Item 10. Directors, Executive Officers and Corporate Governance")
    ).toEqual([
      expect.objectContaining({
        label: "Item 10: Directors & Officers",
        heading: "Item 10. Directors, Executive Officers",
      }),
    ])
  })

  it("keeps sections contiguous across different headings", () => {
    const text = [
      "Cover page",
      "NOMINEES FOR DIRECTOR",
      "John Smith, age 45.",
      "CONTINUING DIRECTORS",
      "Jane Doe, age 61.",
      "EXECUTIVE OFFICERS",
      "Robert Brown, Chief Operating Officer.",
    ].join("\n")

    const sections = findBioSections(text)

    expect(sections.map((s) => s.label)).toEqual([
      "Director Nominees",
      "Continuing Directors",
      "Executive Officers",
    ])
    sections.slice(1).forEach((section, i) => {
      expect(section.startOffset).toBe(sections[i].endOffset)
    })
    expect(reconstruct(text, sections)).toBe(text)
  })

  it("returns frozen sections", () => {
    const [section] = findBioSections("BIOGRAPHIES\nJohn Smith")

    expect(Object.isFrozen(section)).toBe(true)
  })

  it("accepts custom rules", () => {
    const sections = findBioSections("Intro\nBIOGRAPHY\nJohn Smith", [
      { pattern: /\bBiography\b/, label: "Bio" },
    ])

    expect(sections).toEqual([
      { label: "Bio", heading: "BIOGRAPHY", startOffset: 6, endOffset: 26, text: "BIOGRAPHY\nJohn Smith" },
    ])
  })
})

describe("compileHeadingRules", () => {
  it("rejects an empty rule list", () => {
    expect(() => compileHeadingRules([])).toThrow(ConfigurationError)
  })

  it("rejects a blank label", () => {
    expect(() => compileHeadingRules([{ pattern: /Directors/, label: "  " }])).toThrow(
      "Heading rule label must not be blank"
    )
  })

  it("rejects a pattern that matches empty text", () => {
    expect(() => compileHeadingRules([{ pattern: /x*/, label: "Empty" }])).toThrow(
      "Heading rule matches empty text"
    )
  })

  it("makes rules global and case-insensitive", () => {
    const [rule] = compileHeadingRules([{ pattern: /Directors/, label: "Directors" }])

    expect(rule.pattern.flags).toBe("gi")
  })
})

describe("locateBioSections", () => {
  it("normalizes markup before locating", () => {
    const markup = htmlDocument(
      "<p>BOARD OF DIRECTORS</p><p>John Smith, age 45, director.</p>"
    )

    expect(locateBioSections(markup)).toEqual([
      {
        label: "Directors & Officers",
        heading: "BOARD OF DIRECTORS",
        startOffset: 7,
        endOffset: 55,
        text: "BOARD OF DIRECTORS\nJohn Smith, age 45, director.",
      },
    ])
  })

  it("logs and returns no sections for unparseable markup", () => {
    expect(locateBioSections("%PDF-1.4 binary")).toEqual([])
    expect(logger.warn).toHaveBeenCalledWith(
      "Skipping section location for unparseable markup",
      { reason: "Document contains binary content" }
    )
  })
})
