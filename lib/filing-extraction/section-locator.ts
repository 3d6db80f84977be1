/**
 * @fileoverview Biography section location
 *
 * Regulatory filings are free-text HTML with no reliable DOM landmarks, so
 * heading text is the only stable signal for where director and officer
 * biographies begin. Filers phrase those headings inconsistently ("Item 10.
 * Directors, Executive Officers...", "NOMINEES FOR DIRECTOR", "PROPOSAL 1 -
 * ELECTION OF DIRECTORS"), so several heading vocabularies are tried.
 *
 * Detection runs in passes:
 * 1. Run every rule over the full text, collecting all matches
 * 2. Order by offset; at equal offsets the longest match wins
 * 3. Absorb matches that start inside an accepted heading
 * 4. Cut the text at accepted heading starts
 *
 * Sections are contiguous and never overlap: concatenating the untagged
 * lead-in and every section's text gives back the normalized text.
 *
 * @module lib/filing-extraction/section-locator
 */

import { ConfigurationError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import { normalizeMarkup } from "./text-normalizer"
import type { BioSection, HeadingRule, NormalizedText } from "./types"

// ============================================================================
// Heading Rules
// ============================================================================
//
// Rules are compiled case-insensitively with the `g` flag. The enhanced set
// only ever appends to the base set.

/** Headings recognized in every filing type */
export const BASE_HEADING_RULES: readonly HeadingRule[] = Object.freeze([
  // "Item 10. Directors, Executive Officers and Corporate Governance"
  {
    pattern: /\bItem\s+10\.?\s+Directors[,\s]+Executive\s+Officers\b/gi,
    label: "Item 10: Directors & Officers",
  },
  // "BOARD OF DIRECTORS", "DIRECTORS AND EXECUTIVE OFFICERS"
  {
    pattern: /\b(?:BOARD\s+OF\s+DIRECTORS|DIRECTORS\s+AND\s+EXECUTIVE\s+OFFICERS)\b/gi,
    label: "Directors & Officers",
  },
  // "EXECUTIVE OFFICERS", "MANAGEMENT"
  {
    pattern: /\b(?:EXECUTIVE\s+OFFICERS|MANAGEMENT)\b/gi,
    label: "Executive Officers",
  },
  // "BIOGRAPHICAL INFORMATION", "BIOGRAPHIES"
  {
    pattern: /\b(?:BIOGRAPHICAL\s+INFORMATION|BIOGRAPHIES)\b/gi,
    label: "Biographies",
  },
  // "PROPOSAL 1 - ELECTION OF DIRECTORS", "Proposal No. 1: Election of Directors"
  {
    pattern: /\bPROPOSAL\s+(?:NO\.?\s*)?\d+[\s\-–—:.]+ELECTION\s+OF\s+DIRECTORS\b/gi,
    label: "Election of Directors",
  },
])

/** Base rules plus headings common in proxy statements */
export const BIO_HEADING_RULES: readonly HeadingRule[] = Object.freeze([
  ...BASE_HEADING_RULES,
  // Repeated across amendments without the proposal number
  {
    pattern: /\bELECTION\s+OF\s+DIRECTORS\b/gi,
    label: "Election of Directors",
  },
  // "NOMINEES FOR DIRECTOR", "Nominees for Election as Directors"
  {
    pattern: /\bNOMINEES\s+FOR\s+(?:ELECTION\s+AS\s+)?DIRECTORS?\b/gi,
    label: "Director Nominees",
  },
  {
    pattern: /\bCONTINUING\s+DIRECTORS\b/gi,
    label: "Continuing Directors",
  },
  // "MANAGEMENT'S DISCUSSION", "MANAGEMENT DISCUSSION"
  {
    pattern: /\bMANAGEMENT(?:['’]S)?\s+DISCUSSION\b/gi,
    label: "Management Discussion",
  },
])

/**
 * Compiles heading rules into case-insensitive global patterns.
 *
 * @throws ConfigurationError - empty rule list, blank label, or a pattern
 *   that matches the empty string
 */
export function compileHeadingRules(rules: readonly HeadingRule[]): readonly HeadingRule[] {
  if (rules.length === 0) {
    throw new ConfigurationError("At least one heading rule is required", [
      { field: "rules", message: "Must contain at least 1 element" },
    ])
  }

  return Object.freeze(
    rules.map(({ pattern, label }, i) => {
      if (label.trim().length === 0) {
        throw new ConfigurationError("Heading rule label must not be blank", [
          { field: `rules.${i}.label`, message: "Required" },
        ])
      }
      const flags = new Set([...pattern.flags, "g", "i"])
      const compiled = new RegExp(pattern.source, [...flags].join(""))
      if (new RegExp(`^(?:${pattern.source})$`, "i").test("")) {
        throw new ConfigurationError("Heading rule matches empty text", [
          { field: `rules.${i}.pattern`, message: `/${pattern.source}/ matches the empty string` },
        ])
      }
      return { pattern: compiled, label }
    })
  )
}

const DEFAULT_RULES = compileHeadingRules(BIO_HEADING_RULES)

// ============================================================================
// Location
// ============================================================================

/**
 * Raw heading match before ordering and absorption.
 */
interface RawHeadingMatch {
  heading: string
  label: string
  offset: number
  /** Position of the rule that matched; earlier rules win exact ties */
  ruleIndex: number
}

function collectHeadingMatches(
  text: NormalizedText,
  rules: readonly HeadingRule[]
): RawHeadingMatch[] {
  const matches: RawHeadingMatch[] = []

  rules.forEach(({ pattern, label }, ruleIndex) => {
    // matchAll clones the pattern, so shared rules keep no lastIndex state
    for (const match of text.matchAll(pattern)) {
      if (match[0].length === 0) continue
      matches.push({ heading: match[0], label, offset: match.index ?? 0, ruleIndex })
    }
  })

  return matches.sort(
    (a, b) =>
      a.offset - b.offset ||
      b.heading.length - a.heading.length ||
      a.ruleIndex - b.ruleIndex
  )
}

/**
 * Finds biography-bearing sections in normalized text.
 *
 * Every heading occurrence opens a section; repeated headings (amended
 * filings repeat "BOARD OF DIRECTORS") open one section each. Returns an
 * empty array when no heading matches; callers then scan the whole text.
 */
export function findBioSections(
  text: NormalizedText,
  rules: readonly HeadingRule[] = DEFAULT_RULES
): BioSection[] {
  const compiled = rules === DEFAULT_RULES ? DEFAULT_RULES : compileHeadingRules(rules)

  // A match that starts inside an accepted heading is part of that heading:
  // "DIRECTORS AND EXECUTIVE OFFICERS" also contains "EXECUTIVE OFFICERS".
  const headings: RawHeadingMatch[] = []
  let acceptedEnd = 0
  for (const match of collectHeadingMatches(text, compiled)) {
    if (match.offset < acceptedEnd) continue
    headings.push(match)
    acceptedEnd = match.offset + match.heading.length
  }

  return headings.map((heading, i) => {
    const startOffset = heading.offset
    const endOffset = i + 1 < headings.length ? headings[i + 1].offset : text.length
    return Object.freeze({
      label: heading.label,
      heading: heading.heading,
      startOffset,
      endOffset,
      text: text.slice(startOffset, endOffset),
    })
  })
}

/**
 * Normalizes filing markup and locates its biography sections.
 *
 * Unparseable markup is logged and yields no sections.
 */
export function locateBioSections(
  markup: string,
  rules: readonly HeadingRule[] = DEFAULT_RULES
): BioSection[] {
  const normalized = normalizeMarkup(markup)
  if (!normalized.ok) {
    logger.warn("Skipping section location for unparseable markup", {
      reason: normalized.error.message,
    })
    return []
  }
  return findBioSections(normalized.value, rules)
}
