/**
 * @fileoverview Biography segmentation
 *
 * Splits one biography-bearing section into per-person records. Filers
 * format biographies in three recognizable ways, tried in order:
 *
 * 1. **name-age:** "John Smith, age 45, has served..." (proxy statements)
 * 2. **name-title:** "Jane Doe, Chief Financial Officer, joined..." (10-K Item 10)
 * 3. **paragraph:** one paragraph per person, name first (S-1 Management)
 *
 * The first tier that yields at least one record wins; tiers are never
 * merged, so a "Name, age" record is never also counted as "Name, Title".
 *
 * @module lib/filing-extraction/biography-segmenter
 */

import { z } from "zod"
import { ConfigurationError } from "@/lib/errors"
import {
  HONORIFIC_PREFIX_RE,
  PERSON_NAME_SOURCE,
  PatternNameRecognizer,
  trimToPersonName,
} from "./person-names"
import {
  UNKNOWN,
  type PersonBio,
  type PersonNameRecognizer,
  type SegmentationTier,
  type SegmentationTierName,
} from "./types"

// ============================================================================
// Defaults
// ============================================================================

/** Bounds downstream context-window work per person */
export const BIO_TEXT_CAP = 2000

/** Role words that may follow "Name," to open a biography */
export const DEFAULT_TITLE_KEYWORDS: readonly string[] = Object.freeze([
  "Director",
  "Officer",
  "President",
  "CEO",
  "CFO",
  "COO",
  "Chairman",
  "Chairwoman",
  "Chair",
  "Chief",
  "Vice",
  "Trustee",
  "Founder",
  "Secretary",
  "Treasurer",
  "Partner",
])

/** Prefix of a paragraph searched for its leading name */
const PARAGRAPH_HEAD_LENGTH = 120

export interface BiographySegmenterOptions {
  /** Role words for the name-title tier */
  titleKeywords?: readonly string[]
  /** Leading-name detection for the paragraph tier */
  nameRecognizer?: PersonNameRecognizer
  /** Maximum bioText length */
  bioTextCap?: number
}

const SegmenterOptionsSchema = z.object({
  titleKeywords: z.array(z.string().trim().min(1)).min(1),
  bioTextCap: z.number().int().positive(),
})

// ============================================================================
// Shared Helpers
// ============================================================================

interface BioStart {
  name: string
  age: string
  /** Offset of the name in the section text */
  start: number
}

function createBio(name: string, age: string, bioText: string, cap: number): PersonBio {
  return Object.freeze({ name, age, bioText: bioText.trim().slice(0, cap) })
}

/**
 * Each record runs from its name to the next record's name, or to the end
 * of the section.
 */
function splitAtStarts(text: string, starts: BioStart[], cap: number): PersonBio[] {
  return starts.map((start, i) => {
    const end = i + 1 < starts.length ? starts[i + 1].start : text.length
    return createBio(start.name, start.age, text.slice(start.start, end), cap)
  })
}

/**
 * Collects record starts from a name-capturing pattern. Captures that are
 * not person names are dropped and do not split records.
 */
function collectStarts(
  text: string,
  pattern: RegExp,
  accept: (match: RegExpMatchArray) => string | null
): BioStart[] {
  const starts: BioStart[] = []
  for (const match of text.matchAll(pattern)) {
    const age = accept(match)
    if (age === null) continue

    const trimmed = trimToPersonName(match[1])
    if (!trimmed) continue

    starts.push({ name: trimmed.name, age, start: (match.index ?? 0) + trimmed.offset })
  }
  return starts
}

// ============================================================================
// Tier 1: Name + Age
// ============================================================================

// "John Smith, age 45" or "John Smith (age 45)"
const NAME_AGE_RE = new RegExp(
  String.raw`(?<![A-Za-z'’.-])(${PERSON_NAME_SOURCE})(?:[ \t]*,[ \t]*|[ \t]+\([ \t]*)[Aa]ge[ \t]*:?[ \t]*(\d{1,3})\b`,
  "g"
)

function nameAgeTier(cap: number): SegmentationTier {
  return {
    name: "name-age",
    segment: (text) =>
      splitAtStarts(text, collectStarts(text, NAME_AGE_RE, (m) => m[2]), cap),
  }
}

// ============================================================================
// Tier 2: Name + Title
// ============================================================================

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/**
 * "CEO" → "[Cc][Ee][Oo]". Keywords match in any case while the name part
 * of the pattern stays case-sensitive.
 */
function anyCase(value: string): string {
  return [...value]
    .map((ch) => {
      const lower = ch.toLowerCase()
      const upper = ch.toUpperCase()
      return lower === upper ? escapeRegExp(ch) : `[${lower}${upper}]`
    })
    .join("")
}

function nameTitleTier(titleKeywords: readonly string[], cap: number): SegmentationTier {
  const alternation = [...titleKeywords]
    .sort((a, b) => b.length - a.length)
    .map(anyCase)
    .join("|")

  // The keyword sits in a lookahead so a rejected candidate consumes only
  // "Name," and cannot hide a record that starts inside the keyword.
  const pattern = new RegExp(
    String.raw`(?<![A-Za-z'’.-])(${PERSON_NAME_SOURCE})[ \t]*,[ \t]*(?=(?:(?:[Tt]he|[Oo]ur|[Aa]n?)[ \t]+)?(?:${alternation})(?![A-Za-z]))`,
    "g"
  )

  return {
    name: "name-title",
    segment: (text) => splitAtStarts(text, collectStarts(text, pattern, () => UNKNOWN), cap),
  }
}

// ============================================================================
// Tier 3: Paragraphs
// ============================================================================

/**
 * Splits on blank lines when the text has them; normalized text has one
 * newline per paragraph instead.
 */
export function splitParagraphs(text: string): string[] {
  const separator = /\n[^\S\n]*\n/.test(text) ? /\n\s*\n/ : /\n/
  return text
    .split(separator)
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
}

function leadingName(paragraph: string, recognizer: PersonNameRecognizer) {
  const leadOffset = HONORIFIC_PREFIX_RE.exec(paragraph)?.[0].length ?? 0
  return recognizer
    .extractPersonNames(paragraph.slice(0, PARAGRAPH_HEAD_LENGTH))
    .find((span) => span.startOffset === leadOffset)
}

function paragraphTier(recognizer: PersonNameRecognizer, cap: number): SegmentationTier {
  return {
    name: "paragraph",
    segment: (text) => {
      const paragraphs = splitParagraphs(text)
      const bios: PersonBio[] = []

      for (let i = 0; i < paragraphs.length; i++) {
        const paragraph = paragraphs[i]
        const name = leadingName(paragraph, recognizer)
        if (!name) continue

        // A name on a line of its own heads the paragraph that follows
        const next = paragraphs[i + 1]
        const nameOnly = paragraph.slice(name.endOffset).replace(/[\s,.;:]+/g, "") === ""
        if (nameOnly && next !== undefined && !leadingName(next, recognizer)) {
          bios.push(createBio(name.name, UNKNOWN, `${paragraph}\n${next}`, cap))
          i++
          continue
        }

        bios.push(createBio(name.name, UNKNOWN, paragraph, cap))
      }

      return bios
    },
  }
}

// ============================================================================
// Segmenter
// ============================================================================

export interface BiographySegmenter {
  readonly tiers: readonly SegmentationTier[]
  segment(sectionText: string): PersonBio[]
  segmentWithTier(sectionText: string): { tier: SegmentationTierName | null; bios: PersonBio[] }
}

/**
 * Builds a segmenter from its options.
 *
 * @throws ConfigurationError - empty or blank title keywords, bad cap
 */
export function createBiographySegmenter(
  options: BiographySegmenterOptions = {}
): BiographySegmenter {
  const parsed = SegmenterOptionsSchema.safeParse({
    titleKeywords: options.titleKeywords ?? DEFAULT_TITLE_KEYWORDS,
    bioTextCap: options.bioTextCap ?? BIO_TEXT_CAP,
  })
  if (!parsed.success) {
    throw ConfigurationError.fromZodError(parsed.error)
  }

  const { titleKeywords, bioTextCap } = parsed.data
  const recognizer = options.nameRecognizer ?? new PatternNameRecognizer()

  const tiers: readonly SegmentationTier[] = Object.freeze([
    nameAgeTier(bioTextCap),
    nameTitleTier(titleKeywords, bioTextCap),
    paragraphTier(recognizer, bioTextCap),
  ])

  function segmentWithTier(sectionText: string) {
    for (const tier of tiers) {
      const bios = tier.segment(sectionText)
      if (bios.length > 0) return { tier: tier.name, bios }
    }
    return { tier: null, bios: [] }
  }

  return {
    tiers,
    segmentWithTier,
    segment: (sectionText) => segmentWithTier(sectionText).bios,
  }
}

const DEFAULT_SEGMENTER = createBiographySegmenter()

/**
 * Splits section text into per-person biographies.
 */
export function segmentBios(
  sectionText: string,
  options?: BiographySegmenterOptions
): PersonBio[] {
  const segmenter = options ? createBiographySegmenter(options) : DEFAULT_SEGMENTER
  return segmenter.segment(sectionText)
}
