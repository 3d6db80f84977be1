/**
 * @fileoverview Person name heuristics and the name recognizer capability
 *
 * Filings are full of capitalized phrases that are not people: headings,
 * company names, exchanges, agencies. Everything that decides "is this a
 * person?" lives here so the segmenter and the scanner agree on it.
 *
 * Two recognizers implement the same capability:
 * - PatternNameRecognizer: capitalized token runs, always available
 * - NerNameRecognizer: wraps an NER backend supplied by the caller
 *
 * The recognizer is chosen once, at construction, by selectNameRecognizer().
 *
 * @module lib/filing-extraction/person-names
 */

import type { NerBackend, PersonNameRecognizer, PersonNameSpan } from "./types"

// ============================================================================
// Name Token Patterns
// ============================================================================

/**
 * One capitalized name token: "John", "Smith-Jones", "O'Brien", or an
 * initial "J.". Only initials keep a trailing period, so a name that ends
 * a sentence does not take the full stop with it.
 */
const NAME_TOKEN = String.raw`[A-Z](?:\.|[A-Za-z'’]*(?:[.-][A-Za-z'’]+)*)`

/**
 * Two to four name tokens on one line. Tokens are separated by spaces or
 * tabs only, so a heading line never fuses with the name below it.
 */
export const PERSON_NAME_SOURCE = String.raw`${NAME_TOKEN}(?:[ \t]+${NAME_TOKEN}){1,3}`

const PERSON_NAME_RE = new RegExp(`(?<![A-Za-z'’.-])${PERSON_NAME_SOURCE}(?![A-Za-z'’])`, "g")

/** Leading honorifics that precede, but are not part of, a name */
export const HONORIFIC_PREFIX_RE = /^(?:(?:Mr|Ms|Mrs|Dr)\.?[ \t]+)?/

// ============================================================================
// Word Lists
// ============================================================================

/**
 * Capitalized words that start sentences or headings in biography sections.
 * A name containing any of them is rejected; a run that starts with them is
 * trimmed from the left.
 */
const NON_NAME_WORDS: ReadonlySet<string> = new Set([
  "a", "an", "and", "the", "this", "that", "these", "those", "he", "she",
  "his", "her", "they", "their", "we", "our", "it", "its", "in", "on", "at",
  "for", "from", "during", "since", "prior", "before", "after", "as", "of",
  "with", "by", "to", "mr", "ms", "mrs", "dr", "item", "part", "proposal",
  "section", "table", "board", "directors", "director", "officers",
  "officer", "executive", "executives", "nominees", "nominee", "continuing",
  "election", "management", "biographical", "information", "biographies",
  "committee", "chairman", "chairwoman", "president", "chief", "vice",
  "age", "annual", "report", "proxy", "statement", "name", "position",
  "positions", "principal", "occupation", "experience", "background",
  "summary", "compensation", "independent", "audit",
])

/** Single words that mark an organization rather than a person */
const ORGANIZATION_WORDS: ReadonlySet<string> = new Set([
  "inc", "llc", "lp", "llp", "ltd", "limited", "incorporated",
  "corporation", "corp", "company", "co", "securities", "commission",
  "exchange", "nasdaq", "nyse", "federal", "department", "university",
  "college", "school", "institute", "bank", "holdings", "group",
])

/** Multi-word organization phrases, matched as substrings */
const ORGANIZATION_PHRASES = [
  "stock exchange",
  "new york",
  "united states",
  "internal revenue",
  "financial accounting",
  "table of contents",
  "form 10",
]

function bareWord(token: string): string {
  return token.toLowerCase().replace(/^[^a-z]+|[^a-z]+$/g, "")
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Checks whether a capitalized phrase is likely a person, not an
 * organization or a heading.
 */
export function isLikelyPersonName(name: string): boolean {
  const tokens = name.trim().split(/\s+/)
  if (tokens.length < 2) return false

  // All caps reads as a heading; runs of capitals are acronyms (NYSE, SEC)
  if (name === name.toUpperCase()) return false
  if (/[A-Z]{3,}/.test(name)) return false

  const lower = name.toLowerCase()
  if (ORGANIZATION_PHRASES.some((phrase) => lower.includes(phrase))) return false

  return tokens.every((token) => {
    // Initials ("A.") are not the article "a"
    if (/^[A-Z]\.$/.test(token)) return true
    const word = bareWord(token)
    return !ORGANIZATION_WORDS.has(word) && !NON_NAME_WORDS.has(word)
  })
}

/**
 * Drops leading heading/sentence words from a captured token run
 * ("Of Directors John Smith" → "John Smith") and validates the rest.
 *
 * @returns the name and its offset within `raw`, or null when no person
 *   name remains
 */
export function trimToPersonName(raw: string): { name: string; offset: number } | null {
  const tokens = [...raw.matchAll(/\S+/g)]
  let first = 0
  while (tokens.length - first > 2 && NON_NAME_WORDS.has(bareWord(tokens[first][0]))) {
    first++
  }

  const offset = tokens[first]?.index ?? 0
  const name = raw.slice(offset).trim()
  return isLikelyPersonName(name) ? { name, offset } : null
}

// ============================================================================
// Recognizers
// ============================================================================

/**
 * Capitalized-token recognizer. Deterministic and always available.
 */
export class PatternNameRecognizer implements PersonNameRecognizer {
  readonly source = "pattern" as const

  isAvailable(): boolean {
    return true
  }

  extractPersonNames(text: string): PersonNameSpan[] {
    const spans: PersonNameSpan[] = []
    for (const match of text.matchAll(PERSON_NAME_RE)) {
      const trimmed = trimToPersonName(match[0])
      if (!trimmed) continue

      const startOffset = (match.index ?? 0) + trimmed.offset
      spans.push({
        name: trimmed.name,
        startOffset,
        endOffset: startOffset + trimmed.name.length,
      })
    }
    return spans
  }
}

/**
 * Recognizer backed by a caller-supplied NER model. Spans that fail the
 * person-name check (company names tagged PERSON, single tokens) are dropped.
 */
export class NerNameRecognizer implements PersonNameRecognizer {
  readonly source = "ner" as const

  constructor(private readonly backend: NerBackend) {}

  isAvailable(): boolean {
    return this.backend.isAvailable()
  }

  extractPersonNames(text: string): PersonNameSpan[] {
    return this.backend
      .extractPersonNames(text)
      .filter((span) => isLikelyPersonName(span.name))
      .sort((a, b) => a.startOffset - b.startOffset)
  }
}

/**
 * Picks the recognizer for a pipeline run. The backend is probed once;
 * an unavailable or absent backend yields the pattern recognizer.
 */
export function selectNameRecognizer(backend?: NerBackend): PersonNameRecognizer {
  if (backend?.isAvailable()) {
    return new NerNameRecognizer(backend)
  }
  return new PatternNameRecognizer()
}
