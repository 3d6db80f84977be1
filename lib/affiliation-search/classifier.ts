/**
 * @fileoverview Context classification
 *
 * Classification is priority-ordered, not vote-counted: the first rule
 * whose keywords appear in the context decides the type.
 *
 * | Priority | Keywords           | Type       | Confidence |
 * |----------|--------------------|------------|------------|
 * | 1        | degree tokens      | degree     | high       |
 * | 2        | role keywords      | position   | high       |
 * | 3        | education verbs    | education  | medium     |
 * | 4        | employment verbs   | employment | medium     |
 * | -        | (none)             | mention    | low        |
 *
 * Context windows are not sentence-bounded, so a degree held by one person
 * can decide the type of a mention attributed to another person in the
 * same window.
 *
 * @module lib/affiliation-search/classifier
 */

import { ConfigurationError } from "@/lib/errors"
import type { KeywordLists } from "./scanner-config"
import type { AffiliationClassifier, AffiliationMatch, AffiliationType } from "./types"

// ============================================================================
// Literal Patterns
// ============================================================================

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/**
 * Regex source for a literal phrase: any whitespace between words, either
 * apostrophe style.
 */
export function literalSource(value: string): string {
  return value
    .trim()
    .split(/\s+/)
    .map((word) => escapeRegExp(word).replace(/['’]/g, "['’]"))
    .join(String.raw`\s+`)
}

/**
 * Alternation of literal phrases, longest first so "M.B.A." is tried
 * before "M.A.".
 *
 * @throws ConfigurationError - for an empty list, which would match anywhere
 */
function alternation(values: readonly string[]): string {
  if (values.length === 0) {
    throw new ConfigurationError("At least one keyword is required", [
      { field: "keywords", message: "Must contain at least 1 element" },
    ])
  }
  return [...values]
    .sort((a, b) => b.length - a.length)
    .map(literalSource)
    .join("|")
}

/**
 * Degree tokens end in periods, where `\b` does not hold, so both edges
 * are guarded explicitly. A leading period guard keeps "B.A." from
 * matching inside "M.B.A.".
 */
export function degreePattern(tokens: readonly string[]): RegExp {
  return new RegExp(`(?<![A-Za-z0-9.])(?:${alternation(tokens)})(?![A-Za-z0-9])`, "i")
}

/**
 * Keywords match as word prefixes, so "trustee" finds "Trustees" and
 * "chair" finds "Chairman".
 */
export function keywordPattern(keywords: readonly string[]): RegExp {
  return new RegExp(String.raw`\b(?:${alternation(keywords)})`, "i")
}

// ============================================================================
// Priority Classifier
// ============================================================================

interface ClassificationRule {
  type: AffiliationType
  pattern: RegExp
}

/**
 * Builds the default degree > position > education > employment > mention
 * classifier. Patterns are compiled once; the returned function is pure.
 */
export function createPriorityClassifier(keywords: KeywordLists): AffiliationClassifier {
  const rules: readonly ClassificationRule[] = [
    { type: "degree", pattern: degreePattern(keywords.degree) },
    { type: "position", pattern: keywordPattern(keywords.role) },
    { type: "education", pattern: keywordPattern(keywords.education) },
    { type: "employment", pattern: keywordPattern(keywords.employment) },
  ]

  return (context) => {
    for (const { type, pattern } of rules) {
      if (pattern.test(context)) return type
    }
    return "mention"
  }
}

// ============================================================================
// Detail Extraction
// ============================================================================

const YEAR_RE = /\b(?:19[5-9]\d|20[0-3]\d)\b/

const POSITION_TITLE_RE = /\b(?:professor|dean|chair|director|trustee|fellow|lecturer|instructor)\b/i

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()
}

export type AffiliationDetails = Pick<AffiliationMatch, "degree" | "degreeYear" | "position">

/**
 * Builds the extractor for degree, year and position details. Details are
 * informational and never feed back into classification.
 */
export function createDetailExtractor(
  degreeTokens: readonly string[]
): (context: string) => AffiliationDetails {
  const degreeRe = degreePattern(degreeTokens)

  return (context) => {
    const details: AffiliationDetails = {}

    const degree = degreeRe.exec(context)?.[0]
    if (degree) details.degree = degree

    const year = YEAR_RE.exec(context)?.[0]
    if (year) details.degreeYear = Number(year)

    const position = POSITION_TITLE_RE.exec(context)?.[0]
    if (position) details.position = capitalize(position)

    return details
  }
}
