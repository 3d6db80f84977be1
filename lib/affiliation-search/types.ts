/**
 * @fileoverview Affiliation search type definitions
 * @module lib/affiliation-search/types
 */

import type { BioSection, NormalizedText, PersonBio } from "@/lib/filing-extraction/types"
import type { ParseError } from "@/lib/errors"

// ============================================================================
// Classification
// ============================================================================

export const AFFILIATION_TYPES = [
  "degree",
  "position",
  "education",
  "employment",
  "mention",
] as const

export type AffiliationType = (typeof AFFILIATION_TYPES)[number]

export type Confidence = "high" | "medium" | "low"

/** Confidence is a fixed function of the affiliation type */
export const CONFIDENCE_BY_TYPE: Readonly<Record<AffiliationType, Confidence>> = Object.freeze({
  degree: "high",
  position: "high",
  education: "medium",
  employment: "medium",
  mention: "low",
})

/** Ordinal used when duplicates compete */
export const CONFIDENCE_RANK: Readonly<Record<Confidence, number>> = Object.freeze({
  high: 3,
  medium: 2,
  low: 1,
})

/**
 * Maps a context window to an affiliation type. Must be pure; it may be
 * shared across concurrent scans.
 */
export type AffiliationClassifier = (context: string) => AffiliationType

// ============================================================================
// Matches
// ============================================================================

/** Arbitrary filing metadata (filing_type, filing_date, company_name, ticker, ...) */
export type FilingMetadata = Readonly<Record<string, string>>

export interface AffiliationMatch {
  /** Segmented person name, or "Unknown" */
  personName: string
  affiliationType: AffiliationType
  /** Source text matched by an organization pattern */
  organization: string
  /** Window around the occurrence, clamped to the text */
  context: string
  confidence: Confidence
  filingInfo?: FilingMetadata
  /** First degree token in the context, e.g. "M.B.A." */
  degree?: string
  /** First year 1950-2039 in the context */
  degreeYear?: number
  /** First position title in the context, capitalized */
  position?: string
}

/**
 * Everything a filing scan produced, including the parse failure that a
 * plain searchFiling() call only logs.
 */
export interface FilingAnalysis {
  text: NormalizedText
  sections: BioSection[]
  bios: PersonBio[]
  matches: AffiliationMatch[]
  /** True when no heading matched and the whole text was scanned */
  usedFallback: boolean
  parseError?: ParseError
}
