/**
 * @fileoverview Filing extraction type definitions
 * @module lib/filing-extraction/types
 */

/**
 * Plain text derived from filing markup: no tags, no script/style content,
 * horizontal whitespace collapsed, one `\n` per paragraph break.
 *
 * Offsets into a NormalizedText are local to that string; they do not map
 * back to the source markup.
 */
export type NormalizedText = string

/** Rows of cell text, padded to the widest row */
export type Table = string[][]

// ============================================================================
// Section Location Types
// ============================================================================

export interface HeadingRule {
  /** Heading text pattern; matched case-insensitively over the whole text */
  pattern: RegExp
  /** Category name given to every section this rule opens */
  label: string
}

export interface BioSection {
  /** Category name, e.g. "Directors & Officers" */
  label: string
  /** Heading text as it appears in the normalized text */
  heading: string
  /** Offset of the heading in the normalized text */
  startOffset: number
  /** Offset of the next heading, or the text length */
  endOffset: number
  /** normalized.slice(startOffset, endOffset) */
  text: string
}

// ============================================================================
// Biography Types
// ============================================================================

export const UNKNOWN = "Unknown"

export interface PersonBio {
  name: string
  /** Age digits as written, or "Unknown" */
  age: string
  /** Biography text, capped at BIO_TEXT_CAP characters */
  bioText: string
}

export type SegmentationTierName = "name-age" | "name-title" | "paragraph"

export interface SegmentationTier {
  name: SegmentationTierName
  segment: (text: string) => PersonBio[]
}

// ============================================================================
// Person Name Recognition
// ============================================================================

export interface PersonNameSpan {
  name: string
  startOffset: number
  endOffset: number
}

/**
 * Optional named-entity recognition backend supplied by the embedding
 * application. Loaded once per process and shared read-only.
 */
export interface NerBackend {
  isAvailable(): boolean
  extractPersonNames(text: string): PersonNameSpan[]
}

export interface PersonNameRecognizer {
  readonly source: "pattern" | "ner"
  isAvailable(): boolean
  extractPersonNames(text: string): PersonNameSpan[]
}
