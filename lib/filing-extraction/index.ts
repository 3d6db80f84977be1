/**
 * @fileoverview Filing extraction module
 *
 * Markup normalization, biography section location and per-person
 * segmentation. Everything here is synchronous and holds no state between
 * calls.
 *
 * @module lib/filing-extraction
 */

// Types
export type {
  NormalizedText,
  Table,
  HeadingRule,
  BioSection,
  PersonBio,
  SegmentationTier,
  SegmentationTierName,
  PersonNameSpan,
  NerBackend,
  PersonNameRecognizer,
} from "./types"
export { UNKNOWN } from "./types"

// Normalization
export {
  normalizeMarkup,
  toPlainText,
  extractTables,
  detectMarkupKind,
  normalizeWhitespace,
} from "./text-normalizer"

// Section location
export {
  BASE_HEADING_RULES,
  BIO_HEADING_RULES,
  compileHeadingRules,
  findBioSections,
  locateBioSections,
} from "./section-locator"

// Person names
export {
  PatternNameRecognizer,
  NerNameRecognizer,
  selectNameRecognizer,
  isLikelyPersonName,
} from "./person-names"

// Segmentation
export {
  BIO_TEXT_CAP,
  DEFAULT_TITLE_KEYWORDS,
  createBiographySegmenter,
  segmentBios,
  type BiographySegmenter,
  type BiographySegmenterOptions,
} from "./biography-segmenter"
