/**
 * @fileoverview Affiliation search module
 * @module lib/affiliation-search
 */

// Types
export type {
  AffiliationType,
  Confidence,
  AffiliationClassifier,
  AffiliationMatch,
  FilingMetadata,
  FilingAnalysis,
} from "./types"
export { AFFILIATION_TYPES, CONFIDENCE_BY_TYPE } from "./types"

// Configuration
export {
  DEFAULT_ORGANIZATION_PATTERNS,
  DEFAULT_CONTEXT_WINDOW,
  DEFAULT_KEYWORDS,
  DEFAULT_SCANNER_CONFIG,
  ScannerConfigSchema,
  parseScannerConfig,
  type ScannerConfig,
  type ScannerConfigInput,
  type KeywordLists,
} from "./scanner-config"

// Scanning
export { createPriorityClassifier, createDetailExtractor } from "./classifier"
export {
  AffiliationScanner,
  compileOrganizationPattern,
  type AffiliationScannerOptions,
} from "./affiliation-scanner"
export { deduplicate } from "./deduplicate"

// Export projection
export {
  AFFILIATION_EXPORT_COLUMNS,
  EXPORT_CONTEXT_LIMIT,
  toExportRecord,
  type AffiliationExportColumn,
  type AffiliationExportRecord,
} from "./export-record"
