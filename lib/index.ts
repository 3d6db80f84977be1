/**
 * @fileoverview Biography affiliation scanner
 *
 * Finds director and officer biographies in regulatory filings and flags
 * mentions of a target organization, classified by relationship.
 *
 * @example
 * ```ts
 * import { scanFiling, deduplicate, toExportRecord } from "bio-affiliation-scanner"
 *
 * const matches = deduplicate(scanFiling(markup, { ticker: "ACME", filing_type: "DEF 14A" }))
 * const rows = matches.map(toExportRecord)
 * ```
 *
 * @module lib
 */

import { AffiliationScanner } from "./affiliation-search/affiliation-scanner"
import type { AffiliationMatch, FilingMetadata } from "./affiliation-search/types"

export * from "./filing-extraction"
export * from "./affiliation-search"
export * from "./filing-retrieval"
export { loadScannerConfigFromEnv } from "./config"
export { initObservability } from "./instrument"
export {
  AppError,
  ParseError,
  ConfigurationError,
  NotFoundError,
  TransientError,
  InternalError,
  isAppError,
  toAppError,
  type ErrorCode,
  type ErrorDetail,
} from "./errors"
export type { Result } from "./result"

const DEFAULT_SCANNER = new AffiliationScanner()

/**
 * Scans arbitrary text for the given organization patterns.
 *
 * @throws ConfigurationError - empty or invalid pattern list
 */
export function scanText(
  text: string,
  orgPatterns: readonly (string | RegExp)[],
  personName?: string
): AffiliationMatch[] {
  const scanner = new AffiliationScanner({
    config: { organizationPatterns: [...orgPatterns] },
  })
  return scanner.findAffiliationsInText(text, personName)
}

/**
 * Scans filing markup with the default configuration.
 */
export function scanFiling(markup: string, filingMetadata?: FilingMetadata): AffiliationMatch[] {
  return DEFAULT_SCANNER.searchFiling(markup, filingMetadata)
}
