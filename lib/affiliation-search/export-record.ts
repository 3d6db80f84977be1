/**
 * @fileoverview Flat export projection for tabular consumers
 * @module lib/affiliation-search/export-record
 */

import type { AffiliationMatch } from "./types"

export const EXPORT_CONTEXT_LIMIT = 500

export const AFFILIATION_EXPORT_COLUMNS = [
  "person_name",
  "affiliation_type",
  "organization",
  "context",
  "confidence",
  "filing_type",
  "filing_date",
  "company_name",
  "ticker",
] as const

export type AffiliationExportColumn = (typeof AFFILIATION_EXPORT_COLUMNS)[number]

export type AffiliationExportRecord = Readonly<Record<AffiliationExportColumn, string>>

/**
 * Projects a match and its filing metadata onto the export columns.
 * Missing metadata becomes an empty string.
 */
export function toExportRecord(match: AffiliationMatch): AffiliationExportRecord {
  const info = match.filingInfo ?? {}
  return Object.freeze({
    person_name: match.personName,
    affiliation_type: match.affiliationType,
    organization: match.organization,
    context: match.context.slice(0, EXPORT_CONTEXT_LIMIT),
    confidence: match.confidence,
    filing_type: info.filing_type ?? "",
    filing_date: info.filing_date ?? info.date ?? "",
    company_name: info.company_name ?? "",
    ticker: info.ticker ?? "",
  })
}
