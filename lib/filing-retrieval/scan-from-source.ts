/**
 * @fileoverview Fetch-then-scan for a single filing
 * @module lib/filing-retrieval/scan-from-source
 */

import { toAppError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import { tryCatch } from "@/lib/result"
import type { AffiliationScanner } from "@/lib/affiliation-search/affiliation-scanner"
import type { AffiliationMatch, FilingMetadata } from "@/lib/affiliation-search/types"
import type { FilingSource } from "./types"

/**
 * Fetches a filing and scans it.
 *
 * Any retrieval failure means "no text for this filing": it is logged and
 * yields no matches. Retrying is the source's concern.
 */
export async function scanFilingFromSource(
  source: FilingSource,
  accessionNumber: string,
  scanner: AffiliationScanner,
  filingMetadata?: FilingMetadata
): Promise<AffiliationMatch[]> {
  const fetched = await tryCatch(() => source.fetchFiling(accessionNumber))

  if (!fetched.ok) {
    const error = toAppError(fetched.error)
    logger.warn("Filing retrieval failed", {
      accessionNumber,
      code: error.code,
      recoverable: error.recoverable,
      reason: error.message,
    })
    return []
  }

  return scanner.searchFiling(fetched.value, filingMetadata)
}
