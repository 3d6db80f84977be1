/**
 * @fileoverview Filing retrieval boundary
 *
 * Retrieval (rate limiting, caching, contact headers, retries) is owned by
 * the embedding application. The scanner only sees this interface.
 *
 * @module lib/filing-retrieval/types
 */

export interface FilingSource {
  /**
   * Raw markup for one filing.
   *
   * Rejects with NotFoundError when the archive has no such filing and
   * with TransientError when the archive could not be reached.
   */
  fetchFiling(accessionNumber: string): Promise<string>
}
