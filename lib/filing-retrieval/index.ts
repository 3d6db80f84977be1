/**
 * @fileoverview Filing retrieval module
 * @module lib/filing-retrieval
 */

export type { FilingSource } from "./types"
export { scanFilingFromSource } from "./scan-from-source"
