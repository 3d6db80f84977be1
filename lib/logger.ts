import * as Sentry from "@sentry/node"

/**
 * Structured logger using Sentry.logger
 *
 * Logs are dropped until `initObservability()` has run with a DSN, so the
 * pipeline can be used as a plain library without any Sentry setup.
 *
 * @example
 * ```ts
 * import { logger } from "@/lib/logger"
 *
 * logger.info("Filing scanned", { sections: 3, matches: 2 })
 * logger.warn("Skipping unparseable filing", { accession: "0000320193-24-000010" })
 * ```
 */
export const logger = Sentry.logger
