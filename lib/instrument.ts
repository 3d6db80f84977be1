import * as Sentry from "@sentry/node"

/**
 * Initializes Sentry for processes that embed the scanner (batch jobs,
 * workers). Call once, before the first filing is scanned.
 *
 * Returns false and leaves Sentry untouched when `SENTRY_DSN` is unset.
 */
export function initObservability(
  env: Readonly<Record<string, string | undefined>> = process.env
): boolean {
  const dsn = env.SENTRY_DSN
  if (!dsn) return false

  Sentry.init({
    dsn,

    // Enable structured logging
    enableLogs: true,

    environment: env.NODE_ENV ?? "development",

    // Production: 10%, Development: 100%
    tracesSampleRate: env.NODE_ENV === "production" ? 0.1 : 1.0,

    debug: false,
  })

  return true
}
