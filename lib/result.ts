/**
 * Result type for composable error handling.
 *
 * Represents either success (Ok) or failure (Err).
 * Lets recoverable failures (unparseable markup, failed retrieval) cross
 * module boundaries as values instead of exceptions.
 *
 * @example
 * ```typescript
 * const normalized = normalizeMarkup(markup)
 *
 * if (!normalized.ok) {
 *   logger.warn("Skipping filing", { reason: normalized.error.message })
 *   return []
 * }
 *
 * return findBioSections(normalized.value)
 * ```
 */

/**
 * Result type - represents either success or failure.
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

/**
 * Create a success result.
 */
export const Ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
})

/**
 * Create a failure result.
 */
export const Err = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
})

/**
 * Unwrap the value or throw the error.
 * Use at boundaries where throwing is appropriate.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value
  throw result.error
}

/**
 * Wrap an async operation that might throw.
 */
export async function tryCatch<T>(
  fn: () => Promise<T>
): Promise<Result<T, Error>> {
  try {
    return Ok(await fn())
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)))
  }
}

/**
 * Wrap a synchronous operation with a custom error mapper.
 */
export function trySync<T, E>(
  fn: () => T,
  mapError: (e: unknown) => E
): Result<T, E> {
  try {
    return Ok(fn())
  } catch (e) {
    return Err(mapError(e))
  }
}
