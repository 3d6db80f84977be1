/**
 * Custom error classes for structured error handling.
 *
 * Usage:
 *   throw new ParseError("Markup contains binary content")
 *   throw new ConfigurationError("Invalid scanner config", [{ field: "contextWindow", message: "Must be >= 0" }])
 *   throw new TransientError() // Uses default message
 *
 * At batch boundaries:
 *   catch (error) {
 *     const appError = toAppError(error)
 *     if (appError.recoverable) continue
 *     throw appError
 *   }
 */

export type ErrorCode =
  | "PARSE_ERROR"
  | "CONFIGURATION_ERROR"
  | "NOT_FOUND"
  | "TRANSIENT"
  | "INTERNAL_ERROR"

export interface ErrorDetail {
  field?: string
  message: string
  code?: string
}

export interface SerializedError {
  code: ErrorCode
  message: string
  details?: ErrorDetail[]
}

/**
 * Base application error class.
 * All custom errors extend this for consistent handling.
 */
export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly recoverable: boolean = false,
    public readonly details?: ErrorDetail[]
  ) {
    super(message)
    this.name = this.constructor.name
    Object.setPrototypeOf(this, new.target.prototype)
    Error.captureStackTrace(this, this.constructor)
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    }
  }
}

/**
 * Markup could not be parsed by the HTML or XML backend.
 * Recoverable: the document is skipped and treated as having no text.
 */
export class ParseError extends AppError {
  constructor(message = "Document markup could not be parsed", details?: ErrorDetail[]) {
    super("PARSE_ERROR", message, true, details)
  }
}

/**
 * Empty or invalid pattern/keyword configuration supplied by the caller.
 * Fatal to the call.
 */
export class ConfigurationError extends AppError {
  constructor(message = "Invalid configuration", details?: ErrorDetail[]) {
    super("CONFIGURATION_ERROR", message, false, details)
  }

  static fromZodError(error: {
    issues: ReadonlyArray<{ path: ReadonlyArray<PropertyKey>; message: string }>
  }): ConfigurationError {
    const details = error.issues.map((e) => ({
      field: e.path.map(String).join("."),
      message: e.message,
    }))
    return new ConfigurationError("Invalid configuration", details)
  }
}

/**
 * Filing (or the entity that owns it) doesn't exist in the archive.
 */
export class NotFoundError extends AppError {
  constructor(message = "Filing not found") {
    super("NOT_FOUND", message, true)
  }
}

/**
 * Retrieval failed for a reason that may clear up on its own
 * (rate limiting, timeouts, 5xx responses).
 */
export class TransientError extends AppError {
  constructor(
    message = "Filing temporarily unavailable",
    public readonly retryAfter?: number
  ) {
    super("TRANSIENT", message, true)
  }
}

/**
 * Unexpected error
 */
export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred") {
    super("INTERNAL_ERROR", message, false)
  }
}

/**
 * Type guard to check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

/**
 * Convert any error to an AppError for consistent handling.
 * Preserves AppErrors, wraps others in InternalError.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error
  }

  if (error instanceof Error) {
    return new InternalError(error.message)
  }

  return new InternalError("An unexpected error occurred")
}
