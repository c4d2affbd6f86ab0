/**
 * Custom error classes for structured error handling.
 *
 * Usage:
 *   throw new MalformedDocumentError("Paper text is empty")
 *   throw new ValidationError("Invalid options", [{ field: "insertionDepth", message: "Too big" }])
 *
 * In scripts:
 *   main().catch((error: unknown) => {
 *     console.error("❌ Failed:", toAppError(error).toJSON())
 *     process.exit(1)
 *   })
 *
 * Expected heuristic outcomes (a section that cannot be found, a deletion
 * that would leave a degenerate document) are NOT errors. They are
 * returned as values; see lib/text-mutation.
 */

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "INTERNAL_ERROR"
  // Domain-specific error codes for the mutation engine and dataset tooling
  | "MALFORMED_DOCUMENT"
  | "DATASET_LOAD_FAILED"

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
  public readonly isOperational = true

  constructor(
    public readonly code: ErrorCode,
    message: string,
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
 * Validation Error - Input validation failed
 */
export class ValidationError extends AppError {
  constructor(message = "Validation failed", details?: ErrorDetail[]) {
    super("VALIDATION_ERROR", message, details)
  }

  static fromZodError(error: { issues: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const details = error.issues.map((e) => ({
      field: e.path.join("."),
      message: e.message,
    }))
    return new ValidationError("Validation failed", details)
  }
}

/**
 * Internal Error - Unexpected error
 */
export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred") {
    super("INTERNAL_ERROR", message)
  }
}

/**
 * Malformed Document - text is empty or not text at all.
 * The engine refuses to run heuristics on it.
 */
export class MalformedDocumentError extends AppError {
  constructor(message = "Document text is empty or not decodable as text") {
    super("MALFORMED_DOCUMENT", message)
  }
}

/**
 * Dataset Load Failed - a dataset file exists but could not be read
 */
export class DatasetLoadError extends AppError {
  constructor(message = "Failed to load dataset", details?: ErrorDetail[]) {
    super("DATASET_LOAD_FAILED", message, details)
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
