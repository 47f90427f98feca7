/**
 * @fileoverview Application error hierarchy
 *
 * Every failure that reaches a caller, a job row or an HTTP response is an
 * `AppError` carrying a stable machine-readable `code` and the HTTP status it
 * maps to. Pipeline-specific errors (extraction, provider, rendering) live
 * alongside the generic request errors so the job runner and the API share
 * one vocabulary.
 *
 * @module lib/errors
 */

// ============================================================================
// Codes
// ============================================================================

export type ErrorCode =
  | "BAD_REQUEST"
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "CONFLICT"
  | "PAYLOAD_TOO_LARGE"
  | "INTERNAL_ERROR"
  | "UNSUPPORTED_FORMAT"
  | "EXTRACTION_EMPTY"
  | "CORRUPT_DOCUMENT"
  | "PROVIDER_UNCONFIGURED"
  | "PROVIDER_ERROR"
  | "MALFORMED_RESPONSE"
  | "RENDER_FAILED"
  | "ANALYSIS_FAILED"

/** HTTP statuses an AppError may carry. */
export type ErrorStatusCode = 400 | 404 | 409 | 413 | 422 | 500 | 502

export interface ErrorDetail {
  field?: string
  message: string
}

// ============================================================================
// Base class
// ============================================================================

export class AppError extends Error {
  readonly code: ErrorCode
  readonly statusCode: ErrorStatusCode
  readonly details?: ErrorDetail[]
  /** Expected failure (bad input, upstream outage) rather than a bug */
  readonly isOperational: boolean

  constructor(
    code: ErrorCode,
    message: string,
    statusCode: ErrorStatusCode,
    details?: ErrorDetail[],
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = this.constructor.name
    this.code = code
    this.statusCode = statusCode
    this.details = details
    this.isOperational = true
    Object.setPrototypeOf(this, new.target.prototype)
  }

  toJSON(): { code: ErrorCode; message: string; details?: ErrorDetail[] } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    }
  }
}

// ============================================================================
// Request errors
// ============================================================================

export class BadRequestError extends AppError {
  constructor(
    message = "Bad request",
    details?: ErrorDetail[],
    options?: { cause?: unknown }
  ) {
    super("BAD_REQUEST", message, 400, details, options)
  }
}

export class ValidationError extends AppError {
  constructor(message = "Validation failed", details?: ErrorDetail[]) {
    super("VALIDATION_ERROR", message, 400, details)
  }

  /**
   * Create from Zod error (uses .issues per Zod 4).
   */
  static fromZodError(error: {
    issues: Array<{ path: PropertyKey[]; message: string }>
  }): ValidationError {
    const details = error.issues.map((issue) => ({
      field: issue.path.map(String).join("."),
      message: issue.message,
    }))
    return new ValidationError("Validation failed", details)
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super("NOT_FOUND", message, 404)
  }
}

export class ConflictError extends AppError {
  constructor(message = "Resource conflict") {
    super("CONFLICT", message, 409)
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(message = "Payload too large") {
    super("PAYLOAD_TOO_LARGE", message, 413)
  }
}

export class InternalError extends AppError {
  constructor(message = "Internal server error", options?: { cause?: unknown }) {
    super("INTERNAL_ERROR", message, 500, undefined, options)
  }
}

// ============================================================================
// Document errors
// ============================================================================

export class UnsupportedFormatError extends AppError {
  constructor(extension: string) {
    super(
      "UNSUPPORTED_FORMAT",
      extension
        ? `Unsupported file format: .${extension}`
        : "File has no extension",
      400
    )
  }
}

export class ExtractionEmptyError extends AppError {
  constructor(
    message = "Could not extract text from the document. Please ensure it's not a scanned image."
  ) {
    super("EXTRACTION_EMPTY", message, 422)
  }
}

export class CorruptDocumentError extends AppError {
  constructor(
    message = "The document could not be read. It may be corrupt or in an unexpected format.",
    options?: { cause?: unknown }
  ) {
    super("CORRUPT_DOCUMENT", message, 422, undefined, options)
  }
}

// ============================================================================
// Analysis errors
// ============================================================================

export class ProviderUnconfiguredError extends AppError {
  constructor(provider: string) {
    super(
      "PROVIDER_UNCONFIGURED",
      `No API key configured for the ${provider} provider`,
      500
    )
  }
}

/**
 * Failure of the model call itself. `retriable` drives the chunk retry
 * policy: timeouts, network failures, 408, 429 and 5xx are worth another
 * attempt; authentication and other 4xx are not.
 */
export class ProviderError extends AppError {
  readonly retriable: boolean
  readonly providerStatus?: number

  constructor(
    message: string,
    options: { retriable: boolean; providerStatus?: number; cause?: unknown }
  ) {
    super("PROVIDER_ERROR", message, 502, undefined, { cause: options.cause })
    this.retriable = options.retriable
    this.providerStatus = options.providerStatus
  }
}

export class MalformedResponseError extends AppError {
  constructor(message = "Model reply did not contain a valid playbook object", details?: ErrorDetail[]) {
    super("MALFORMED_RESPONSE", message, 502, details)
  }
}

export class AnalysisFailedError extends AppError {
  constructor(message = "Analysis failed") {
    super("ANALYSIS_FAILED", message, 500)
  }
}

export class RenderFailureError extends AppError {
  constructor(message = "Failed to generate the playbook spreadsheet", options?: { cause?: unknown }) {
    super("RENDER_FAILED", message, 500, undefined, options)
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

/**
 * Normalize any thrown value into an AppError. Foreign error messages are
 * hidden in production so internals never reach a response body.
 */
export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error
  }

  if (error instanceof Error) {
    return new InternalError(
      process.env.NODE_ENV === "production"
        ? "An unexpected error occurred"
        : error.message,
      { cause: error }
    )
  }

  return new InternalError("An unexpected error occurred", { cause: error })
}
