/**
 * HTTP response envelope.
 *
 * Usage:
 *   import { ok, fail, type ApiResponse } from "@/server/api-response"
 *
 *   return c.json(ok({ jobId }))
 *   return c.json(fail(error), error.statusCode)
 */

import { AppError, type ErrorDetail } from "@/lib/errors"

export type ApiResponse<T> =
  | { success: true; data: T }
  | {
      success: false
      error: { code: string; message: string; details?: ErrorDetail[] }
    }

/**
 * Create a success response.
 *
 * @example
 * return c.json(ok({ jobId: "123", message: "Uploaded" }))
 */
export function ok<T>(data: T): ApiResponse<T> {
  return { success: true, data }
}

/**
 * Create an error response from an AppError, or from a code and message
 * already stored on a job.
 */
export function fail<T = never>(
  error: AppError | { code: string; message: string }
): ApiResponse<T> {
  return {
    success: false,
    error:
      error instanceof AppError
        ? error.toJSON()
        : { code: error.code, message: error.message },
  }
}
