/**
 * @fileoverview Retry utility with fixed or stepped backoff
 *
 * Wraps transient failures of external calls (model provider requests).
 *
 * @module lib/retry
 */

/**
 * Default retry predicate: errors that declare `retriable: false` stop
 * immediately, anything else is retried.
 */
export function isRetriable(error: unknown): boolean {
  if (error instanceof Error && "retriable" in error) {
    return error.retriable !== false
  }
  return true
}

/**
 * Sleep for a specified duration.
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Retry options.
 */
export interface RetryOptions {
  /** Maximum number of attempts including the first (default: 3) */
  maxAttempts?: number
  /** Backoff delays in ms for each retry (default: [1000, 2000, 4000]) */
  backoff?: number[]
  /** Decides whether a failure is worth another attempt (default: {@link isRetriable}) */
  shouldRetry?: (error: unknown) => boolean
  /** Optional callback on each retry */
  onRetry?: (error: unknown, attempt: number) => void
}

/**
 * Execute a function with retry on failure. The last error is rethrown
 * unchanged so callers keep its type.
 *
 * @example
 * const reply = await withRetry(
 *   () => analyzeChunk(request, options),
 *   { maxAttempts: 2, backoff: [2000] }
 * )
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    backoff = [1000, 2000, 4000],
    shouldRetry = isRetriable,
    onRetry,
  } = options

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn()
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw error
      }

      onRetry?.(error, attempt)

      const delay = backoff[attempt - 1] ?? backoff[backoff.length - 1] ?? 0
      await sleep(delay)
    }
  }
}
