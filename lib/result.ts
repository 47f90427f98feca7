/**
 * Result type for composable error handling.
 *
 * Represents either success (Ok) or failure (Err). The chunk analysis loop
 * collects one Result per chunk so a failed chunk is recorded instead of
 * unwinding the whole job.
 *
 * @example
 * ```typescript
 * const result = await tryCatchWith(() => analyze(chunk), toAppError)
 *
 * if (!result.ok) {
 *   failures.push({ chunkIndex: chunk.index, error: result.error })
 *   continue
 * }
 *
 * analyses.push(result.value)
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
 * Wrap an async operation that might throw, mapping the thrown value.
 */
export async function tryCatchWith<T, E>(
  fn: () => Promise<T>,
  mapError: (e: unknown) => E
): Promise<Result<T, E>> {
  try {
    return Ok(await fn())
  } catch (e) {
    return Err(mapError(e))
  }
}
