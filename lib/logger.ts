import * as Sentry from "@sentry/node"

/**
 * Structured logger using Sentry.logger
 *
 * Entries are only recorded once `instrument.ts` has initialised Sentry
 * with a DSN.
 *
 * @example
 * ```ts
 * import { logger } from "@/lib/logger"
 *
 * logger.info("Job completed", { jobId, chunkCount: 2 })
 * logger.warn("Chunk analysis failed", { jobId, chunkIndex: 1, code: err.code })
 * ```
 */
export const logger = Sentry.logger
