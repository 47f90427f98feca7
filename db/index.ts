/**
 * Database Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { db, jobs, queries } from "@/db"
 *
 * const job = await queries.jobs.getJobById(jobId)
 * ```
 *
 * @module db
 */

export * from "./client"
export * from "./schema"
export * as queries from "./queries"
