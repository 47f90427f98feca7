/**
 * @fileoverview Playbook job status storage
 *
 * One row per uploaded agreement. The row is created on upload, claimed
 * once when processing starts, updated as the pipeline reports progress, and
 * finally marked `completed` (with the output file reference) or `error`.
 *
 * ```
 * processing (progress 0..99) ──► completed (progress 100)
 *                              └─► error     (progress left where it stopped)
 * ```
 *
 * @module db/schema/jobs
 */

import { index, integer, jsonb, pgTable, text, timestamp } from "drizzle-orm/pg-core"
import { primaryId, timestamps } from "../_columns"

export const JOB_STATUSES = ["processing", "completed", "error"] as const
export type JobStatus = (typeof JOB_STATUSES)[number]

/** Token usage stored on completion */
export interface JobTokenUsage {
  inputTokens: number
  outputTokens: number
  estimatedCost: number
}

export const jobs = pgTable(
  "jobs",
  {
    ...primaryId,

    /** @default 'processing' */
    status: text("status").$type<JobStatus>().notNull().default("processing"),

    /** 0-100, non-decreasing while processing */
    progress: integer("progress").notNull().default(0),

    /** Human-readable description of the current stage */
    message: text("message").notNull().default(""),

    /** AppError code when status is 'error' */
    errorCode: text("error_code"),
    errorMessage: text("error_message"),

    originalFilename: text("original_filename").notNull(),
    /** Stored upload; removed once the job completes */
    filePath: text("file_path").notNull(),

    agreementType: text("agreement_type").notNull(),
    userRole: text("user_role").notNull(),
    riskTolerance: text("risk_tolerance").notNull(),

    outputPath: text("output_path"),
    outputFilename: text("output_filename"),

    chunkCount: integer("chunk_count"),
    failedChunkCount: integer("failed_chunk_count").notNull().default(0),
    tokenUsage: jsonb("token_usage").$type<JobTokenUsage>(),

    /** Set when processing is claimed; a job runs at most once */
    startedAt: timestamp("started_at", { withTimezone: true }),
    completedAt: timestamp("completed_at", { withTimezone: true }),

    ...timestamps,
  },
  (table) => [index("idx_jobs_status").on(table.status)]
)

export type Job = typeof jobs.$inferSelect
export type NewJob = typeof jobs.$inferInsert
