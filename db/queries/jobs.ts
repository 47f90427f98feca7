/**
 * @fileoverview Job Status Queries
 *
 * Every write touches exactly one row by primary key. Progress updates are
 * guarded on `status = 'processing'` so a late report cannot overwrite a
 * terminal state.
 *
 * @module db/queries/jobs
 */

import { and, eq, isNull } from "drizzle-orm"
import { db } from "../client"
import {
  jobs,
  type Job,
  type JobStatus,
  type JobTokenUsage,
  type NewJob,
} from "../schema/jobs"

// ============================================================================
// Types
// ============================================================================

/** Upload facts and negotiation context; status and progress start fixed */
export type CreateJobInput = Pick<
  NewJob,
  "id" | "originalFilename" | "filePath" | "agreementType" | "userRole" | "riskTolerance" | "message"
>

export interface JobCompletion {
  outputPath: string
  outputFilename: string
  chunkCount: number
  failedChunkCount: number
  tokenUsage: JobTokenUsage
  message?: string
}

/** Public shape returned by the status endpoint */
export interface JobStatusView {
  jobId: string
  status: JobStatus
  progress: number
  message: string
  error: { code: string; message: string } | null
  downloadUrl: string | null
  failedChunkCount: number
}

// ============================================================================
// Reads
// ============================================================================

export async function getJobById(jobId: string): Promise<Job | null> {
  const [job] = await db.select().from(jobs).where(eq(jobs.id, jobId)).limit(1)

  return job ?? null
}

export function toJobStatusView(job: Job): JobStatusView {
  return {
    jobId: job.id,
    status: job.status,
    progress: job.progress,
    message: job.message,
    error:
      job.status === "error"
        ? {
            code: job.errorCode ?? "INTERNAL_ERROR",
            message: job.errorMessage ?? "Processing failed",
          }
        : null,
    downloadUrl: job.status === "completed" ? `/api/download/${job.id}` : null,
    failedChunkCount: job.failedChunkCount,
  }
}

// ============================================================================
// Writes
// ============================================================================

export async function createJob(input: CreateJobInput): Promise<Job> {
  const [job] = await db
    .insert(jobs)
    .values({
      id: input.id,
      status: "processing",
      progress: 0,
      message: input.message ?? "Uploading file...",
      originalFilename: input.originalFilename,
      filePath: input.filePath,
      agreementType: input.agreementType,
      userRole: input.userRole,
      riskTolerance: input.riskTolerance,
    })
    .returning()

  return job
}

/**
 * Marks a job as started.
 *
 * Returns `null` when the job does not exist, is no longer processing, or
 * has already been claimed; the guard is a single conditional UPDATE so two
 * concurrent callers cannot both win.
 */
export async function claimJob(jobId: string): Promise<Job | null> {
  const [claimed] = await db
    .update(jobs)
    .set({ startedAt: new Date(), updatedAt: new Date() })
    .where(
      and(eq(jobs.id, jobId), eq(jobs.status, "processing"), isNull(jobs.startedAt))
    )
    .returning()

  return claimed ?? null
}

export async function updateJobProgress(
  jobId: string,
  progress: number,
  message: string
): Promise<void> {
  await db
    .update(jobs)
    .set({ progress, message, updatedAt: new Date() })
    .where(and(eq(jobs.id, jobId), eq(jobs.status, "processing")))
}

export async function markJobCompleted(
  jobId: string,
  completion: JobCompletion
): Promise<Job | null> {
  const [updated] = await db
    .update(jobs)
    .set({
      status: "completed",
      progress: 100,
      message: completion.message ?? "Playbook generated successfully!",
      outputPath: completion.outputPath,
      outputFilename: completion.outputFilename,
      chunkCount: completion.chunkCount,
      failedChunkCount: completion.failedChunkCount,
      tokenUsage: completion.tokenUsage,
      completedAt: new Date(),
      updatedAt: new Date(),
    })
    .where(eq(jobs.id, jobId))
    .returning()

  return updated ?? null
}

/** Leaves `progress` where the pipeline stopped */
export async function markJobFailed(
  jobId: string,
  error: { code: string; message: string }
): Promise<Job | null> {
  const [updated] = await db
    .update(jobs)
    .set({
      status: "error",
      message: `Error: ${error.message}`,
      errorCode: error.code,
      errorMessage: error.message,
      completedAt: new Date(),
      updatedAt: new Date(),
    })
    .where(eq(jobs.id, jobId))
    .returning()

  return updated ?? null
}
