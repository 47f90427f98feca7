/**
 * @fileoverview Job lookup for the status and download routes
 * @module jobs/job-status
 */

import { z } from 'zod'
import { getJobById, toJobStatusView, type JobStatusView } from '@/db/queries/jobs'
import type { Job } from '@/db/schema'
import { NotFoundError } from '@/lib/errors'

const jobIdSchema = z.uuid()

/**
 * Validates a client-supplied job id. Unknown and malformed ids are
 * indistinguishable to clients.
 *
 * @throws NotFoundError - the id is not a UUID
 */
export function parseJobId(raw: string): string {
  const parsed = jobIdSchema.safeParse(raw)
  if (!parsed.success) {
    throw new NotFoundError('Job not found')
  }
  return parsed.data
}

/** @throws NotFoundError - malformed id or no such job */
export async function findJob(rawId: string): Promise<Job> {
  const job = await getJobById(parseJobId(rawId))
  if (!job) {
    throw new NotFoundError('Job not found')
  }
  return job
}

/** @throws NotFoundError - malformed id or no such job */
export async function getJobStatus(rawId: string): Promise<JobStatusView> {
  return toJobStatusView(await findJob(rawId))
}
