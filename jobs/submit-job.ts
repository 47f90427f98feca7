/**
 * @fileoverview Upload intake
 *
 * Validates an upload, stores it on disk and creates its job row. Nothing
 * is analyzed here; processing starts with {@link runPlaybookJob}.
 *
 * @module jobs/submit-job
 */

import { randomUUID } from 'crypto'
import { z } from 'zod'
import { DEFAULT_ANALYSIS_CONTEXT, type AnalysisContext } from '@/agents/types'
import { createJob } from '@/db/queries/jobs'
import { isProviderConfigured } from '@/lib/ai/config'
import type { AppConfig } from '@/lib/config'
import { getFileExtension } from '@/lib/document-extraction'
import {
  PayloadTooLargeError,
  ProviderUnconfiguredError,
  UnsupportedFormatError,
  ValidationError,
} from '@/lib/errors'
import { logger } from '@/lib/logger'
import { removeFile, saveUpload } from '@/lib/uploads'

export interface UploadInput {
  filename: string
  data: Uint8Array
}

export interface SubmittedJob {
  jobId: string
  message: string
}

const contextField = (fallback: string) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.string().trim().max(200).default(fallback)
  )

/** Negotiation context submitted alongside the file; blanks take defaults */
export const jobOptionsSchema = z.object({
  agreementType: contextField(DEFAULT_ANALYSIS_CONTEXT.agreementType),
  userRole: contextField(DEFAULT_ANALYSIS_CONTEXT.userRole),
  riskTolerance: contextField(DEFAULT_ANALYSIS_CONTEXT.riskTolerance),
})

export type JobOptionsInput = z.input<typeof jobOptionsSchema>

/**
 * @throws UnsupportedFormatError - extension not in the configured allow-list
 * @throws PayloadTooLargeError - file exceeds the configured size limit
 * @throws ProviderUnconfiguredError - no credential for the selected provider
 * @throws ValidationError - context options are invalid
 */
export async function submitJob(
  upload: UploadInput,
  options: JobOptionsInput,
  config: AppConfig
): Promise<SubmittedJob> {
  const extension = getFileExtension(upload.filename)
  if (!config.uploads.allowedExtensions.some((allowed) => allowed === extension)) {
    throw new UnsupportedFormatError(extension)
  }

  if (upload.data.byteLength > config.uploads.maxFileSizeBytes) {
    const limitMb = Math.round(config.uploads.maxFileSizeBytes / (1024 * 1024))
    throw new PayloadTooLargeError(`File exceeds the ${limitMb}MB upload limit`)
  }

  if (!isProviderConfigured(config.ai)) {
    throw new ProviderUnconfiguredError(config.ai.provider)
  }

  const parsed = jobOptionsSchema.safeParse(options)
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error)
  }
  const context: AnalysisContext = parsed.data

  const jobId = randomUUID()
  const stored = await saveUpload(config.uploads.dir, {
    jobId,
    filename: upload.filename,
    data: upload.data,
  })

  try {
    await createJob({
      id: jobId,
      originalFilename: stored.filename,
      filePath: stored.filePath,
      ...context,
    })
  } catch (error) {
    // No row will ever reference the file
    await removeFile(stored.filePath)
    throw error
  }

  logger.info('Upload accepted', {
    jobId,
    filename: stored.filename,
    sizeBytes: upload.data.byteLength,
    agreementType: context.agreementType,
  })

  return { jobId, message: 'File uploaded successfully. Processing started.' }
}
