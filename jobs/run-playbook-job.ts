/**
 * @fileoverview Playbook job pipeline
 *
 * Runs one job end to end, synchronously:
 *
 * ```
 * extract (5-10%) → plan chunks → analyze chunks (10-80%)
 *   → merge (85%) → render (90%) → completed (100%)
 * ```
 *
 * Every failure is written to the job row and returned to the caller; the
 * pipeline never throws for a job-level failure. Lookup failures (unknown
 * job, job already running) are thrown.
 *
 * @module jobs/run-playbook-job
 */

import { mkdir } from 'fs/promises'
import path from 'path'
import type { LanguageModel } from 'ai'
import type { ChunkAnalyzer } from '@/agents/playbook-analyst'
import type { AnalysisContext } from '@/agents/types'
import {
  claimJob,
  getJobById,
  markJobCompleted,
  markJobFailed,
  toJobStatusView,
  updateJobProgress,
  type JobStatusView,
} from '@/db/queries/jobs'
import { getAnalysisModel } from '@/lib/ai/config'
import { UsageTracker } from '@/lib/ai/usage'
import type { AppConfig } from '@/lib/config'
import { computeChunkStats, planChunks } from '@/lib/document-chunking'
import { extractDocument } from '@/lib/document-extraction'
import { ConflictError, NotFoundError, toAppError, type AppError } from '@/lib/errors'
import { logger } from '@/lib/logger'
import { mergeChunkResults } from '@/lib/playbook'
import { PROGRESS, scopeProgress, type ProgressReporter } from '@/lib/progress'
import { renderPlaybook } from '@/lib/spreadsheet'
import { outputFilenameFor, removeFile } from '@/lib/uploads'
import { analyzeChunks } from './analyze-chunks'

export interface RunPlaybookJobOptions {
  config: AppConfig
  /** Defaults to the model selected by `config.ai` */
  model?: LanguageModel
  /** Defaults to the model-backed analyst */
  analyzer?: ChunkAnalyzer
  /** Receives every update in addition to the job row */
  onProgress?: ProgressReporter
}

export interface RunPlaybookJobResult {
  status: JobStatusView
  /** Set when this run (or an earlier one) failed */
  error: { code: string; message: string } | null
}

function jobProgressReporter(jobId: string, extra?: ProgressReporter): ProgressReporter {
  return {
    async report(percent, message) {
      await updateJobProgress(jobId, percent, message)
      await extra?.report(percent, message)
    },
  }
}

/**
 * Processes a stored upload into a playbook spreadsheet.
 *
 * A job that has already completed or failed is returned as-is.
 *
 * @throws NotFoundError - no job with this id
 * @throws ConflictError - the job is already being processed
 */
export async function runPlaybookJob(
  jobId: string,
  options: RunPlaybookJobOptions
): Promise<RunPlaybookJobResult> {
  const job = await getJobById(jobId)
  if (!job) {
    throw new NotFoundError('Job not found')
  }
  if (job.status !== 'processing') {
    const status = toJobStatusView(job)
    return { status, error: status.error }
  }

  const claimed = await claimJob(jobId)
  if (!claimed) {
    throw new ConflictError('Job is already being processed')
  }

  const { config } = options
  const progress = jobProgressReporter(jobId, options.onProgress)
  const context: AnalysisContext = {
    agreementType: job.agreementType,
    userRole: job.userRole,
    riskTolerance: job.riskTolerance,
  }
  const startTime = Date.now()

  logger.info('Job started', { jobId, filename: job.originalFilename, ...context })

  try {
    await progress.report(PROGRESS.parsing, 'Parsing document...')
    const extraction = await extractDocument(job.filePath)

    const chunks = planChunks(extraction.text, config.chunkSize)
    const stats = computeChunkStats(chunks)
    logger.info('Chunks planned', { jobId, ...stats })
    await progress.report(
      PROGRESS.extracted,
      chunks.length > 1
        ? `Document parsed. Analyzing in ${chunks.length} parts...`
        : 'Document parsed. Analyzing contract...'
    )

    const usage = new UsageTracker()
    const { results, failures } = await analyzeChunks(chunks, {
      jobId,
      context,
      analyst: {
        model: options.model ?? getAnalysisModel(config.ai),
        timeoutMs: config.ai.timeoutMs,
        maxOutputTokens: config.ai.maxOutputTokens,
      },
      maxAttempts: config.ai.maxAttempts,
      retryDelayMs: config.ai.retryDelayMs,
      progress: scopeProgress(progress, PROGRESS.extracted, PROGRESS.analyzed),
      usage,
      analyzer: options.analyzer,
    })

    await progress.report(PROGRESS.merging, 'Merging analysis results...')
    const playbook = mergeChunkResults(results, context, failures)

    await progress.report(PROGRESS.rendering, 'Generating Excel playbook...')
    const outputFilename = outputFilenameFor(job.originalFilename)
    const outputPath = path.join(config.uploads.outputDir, outputFilename)
    await mkdir(config.uploads.outputDir, { recursive: true })
    await renderPlaybook(playbook, outputPath)

    const total = usage.getUsage().total
    const completed = await markJobCompleted(jobId, {
      outputPath,
      outputFilename,
      chunkCount: chunks.length,
      failedChunkCount: failures.length,
      tokenUsage: {
        inputTokens: total.input,
        outputTokens: total.output,
        estimatedCost: total.estimatedCost,
      },
    })
    if (!completed) {
      throw new NotFoundError('Job not found')
    }
    await options.onProgress?.report(PROGRESS.complete, completed.message)

    await removeFile(job.filePath)

    logger.info('Job completed', {
      jobId,
      chunkCount: chunks.length,
      failedChunkCount: failures.length,
      clauseCount: playbook.clauses.length,
      totalTokens: total.total,
      estimatedCost: total.estimatedCost,
      durationMs: Date.now() - startTime,
    })

    return { status: toJobStatusView(completed), error: null }
  } catch (error) {
    return recordFailure(jobId, toAppError(error), Date.now() - startTime)
  }
}

async function recordFailure(
  jobId: string,
  error: AppError,
  durationMs: number
): Promise<RunPlaybookJobResult> {
  logger.error('Job failed', {
    jobId,
    code: error.code,
    error: error.message,
    durationMs,
  })

  const failed = await markJobFailed(jobId, { code: error.code, message: error.message })
  if (!failed) {
    throw error
  }

  return {
    status: toJobStatusView(failed),
    error: { code: error.code, message: error.message },
  }
}
