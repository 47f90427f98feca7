/**
 * @fileoverview Sequential chunk analysis
 *
 * Sends each chunk to the analyst in order, one call at a time. A chunk is
 * retried only on a retriable ProviderError; a chunk that still fails is
 * recorded and skipped so the remaining chunks are still analyzed. The run
 * fails only when no chunk succeeds.
 *
 * Progress is reported on a 0-100 scale before and after every chunk; the
 * caller scopes it onto the job's analysis span.
 *
 * @module jobs/analyze-chunks
 */

import { analyzeChunk, type ChunkAnalyzer, type PlaybookAnalystOptions } from '@/agents/playbook-analyst'
import type { AnalysisContext } from '@/agents/types'
import type { UsageTracker } from '@/lib/ai/usage'
import type { Chunk } from '@/lib/document-chunking'
import { AnalysisFailedError, ProviderError, toAppError } from '@/lib/errors'
import { logger } from '@/lib/logger'
import type { ChunkFailure, ChunkResult } from '@/lib/playbook'
import type { ProgressReporter } from '@/lib/progress'
import { tryCatchWith } from '@/lib/result'
import { withRetry } from '@/lib/retry'

export interface AnalyzeChunksOptions {
  jobId: string
  context: AnalysisContext
  analyst: PlaybookAnalystOptions
  /** Attempts per chunk, including the first */
  maxAttempts: number
  retryDelayMs: number
  progress: ProgressReporter
  usage: UsageTracker
  /** Defaults to the real model-backed analyst */
  analyzer?: ChunkAnalyzer
}

export interface ChunkAnalysisOutcome {
  results: ChunkResult[]
  failures: ChunkFailure[]
}

/** Only provider failures flagged retriable get another attempt */
function isRetriableProviderError(error: unknown): boolean {
  return error instanceof ProviderError && error.retriable
}

function analyzingMessage(index: number, count: number): string {
  return count > 1 ? `Analyzing part ${index + 1} of ${count}...` : 'Analyzing contract with AI...'
}

/**
 * Analyzes every chunk in order.
 *
 * @throws AnalysisFailedError - every chunk failed
 */
export async function analyzeChunks(
  chunks: Chunk[],
  options: AnalyzeChunksOptions
): Promise<ChunkAnalysisOutcome> {
  const { jobId, context, progress, usage } = options
  const analyzer = options.analyzer ?? analyzeChunk
  const count = chunks.length
  const results: ChunkResult[] = []
  const failures: ChunkFailure[] = []

  for (const chunk of chunks) {
    await progress.report(Math.floor((100 * chunk.index) / count), analyzingMessage(chunk.index, count))

    const outcome = await tryCatchWith(
      () =>
        withRetry(
          () =>
            analyzer(
              { ...context, text: chunk.content, chunkIndex: chunk.index, chunkCount: count },
              options.analyst
            ),
          {
            maxAttempts: options.maxAttempts,
            backoff: [options.retryDelayMs],
            shouldRetry: isRetriableProviderError,
            onRetry: (error, attempt) => {
              logger.warn('Retrying chunk analysis', {
                jobId,
                chunkIndex: chunk.index,
                attempt,
                error: error instanceof Error ? error.message : String(error),
              })
            },
          }
        ),
      toAppError
    )

    if (outcome.ok) {
      const { analysis, tokenUsage } = outcome.value
      usage.record(`chunk-${chunk.index}`, tokenUsage.inputTokens, tokenUsage.outputTokens)
      results.push({ chunkIndex: chunk.index, analysis })
      logger.info('Chunk analyzed', {
        jobId,
        chunkIndex: chunk.index,
        chunkCount: count,
        clauseCount: analysis.clauses.length,
        inputTokens: tokenUsage.inputTokens,
        outputTokens: tokenUsage.outputTokens,
      })
    } else {
      failures.push({
        chunkIndex: chunk.index,
        code: outcome.error.code,
        message: outcome.error.message,
      })
      logger.warn('Chunk analysis failed, skipping', {
        jobId,
        chunkIndex: chunk.index,
        chunkCount: count,
        code: outcome.error.code,
        error: outcome.error.message,
      })
    }

    await progress.report(
      Math.floor((100 * (chunk.index + 1)) / count),
      `Analyzed part ${chunk.index + 1} of ${count}`
    )
  }

  if (results.length === 0) {
    const first = failures[0]
    throw new AnalysisFailedError(
      `All ${count} part${count === 1 ? '' : 's'} of the document failed to analyze. ` +
        `First error: ${first ? first.message : 'unknown'}`
    )
  }

  return { results, failures }
}
