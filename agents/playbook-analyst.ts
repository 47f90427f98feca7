/**
 * @fileoverview Playbook Analyst Agent
 *
 * Sends one chunk of contract text plus its negotiation context to the
 * configured model and turns the free-text reply into a typed
 * {@link ChunkAnalysis}. One call per chunk; the job runner owns retries, so
 * SDK-level retries are disabled here.
 *
 * @module agents/playbook-analyst
 */

import { APICallError, RetryError, generateText, type LanguageModel } from 'ai'
import { GENERATION_CONFIG } from '@/lib/ai/config'
import { ProviderError } from '@/lib/errors'
import { PLAYBOOK_ANALYST_SYSTEM_PROMPT, createPlaybookAnalystPrompt } from './prompts'
import { parseAnalysisReply } from './response-parser'
import type { AnalysisRequest, ChunkAnalysis } from './types'

// ============================================================================
// Types
// ============================================================================

export interface PlaybookAnalystOptions {
  model: LanguageModel
  /** Abort the call after this many milliseconds */
  timeoutMs: number
  maxOutputTokens: number
}

export interface PlaybookAnalystResult {
  analysis: ChunkAnalysis
  tokenUsage: { inputTokens: number; outputTokens: number }
}

/** Signature shared by the real analyst and test doubles */
export type ChunkAnalyzer = (
  request: AnalysisRequest,
  options: PlaybookAnalystOptions
) => Promise<PlaybookAnalystResult>

// ============================================================================
// Error classification
// ============================================================================

const NETWORK_ERROR_PATTERN = /timeout|timed out|econnreset|econnrefused|enotfound|socket hang up|network|fetch failed/i

/**
 * Maps a failure of the provider call onto a ProviderError.
 *
 * Retriable: timeouts, network failures and HTTP 408/429/5xx.
 * Not retriable: authentication and other client errors.
 */
export function toProviderError(error: unknown): ProviderError {
  const cause = RetryError.isInstance(error) ? error.lastError : error

  if (APICallError.isInstance(cause)) {
    const status = cause.statusCode
    const retriable =
      cause.isRetryable ||
      (status !== undefined && (status >= 500 || status === 408 || status === 429))
    return new ProviderError(
      `Provider request failed${status ? ` (${status})` : ''}: ${cause.message}`,
      { retriable, providerStatus: status, cause }
    )
  }

  if (cause instanceof Error) {
    if (cause.name === 'TimeoutError' || cause.name === 'AbortError') {
      return new ProviderError('Provider request timed out', { retriable: true, cause })
    }
    return new ProviderError(`Provider request failed: ${cause.message}`, {
      retriable: NETWORK_ERROR_PATTERN.test(cause.message),
      cause,
    })
  }

  return new ProviderError(`Provider request failed: ${String(cause)}`, {
    retriable: false,
    cause,
  })
}

// ============================================================================
// Agent
// ============================================================================

/**
 * Analyzes one chunk.
 *
 * @throws ProviderError - the model call failed (see {@link toProviderError})
 * @throws MalformedResponseError - the reply held no valid playbook object
 */
export async function analyzeChunk(
  request: AnalysisRequest,
  options: PlaybookAnalystOptions
): Promise<PlaybookAnalystResult> {
  let reply: { text: string; inputTokens: number; outputTokens: number }
  try {
    const result = await generateText({
      model: options.model,
      system: PLAYBOOK_ANALYST_SYSTEM_PROMPT,
      prompt: createPlaybookAnalystPrompt(request),
      temperature: GENERATION_CONFIG.temperature,
      maxOutputTokens: options.maxOutputTokens,
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(options.timeoutMs),
      experimental_telemetry: {
        isEnabled: true,
        functionId: 'playbook-analyst',
        metadata: {
          chunkIndex: request.chunkIndex,
          chunkCount: request.chunkCount,
        },
      },
    })
    reply = {
      text: result.text,
      inputTokens: result.usage.inputTokens ?? 0,
      outputTokens: result.usage.outputTokens ?? 0,
    }
  } catch (error) {
    throw toProviderError(error)
  }

  return {
    analysis: parseAnalysisReply(reply.text),
    tokenUsage: {
      inputTokens: reply.inputTokens,
      outputTokens: reply.outputTokens,
    },
  }
}
