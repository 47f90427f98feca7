/**
 * @fileoverview Model reply parsing
 *
 * Replies are free text that should contain one JSON object, possibly
 * wrapped in prose or a Markdown fence. The object is located greedily
 * (first `{` to last `}`), parsed, then validated into typed records.
 *
 * @module agents/response-parser
 */

import { MalformedResponseError } from '@/lib/errors'
import { chunkAnalysisSchema, type ChunkAnalysis } from './types'

/**
 * Extracts and parses the JSON object embedded in a reply.
 *
 * @throws MalformedResponseError - no braces, invalid JSON, or a non-object value
 */
export function extractJsonObject(reply: string): Record<string, unknown> {
  const start = reply.indexOf('{')
  const end = reply.lastIndexOf('}')
  if (start === -1 || end < start) {
    throw new MalformedResponseError('Model reply did not contain a JSON object')
  }

  let value: unknown
  try {
    value = JSON.parse(reply.slice(start, end + 1))
  } catch (error) {
    throw new MalformedResponseError(
      `Model reply contained invalid JSON: ${error instanceof Error ? error.message : String(error)}`
    )
  }

  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new MalformedResponseError('Model reply JSON was not an object')
  }

  return Object.fromEntries(Object.entries(value))
}

/**
 * Validates a loosely-typed reply object into a ChunkAnalysis, applying
 * defaults for missing optional fields.
 *
 * @throws MalformedResponseError - structurally invalid (e.g. `clauses` not a list)
 */
export function parseChunkAnalysis(value: unknown): ChunkAnalysis {
  const parsed = chunkAnalysisSchema.safeParse(value)
  if (!parsed.success) {
    throw new MalformedResponseError(
      'Model reply did not match the playbook structure',
      parsed.error.issues.map((issue) => ({
        field: issue.path.map(String).join('.'),
        message: issue.message,
      }))
    )
  }
  return parsed.data
}

/** extractJsonObject then parseChunkAnalysis */
export function parseAnalysisReply(reply: string): ChunkAnalysis {
  return parseChunkAnalysis(extractJsonObject(reply))
}
