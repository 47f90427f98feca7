/**
 * @fileoverview Fixed-size chunk planner.
 *
 * Splits contract text into `ceil(L / S)` contiguous, non-overlapping
 * segments of at most `S` characters. Text shorter than `S` becomes a single
 * chunk, which keeps short contracts to one model call.
 *
 * @module lib/document-chunking/chunk-planner
 */

import { encode } from "gpt-tokenizer"
import { ValidationError } from "@/lib/errors"
import type { Chunk, ChunkStats } from "./types"

/**
 * Estimates the token count of a text.
 *
 * gpt-tokenizer is a proxy for the provider's tokenizer; expect roughly
 * 10-15% variance.
 */
export function estimateTokens(text: string): number {
  return encode(text).length
}

/**
 * Plans the chunk sequence for a text.
 *
 * Deterministic: the same text and size always produce the same chunks.
 * Concatenating every chunk's content reproduces the input exactly. An empty
 * text yields one empty chunk so the pipeline still makes a single call.
 *
 * @param text - Full extracted contract text
 * @param maxChunkSize - Maximum characters per chunk, a positive integer
 * @throws ValidationError - when maxChunkSize is not a positive integer
 *
 * @example
 * planChunks("a".repeat(45_000), 40_000).map((c) => c.content.length)
 * // => [40000, 5000]
 */
export function planChunks(text: string, maxChunkSize: number): Chunk[] {
  if (!Number.isInteger(maxChunkSize) || maxChunkSize <= 0) {
    throw new ValidationError("Chunk size must be a positive integer", [
      { field: "maxChunkSize", message: `Received ${maxChunkSize}` },
    ])
  }

  const count = Math.max(1, Math.ceil(text.length / maxChunkSize))
  const chunks: Chunk[] = []

  for (let index = 0; index < count; index++) {
    const startPosition = index * maxChunkSize
    const endPosition = Math.min(text.length, startPosition + maxChunkSize)
    const content = text.slice(startPosition, endPosition)

    chunks.push({
      index,
      content,
      startPosition,
      endPosition,
      tokenCount: estimateTokens(content),
    })
  }

  return chunks
}

/**
 * Summarizes a chunk plan for logging.
 */
export function computeChunkStats(chunks: Chunk[]): ChunkStats {
  return {
    totalChunks: chunks.length,
    totalCharacters: chunks.reduce((sum, c) => sum + c.content.length, 0),
    totalTokens: chunks.reduce((sum, c) => sum + c.tokenCount, 0),
    maxTokens: chunks.reduce((max, c) => Math.max(max, c.tokenCount), 0),
  }
}
