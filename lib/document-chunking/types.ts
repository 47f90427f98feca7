/**
 * @fileoverview Type definitions for contract chunking.
 *
 * Chunks are bounded-size slices of the extracted contract text, each sent
 * to the model in a single analysis call.
 *
 * @module lib/document-chunking/types
 */

/**
 * A contiguous slice of the source text.
 *
 * Positions are character offsets into the full text; `content` equals
 * `text.slice(startPosition, endPosition)`.
 */
export interface Chunk {
  /** Zero-based position in the chunk sequence */
  index: number
  content: string
  startPosition: number
  endPosition: number
  /** Tokenizer estimate, used for logging only */
  tokenCount: number
}

/**
 * Aggregate statistics logged once per job.
 */
export interface ChunkStats {
  totalChunks: number
  totalCharacters: number
  totalTokens: number
  maxTokens: number
}
