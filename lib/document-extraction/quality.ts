/**
 * @fileoverview Extraction quality metrics
 *
 * Scanned contracts and broken text layers show up as too little text, as
 * text that is mostly symbols and digits, or as a large file that yields
 * only a sliver of text. Each of these adds a warning; none rejects the
 * document (only whitespace-only text does, in extractDocument).
 *
 * @module lib/document-extraction/quality
 */

import type { ExtractionWarning, QualityMetrics } from './types'

export const MIN_TEXT_LENGTH = 100

/** Share of letter-bearing tokens below which the text reads as garbled */
const MIN_LETTER_SHARE = 0.5

/** Files above this size with under SPARSE_DENSITY chars per byte are sparse */
const SPARSE_FILE_BYTES = 100_000
const SPARSE_DENSITY = 0.001

const LETTER = /\p{L}/u

export function measureTextQuality(text: string, fileSize: number): QualityMetrics {
  const charCount = text.length
  const tokens = text.split(/\s+/).filter(Boolean)
  const warnings: ExtractionWarning[] = []

  if (charCount < MIN_TEXT_LENGTH) {
    warnings.push({
      type: 'low_text',
      message: `Only ${charCount} characters extracted; the document may be scanned or mostly images`,
    })
    return { charCount, wordCount: tokens.length, confidence: 0, warnings }
  }

  let confidence = tokens.filter((token) => LETTER.test(token)).length / tokens.length

  if (confidence < MIN_LETTER_SHARE) {
    warnings.push({
      type: 'low_confidence',
      message: 'Most extracted text contains no letters; the text layer may be garbled',
    })
  }

  if (fileSize > SPARSE_FILE_BYTES && charCount / fileSize < SPARSE_DENSITY) {
    warnings.push({
      type: 'low_confidence',
      message: 'Very little text for the file size; some pages may be images',
    })
    confidence = Math.min(confidence, 0.5)
  }

  return { charCount, wordCount: tokens.length, confidence, warnings }
}
