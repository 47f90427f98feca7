/**
 * @fileoverview Unified document extraction entry point
 *
 * Single function for extracting text from a PDF, DOCX or XLSX file on disk
 * with validation gates and structured output.
 *
 * @module lib/document-extraction/extract-document
 */

import { readFile, stat } from 'node:fs/promises'
import { extname } from 'node:path'
import {
  ExtractionEmptyError,
  NotFoundError,
  UnsupportedFormatError,
} from '@/lib/errors'
import { SUPPORTED_EXTENSIONS, type SupportedExtension } from '@/lib/config'
import { logger } from '@/lib/logger'
import { extractDocx } from './docx-extractor'
import { extractXlsx } from './xlsx-extractor'
import type { ExtractionResult } from './types'

// ============================================================================
// Format Detection
// ============================================================================

/** Lower-cased extension without the dot, or '' when there is none. */
export function getFileExtension(filename: string): string {
  return extname(filename).slice(1).toLowerCase()
}

export function isSupportedExtension(extension: string): extension is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension)
}

// ============================================================================
// Main Extraction Function
// ============================================================================

/**
 * Extracts text from the document at `filePath`.
 *
 * Validation flow:
 * 1. Existence check
 * 2. Format detection by extension
 * 3. Raw extraction (format-specific, NFC-normalized)
 * 4. Empty-text gate and quality metrics logging
 *
 * @throws NotFoundError - No file at the path
 * @throws UnsupportedFormatError - Extension other than pdf, docx, xlsx
 * @throws CorruptDocumentError - The parser rejected the file
 * @throws ExtractionEmptyError - Extraction produced no text
 */
export async function extractDocument(filePath: string): Promise<ExtractionResult> {
  let fileSize: number
  try {
    const stats = await stat(filePath)
    fileSize = stats.size
  } catch {
    throw new NotFoundError(`File not found: ${filePath}`)
  }

  const extension = getFileExtension(filePath)
  if (!isSupportedExtension(extension)) {
    throw new UnsupportedFormatError(extension)
  }

  const buffer = await readFile(filePath)

  let result: ExtractionResult
  switch (extension) {
    case 'pdf': {
      // unpdf pulls in PDF.js; load it only when a PDF arrives
      const { extractPdf } = await import('./pdf-extractor')
      result = await extractPdf(buffer, fileSize)
      break
    }
    case 'docx':
      result = await extractDocx(buffer, fileSize)
      break
    case 'xlsx':
      result = await extractXlsx(buffer, fileSize)
      break
  }

  if (result.text.trim() === '') {
    logExtractionMetrics(result, 'empty')
    throw new ExtractionEmptyError()
  }

  logExtractionMetrics(result, 'success')

  return result
}

// ============================================================================
// Logging
// ============================================================================

function logExtractionMetrics(
  result: ExtractionResult,
  outcome: 'success' | 'empty'
): void {
  logger.info('Document extracted', {
    format: result.format,
    outcome,
    charCount: result.quality.charCount,
    wordCount: result.quality.wordCount,
    confidence: result.quality.confidence,
    warningCount: result.quality.warnings.length,
    warnings: result.quality.warnings.map((w) => w.type).join(','),
    hasTitle: Boolean(result.metadata.title),
    hasAuthor: Boolean(result.metadata.author),
  })
}
