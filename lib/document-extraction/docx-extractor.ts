/**
 * @fileoverview DOCX text extraction with warnings capture
 * @module lib/document-extraction/docx-extractor
 */

import mammoth from 'mammoth'
import { CorruptDocumentError } from '@/lib/errors'
import type { ExtractionResult, ExtractionWarning } from './types'
import { measureTextQuality } from './quality'

const IMAGE_HINT = /image|picture/

/**
 * Turns mammoth's conversion warnings into extraction warnings, adding one
 * `embedded_images` entry when any of them mentions an image.
 */
function conversionWarnings(
  messages: Array<{ type: string; message: string }>
): ExtractionWarning[] {
  const warnings: ExtractionWarning[] = messages
    .filter((m) => m.type === 'warning')
    .map((m) => ({ type: 'docx_warning' as const, message: m.message }))

  if (warnings.some((w) => IMAGE_HINT.test(w.message))) {
    warnings.push({
      type: 'embedded_images',
      message: 'Document contains images; any clause text inside them was not extracted',
    })
  }
  return warnings
}

/**
 * Extracts text from DOCX buffer with warning capture.
 *
 * mammoth.extractRawText() returns the document with tracked changes
 * accepted; paragraphs (and table cells) are separated by blank lines.
 *
 * @throws CorruptDocumentError - Invalid or corrupt DOCX
 */
export async function extractDocx(
  buffer: Buffer,
  fileSize?: number
): Promise<ExtractionResult> {
  let result: Awaited<ReturnType<typeof mammoth.extractRawText>>
  try {
    result = await mammoth.extractRawText({ buffer })
  } catch (error) {
    throw new CorruptDocumentError(
      'Could not process this Word document. Try re-uploading or use a different format.',
      { cause: error }
    )
  }

  const text = result.value.normalize('NFC')
  const quality = measureTextQuality(text, fileSize ?? buffer.length)

  const warnings = conversionWarnings(result.messages)
  if (warnings.some((w) => w.type === 'embedded_images')) {
    quality.confidence = Math.min(quality.confidence, 0.8)
  }
  quality.warnings.push(...warnings)

  const paragraphCount = text.split(/\n+/).filter((p) => p.trim() !== '').length

  return {
    text,
    format: 'docx',
    quality,
    structure: { format: 'docx', paragraphCount },
    metadata: {}, // mammoth doesn't extract metadata
  }
}
