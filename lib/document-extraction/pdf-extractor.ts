/**
 * @fileoverview PDF text extraction with error handling
 *
 * Uses unpdf (serverless-optimized PDF.js build) instead of pdf-parse
 * to avoid DOMMatrix/pdfjs-dist browser dependency issues.
 *
 * @module lib/document-extraction/pdf-extractor
 */

import { CorruptDocumentError } from '@/lib/errors'
import type { DocumentMetadata, ExtractionResult } from './types'
import { measureTextQuality } from './quality'

function metaString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined
}

/**
 * Extracts text from PDF buffer, one block per page separated by a blank
 * line. PDF.js emits text in content-stream order, which linearizes
 * multi-column layouts.
 *
 * @throws CorruptDocumentError - Password-protected, invalid or corrupt PDF
 */
export async function extractPdf(
  buffer: Buffer,
  fileSize?: number
): Promise<ExtractionResult> {
  const { extractText, getMeta, getDocumentProxy } = await import('unpdf')

  try {
    const pdf = await getDocumentProxy(new Uint8Array(buffer))

    const { totalPages, text: pages } = await extractText(pdf, { mergePages: false })

    const text = pages.join('\n\n').normalize('NFC')

    const quality = measureTextQuality(text, fileSize ?? buffer.length)

    let metadata: DocumentMetadata = {}
    try {
      const { info } = await getMeta(pdf)
      metadata = {
        title: metaString(info?.Title),
        author: metaString(info?.Author),
        creationDate: metaString(info?.CreationDate),
        modificationDate: metaString(info?.ModDate),
      }
    } catch {
      // Metadata is optional; the text is what matters
    }

    await pdf.destroy()

    return {
      text,
      format: 'pdf',
      quality,
      structure: { format: 'pdf', pageCount: totalPages },
      metadata,
    }
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : String(error)

    if (errorMessage.includes('password') || errorMessage.includes('encrypted')) {
      throw new CorruptDocumentError(
        'This PDF is password-protected. Remove the password and upload it again.',
        { cause: error }
      )
    }
    throw new CorruptDocumentError(
      'Could not read this PDF. It may be corrupt or not a PDF file.',
      { cause: error }
    )
  }
}
