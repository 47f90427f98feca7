/**
 * @fileoverview XLSX text extraction
 *
 * Flattens every worksheet into lines of ` | `-joined cell text under a
 * `--- Sheet: <name> ---` heading. Sheets without any text are skipped.
 *
 * @module lib/document-extraction/xlsx-extractor
 */

import { Readable } from 'node:stream'
import ExcelJS from 'exceljs'
import { CorruptDocumentError } from '@/lib/errors'
import type { ExtractionResult, SheetSummary } from './types'
import { measureTextQuality } from './quality'

/**
 * Extracts text from an XLSX buffer.
 *
 * @throws CorruptDocumentError - Invalid or corrupt workbook
 */
export async function extractXlsx(
  buffer: Buffer,
  fileSize?: number
): Promise<ExtractionResult> {
  const workbook = new ExcelJS.Workbook()
  try {
    await workbook.xlsx.read(Readable.from(buffer))
  } catch (error) {
    throw new CorruptDocumentError(
      'Could not read this spreadsheet. It may be corrupt or not an .xlsx file.',
      { cause: error }
    )
  }

  const blocks: string[] = []
  const sheets: SheetSummary[] = []

  workbook.eachSheet((worksheet) => {
    const lines: string[] = []

    worksheet.eachRow({ includeEmpty: false }, (row) => {
      const cells: string[] = []
      row.eachCell({ includeEmpty: false }, (cell) => {
        const value = cell.text
        if (value) cells.push(value)
      })
      if (cells.length > 0) {
        lines.push(cells.join(' | '))
      }
    })

    sheets.push({ name: worksheet.name, rowCount: lines.length })

    if (lines.length > 0) {
      blocks.push(`--- Sheet: ${worksheet.name} ---\n${lines.join('\n')}`)
    }
  })

  const text = blocks.join('\n\n').normalize('NFC')

  return {
    text,
    format: 'xlsx',
    quality: measureTextQuality(text, fileSize ?? buffer.length),
    structure: { format: 'xlsx', sheets },
    metadata: {
      title: workbook.title || undefined,
      author: workbook.creator || undefined,
    },
  }
}
