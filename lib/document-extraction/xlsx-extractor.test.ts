import { describe, it, expect } from 'vitest'
import ExcelJS from 'exceljs'
import { extractXlsx } from './xlsx-extractor'
import { CorruptDocumentError } from '@/lib/errors'

async function workbookBuffer(build: (workbook: ExcelJS.Workbook) => void): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook()
  build(workbook)
  return Buffer.from(await workbook.xlsx.writeBuffer())
}

describe('extractXlsx', () => {
  it('flattens each sheet under a heading with pipe-joined cells', async () => {
    const buffer = await workbookBuffer((workbook) => {
      const terms = workbook.addWorksheet('Terms')
      terms.addRow(['Term', 'Value'])
      terms.addRow(['Party', null, 'Acme Corp'])
      terms.addRow(['Fee', 100])
      const notes = workbook.addWorksheet('Notes')
      notes.addRow(['Renewal is automatic'])
    })

    const result = await extractXlsx(buffer)

    expect(result.text).toBe(
      '--- Sheet: Terms ---\nTerm | Value\nParty | Acme Corp\nFee | 100\n\n' +
        '--- Sheet: Notes ---\nRenewal is automatic'
    )
    expect(result.format).toBe('xlsx')
    expect(result.structure).toEqual({
      format: 'xlsx',
      sheets: [
        { name: 'Terms', rowCount: 3 },
        { name: 'Notes', rowCount: 1 },
      ],
    })
  })

  it('skips sheets without any text', async () => {
    const buffer = await workbookBuffer((workbook) => {
      workbook.addWorksheet('Empty')
      workbook.addWorksheet('Data').addRow(['Only row'])
    })

    const result = await extractXlsx(buffer)

    expect(result.text).toBe('--- Sheet: Data ---\nOnly row')
  })

  it('flags short extractions', async () => {
    const buffer = await workbookBuffer((workbook) => {
      workbook.addWorksheet('Data').addRow(['Short'])
    })

    const result = await extractXlsx(buffer)

    expect(result.quality.warnings.map((w) => w.type)).toEqual(['low_text'])
  })

  it('rejects bytes that are not a workbook', async () => {
    await expect(extractXlsx(Buffer.from('not a zip archive'))).rejects.toBeInstanceOf(
      CorruptDocumentError
    )
  })
})
