// lib/spreadsheet/playbook-workbook.test.ts
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import ExcelJS from 'exceljs'
import { buildClause, buildDefinition, clauseWithRisk } from '@/agents/testing/fixtures'
import { DEFAULT_ANALYSIS_CONTEXT, type Playbook } from '@/agents/types'
import { RenderFailureError } from '@/lib/errors'
import { mergeChunkResults } from '@/lib/playbook'
import {
  CLAUSE_HEADERS,
  SHEET_NAMES,
  buildPlaybookWorkbook,
  formatFallbacks,
  formatList,
  formatPositionsToAvoid,
  renderPlaybook,
} from './playbook-workbook'
import { riskFill, solidFill } from './styles'

function samplePlaybook(): Playbook {
  return mergeChunkResults(
    [
      {
        chunkIndex: 0,
        analysis: {
          agreementSummary: {
            title: 'Master Services Agreement',
            agreementType: 'MSA',
            parties: 'Acme Corp and Vendor Inc',
            purpose: 'Hosting',
            keyDates: '',
            governingLaw: 'Delaware',
            overallRiskLevel: 'Red',
            criticalIssuesCount: 1,
            executiveSummary: 'Liability terms need work.',
          },
          clauses: [
            buildClause(),
            clauseWithRisk('Payment Terms', 'Yellow', '4.1'),
            clauseWithRisk('Governing Law', 'Green', '12'),
          ],
          definitions: [buildDefinition('Fees'), buildDefinition('Services')],
          negotiationStrategy: {
            openingPosition: 'Lead with the liability cap',
            keyLeveragePoints: ['Multi-year commitment'],
            potentialTradeOffs: ['Longer payment terms'],
            walkAwayTriggers: ['Uncapped liability'],
          },
        },
      },
    ],
    DEFAULT_ANALYSIS_CONTEXT
  )
}

describe('formatList', () => {
  it('bullets each item and strips existing bullets', () => {
    expect(formatList(['- first', '• second', '* third', '   '])).toBe(
      '• first\n• second\n• third'
    )
  })

  it('returns an empty string for an empty list', () => {
    expect(formatList([])).toBe('')
  })
})

describe('formatFallbacks', () => {
  it('numbers each fallback and includes only present details', () => {
    expect(
      formatFallbacks([
        { description: 'Cap at 24 months', sampleLanguage: 'Cap language', conditions: '', tradeOffs: 'More exposure' },
        { description: 'Carve out data breaches', sampleLanguage: '', conditions: '', tradeOffs: '' },
      ])
    ).toBe(
      '1. Cap at 24 months\n   Language: Cap language\n   Trade-off: More exposure\n\n2. Carve out data breaches'
    )
  })
})

describe('formatPositionsToAvoid', () => {
  it('marks each position and quotes red-flag language', () => {
    expect(
      formatPositionsToAvoid([
        { description: 'Unlimited liability', reason: 'Uninsurable', redFlagLanguage: 'shall be unlimited' },
      ])
    ).toBe('✗ Unlimited liability\n  Reason: Uninsurable\n  Red flag: "shall be unlimited"')
  })
})

describe('buildPlaybookWorkbook', () => {
  it('creates the four sheets in order', () => {
    const workbook = buildPlaybookWorkbook(samplePlaybook())
    expect(workbook.worksheets.map((sheet) => sheet.name)).toEqual([
      SHEET_NAMES.overview,
      SHEET_NAMES.clauses,
      SHEET_NAMES.definitions,
      SHEET_NAMES.quickReference,
    ])
  })

  it('writes the agreement summary on the overview', () => {
    const sheet = buildPlaybookWorkbook(samplePlaybook()).getWorksheet(SHEET_NAMES.overview)

    expect(sheet?.getCell('A1').value).toBe('CONTRACT PLAYBOOK')
    expect(sheet?.getCell('A6').value).toBe('Agreement Title:')
    expect(sheet?.getCell('B6').value).toBe('Master Services Agreement')
    expect(sheet?.getCell('B10').value).toBe('Not specified')
    expect(sheet?.getCell('B13').value).toBe('1')
    expect(sheet?.getCell('A15').value).toBe('EXECUTIVE SUMMARY')
    expect(sheet?.getCell('A16').value).toBe('Liability terms need work.')
  })

  it('lays out the clause sheet with a fixed header and risk fills', () => {
    const sheet = buildPlaybookWorkbook(samplePlaybook()).getWorksheet(SHEET_NAMES.clauses)

    expect(sheet?.getRow(1).values).toEqual([undefined, ...CLAUSE_HEADERS])
    expect(sheet?.views[0]).toMatchObject({ state: 'frozen', xSplit: 3, ySplit: 1 })

    expect(sheet?.getCell('A2').value).toBe('9.1')
    expect(sheet?.getCell('C2').value).toBe('Limitation of Liability')
    expect(sheet?.getCell('E2').value).toBe('• Customer liability is uncapped')
    expect(sheet?.getCell('M2').value).toBe('Red')
    expect(sheet?.getCell('M2').fill).toEqual(riskFill('Red'))
    expect(sheet?.getCell('M3').fill).toEqual(riskFill('Yellow'))
    expect(sheet?.getCell('M4').fill).toEqual(riskFill('Green'))
  })

  it('shades even rows except the risk column', () => {
    const sheet = buildPlaybookWorkbook(samplePlaybook()).getWorksheet(SHEET_NAMES.clauses)

    expect(sheet?.getCell('A2').fill).toEqual(solidFill('F2F2F2'))
    expect(sheet?.getCell('O4').fill).toEqual(solidFill('F2F2F2'))
    expect(sheet?.getCell('A3').fill).toBeUndefined()
  })

  it('writes one definition per row', () => {
    const sheet = buildPlaybookWorkbook(samplePlaybook()).getWorksheet(SHEET_NAMES.definitions)

    expect(sheet?.getCell('A1').value).toBe('Term')
    expect(sheet?.getCell('A2').value).toBe('Fees')
    expect(sheet?.getCell('B3').value).toBe('Definition of Services')
  })

  it('numbers the recommended order on the quick reference', () => {
    const sheet = buildPlaybookWorkbook(samplePlaybook()).getWorksheet(SHEET_NAMES.quickReference)

    // Rows: 3 heading, 4 deal breaker, 6 heading, 7 high priority,
    // 9 heading, 10 standard, 12 heading, 13-15 order
    expect(sheet?.getCell('A4').value).toBe('✗ 9.1: Limitation of Liability')
    expect(sheet?.getCell('A7').value).toBe('⚠ 4.1: Payment Terms')
    expect(sheet?.getCell('A10').value).toBe('✓ 12: Governing Law')
    expect(sheet?.getCell('A13').value).toBe('1. 9.1: Limitation of Liability')
    expect(sheet?.getCell('A15').value).toBe('3. 12: Governing Law')
  })
})

describe('renderPlaybook', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'playbook-render-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('writes a readable xlsx file', async () => {
    const outputPath = path.join(dir, 'Playbook_test.xlsx')

    await expect(renderPlaybook(samplePlaybook(), outputPath)).resolves.toBe(outputPath)

    const workbook = new ExcelJS.Workbook()
    await workbook.xlsx.readFile(outputPath)
    expect(workbook.getWorksheet(SHEET_NAMES.clauses)?.getCell('C3').value).toBe('Payment Terms')
  })

  it('wraps write failures in RenderFailureError', async () => {
    const outputPath = path.join(dir, 'missing', 'Playbook_test.xlsx')

    await expect(renderPlaybook(samplePlaybook(), outputPath)).rejects.toBeInstanceOf(
      RenderFailureError
    )
  })
})
