/**
 * @fileoverview Playbook workbook renderer
 *
 * Writes a {@link Playbook} as a four-sheet workbook:
 *
 * 1. Overview: agreement summary, risk legend, analysis notes and the
 *    top deal breakers / high-priority items
 * 2. Clause Analysis: one row per clause across 15 columns
 * 3. Definitions: one row per defined term
 * 4. Quick Reference: risk buckets, negotiation order and strategy
 *
 * @module lib/spreadsheet/playbook-workbook
 */

import ExcelJS from 'exceljs'
import type { Fill, Workbook, Worksheet } from 'exceljs'
import {
  LEGAL_DISCLAIMER,
  type ClauseEntry,
  type FallbackPosition,
  type Playbook,
  type PositionToAvoid,
} from '@/agents/types'
import { RenderFailureError } from '@/lib/errors'
import { logger } from '@/lib/logger'
import {
  ALT_ROW_FILL,
  CENTER_ALIGNMENT,
  HEADER_FILL,
  HEADER_FONT,
  LABEL_FONT,
  SUBTITLE_FONT,
  THIN_BORDER,
  TITLE_FONT,
  WRAP_ALIGNMENT,
  riskFill,
} from './styles'

export const SHEET_NAMES = {
  overview: 'Overview',
  clauses: 'Clause Analysis',
  definitions: 'Definitions',
  quickReference: 'Quick Reference',
} as const

export const CLAUSE_HEADERS = [
  'Section',
  'Subpart',
  'Issue',
  'Existing Language',
  'Customer Issues',
  'Customer Edits',
  'Provider Issues',
  'Provider Edits',
  'Preferred Position',
  'Preferred Language',
  'Fallback Positions',
  "Don't Accept",
  'Risk',
  'Approval',
  'Negotiation Tips',
] as const

export const DEFINITION_HEADERS = [
  'Term',
  'Definition',
  'Why It Matters',
  'Customer Considerations',
  'Provider Considerations',
  'Suggested Modifications',
] as const

/** 1-based column of the Risk cell on the Clause Analysis sheet */
const RISK_COLUMN = CLAUSE_HEADERS.indexOf('Risk') + 1

/** Items per bucket on the Overview sheet */
const OVERVIEW_LIST_LIMIT = 15

// ============================================================================
// Cell text formatting
// ============================================================================

/** `• item` lines; leading bullets/dashes in the source are stripped */
export function formatList(items: string[]): string {
  return items
    .map((item) => item.replace(/^[•\-*\s]+/, '').trim())
    .filter((item) => item !== '')
    .map((item) => `• ${item}`)
    .join('\n')
}

export function formatFallbacks(fallbacks: FallbackPosition[]): string {
  return fallbacks
    .map((fallback, i) => {
      const lines = [`${i + 1}. ${fallback.description}`]
      if (fallback.sampleLanguage) lines.push(`   Language: ${fallback.sampleLanguage}`)
      if (fallback.conditions) lines.push(`   When: ${fallback.conditions}`)
      if (fallback.tradeOffs) lines.push(`   Trade-off: ${fallback.tradeOffs}`)
      return lines.join('\n')
    })
    .join('\n\n')
}

export function formatPositionsToAvoid(positions: PositionToAvoid[]): string {
  return positions
    .map((position) => {
      const lines = [`✗ ${position.description}`]
      if (position.reason) lines.push(`  Reason: ${position.reason}`)
      if (position.redFlagLanguage) lines.push(`  Red flag: "${position.redFlagLanguage}"`)
      return lines.join('\n')
    })
    .join('\n')
}

function formatDate(date: Date): string {
  return date.toLocaleDateString('en-US', { year: 'numeric', month: 'long', day: 'numeric' })
}

// ============================================================================
// Sheet helpers
// ============================================================================

function setColumnWidths(sheet: Worksheet, widths: Record<string, number>) {
  for (const [column, width] of Object.entries(widths)) {
    sheet.getColumn(column).width = width
  }
}

/** Bold heading merged across `A:<lastColumn>` */
function writeHeading(
  sheet: Worksheet,
  row: number,
  text: string,
  lastColumn: string,
  fill?: Fill
) {
  const cell = sheet.getCell(`A${row}`)
  cell.value = text
  cell.font = SUBTITLE_FONT
  if (fill) cell.fill = fill
  sheet.mergeCells(`A${row}:${lastColumn}${row}`)
}

/** One merged line per item; returns the next free row */
function writeItems(
  sheet: Worksheet,
  startRow: number,
  items: string[],
  prefix: (index: number) => string,
  fromColumn: string,
  lastColumn: string
): number {
  let row = startRow
  items.forEach((item, i) => {
    sheet.getCell(`${fromColumn}${row}`).value = `${prefix(i)}${item}`
    sheet.mergeCells(`${fromColumn}${row}:${lastColumn}${row}`)
    row++
  })
  return row
}

function writeHeaderRow(sheet: Worksheet, headers: readonly string[]) {
  const header = sheet.getRow(1)
  headers.forEach((title, i) => {
    const cell = header.getCell(i + 1)
    cell.value = title
    cell.font = HEADER_FONT
    cell.fill = HEADER_FILL
    cell.alignment = CENTER_ALIGNMENT
    cell.border = THIN_BORDER
  })
}

// ============================================================================
// Sheets
// ============================================================================

function addOverviewSheet(workbook: Workbook, playbook: Playbook) {
  const sheet = workbook.addWorksheet(SHEET_NAMES.overview)
  const { summary, quickReference } = playbook

  sheet.getCell('A1').value = 'CONTRACT PLAYBOOK'
  sheet.getCell('A1').font = TITLE_FONT
  sheet.mergeCells('A1:D1')

  sheet.getCell('A2').value = `Generated: ${formatDate(playbook.generatedAt)}`
  sheet.getCell('A2').font = { italic: true }
  sheet.mergeCells('A2:D2')

  writeHeading(sheet, 4, 'AGREEMENT SUMMARY', 'D')

  const rows: Array<[string, string]> = [
    ['Agreement Title:', summary.title || 'Not specified'],
    ['Agreement Type:', summary.agreementType || 'Not specified'],
    ['Parties:', summary.parties || 'Not specified'],
    ['Purpose:', summary.purpose || 'Not specified'],
    ['Key Dates/Terms:', summary.keyDates || 'Not specified'],
    ['Governing Law:', summary.governingLaw || 'Not specified'],
    ['Overall Risk Level:', summary.overallRiskLevel || 'Not specified'],
    ['Critical Issues:', String(summary.criticalIssuesCount)],
  ]

  let row = 6
  for (const [label, value] of rows) {
    sheet.getCell(`A${row}`).value = label
    sheet.getCell(`A${row}`).font = LABEL_FONT
    sheet.getCell(`B${row}`).value = value
    sheet.getCell(`B${row}`).alignment = WRAP_ALIGNMENT
    row++
  }

  row++
  writeHeading(sheet, row, 'EXECUTIVE SUMMARY', 'D')
  row++
  sheet.getCell(`A${row}`).value = summary.executiveSummary
  sheet.getCell(`A${row}`).alignment = WRAP_ALIGNMENT
  sheet.mergeCells(`A${row}:D${row}`)
  sheet.getRow(row).height = 80

  row += 3
  writeHeading(sheet, row, 'RISK LEVEL LEGEND', 'D')
  row += 2
  const legend: Array<[string, string]> = [
    ['Red', 'Deal breaker - requires legal review and executive approval'],
    ['Yellow', 'Needs attention - requires manager or legal approval'],
    ['Green', 'Acceptable - can proceed without escalation'],
  ]
  for (const [level, meaning] of legend) {
    sheet.getCell(`A${row}`).value = level
    sheet.getCell(`A${row}`).fill = riskFill(level)
    sheet.getCell(`B${row}`).value = meaning
    row++
  }

  if (playbook.analysisNotes.length > 0) {
    row += 2
    writeHeading(sheet, row, 'ANALYSIS NOTES', 'D')
    row = writeItems(sheet, row + 1, playbook.analysisNotes, () => '• ', 'A', 'D')
  }

  row += 2
  writeHeading(sheet, row, 'DEAL BREAKERS (Do Not Accept)', 'D', riskFill('Red'))
  row = writeItems(
    sheet,
    row + 1,
    quickReference.dealBreakers.slice(0, OVERVIEW_LIST_LIMIT),
    () => '✗ ',
    'A',
    'D'
  )

  row++
  writeHeading(sheet, row, 'HIGH PRIORITY ITEMS', 'D', riskFill('Yellow'))
  row = writeItems(
    sheet,
    row + 1,
    quickReference.highPriorityItems.slice(0, OVERVIEW_LIST_LIMIT),
    () => '⚠ ',
    'A',
    'D'
  )

  row++
  sheet.getCell(`A${row}`).value = LEGAL_DISCLAIMER
  sheet.getCell(`A${row}`).font = { italic: true, size: 9 }
  sheet.getCell(`A${row}`).alignment = WRAP_ALIGNMENT
  sheet.mergeCells(`A${row}:D${row}`)

  setColumnWidths(sheet, { A: 25, B: 60, C: 30, D: 30 })
}

function clauseRowValues(clause: ClauseEntry): string[] {
  return [
    clause.sectionReference,
    clause.subpart,
    clause.clauseTitle,
    clause.originalLanguage,
    formatList(clause.customerIssues),
    formatList(clause.customerEditsToConsider),
    formatList(clause.providerIssues),
    formatList(clause.providerEditsToConsider),
    clause.preferredPosition.description,
    clause.preferredPosition.sampleLanguage,
    formatFallbacks(clause.fallbackPositions),
    formatPositionsToAvoid(clause.positionsToAvoid),
    clause.riskLevel,
    clause.approvalRequired || 'None',
    formatList(clause.negotiationTips),
  ]
}

function addClauseSheet(workbook: Workbook, playbook: Playbook) {
  const sheet = workbook.addWorksheet(SHEET_NAMES.clauses, {
    views: [{ state: 'frozen', xSplit: 3, ySplit: 1 }],
  })
  writeHeaderRow(sheet, CLAUSE_HEADERS)

  playbook.clauses.forEach((clause, i) => {
    const rowNumber = i + 2
    const row = sheet.getRow(rowNumber)
    row.values = clauseRowValues(clause)
    row.height = 80

    for (let column = 1; column <= CLAUSE_HEADERS.length; column++) {
      const cell = row.getCell(column)
      cell.alignment = WRAP_ALIGNMENT
      cell.border = THIN_BORDER
      if (column === RISK_COLUMN) {
        cell.fill = riskFill(clause.riskLevel)
        cell.alignment = { ...WRAP_ALIGNMENT, ...CENTER_ALIGNMENT }
      } else if (rowNumber % 2 === 0) {
        cell.fill = ALT_ROW_FILL
      }
    }
  })

  setColumnWidths(sheet, {
    A: 10, B: 10, C: 25, D: 50, E: 40, F: 45, G: 40, H: 45,
    I: 35, J: 50, K: 45, L: 40, M: 10, N: 12, O: 45,
  })
}

function addDefinitionsSheet(workbook: Workbook, playbook: Playbook) {
  const sheet = workbook.addWorksheet(SHEET_NAMES.definitions, {
    views: [{ state: 'frozen', xSplit: 0, ySplit: 1 }],
  })
  writeHeaderRow(sheet, DEFINITION_HEADERS)

  playbook.definitions.forEach((definition, i) => {
    const rowNumber = i + 2
    const row = sheet.getRow(rowNumber)
    row.values = [
      definition.term,
      definition.definition,
      definition.importance,
      definition.customerConsiderations,
      definition.providerConsiderations,
      definition.suggestedModifications,
    ]
    row.height = 60

    for (let column = 1; column <= DEFINITION_HEADERS.length; column++) {
      const cell = row.getCell(column)
      cell.alignment = WRAP_ALIGNMENT
      cell.border = THIN_BORDER
      if (rowNumber % 2 === 0) cell.fill = ALT_ROW_FILL
    }
  })

  setColumnWidths(sheet, { A: 25, B: 50, C: 35, D: 35, E: 35, F: 40 })
}

function addQuickReferenceSheet(workbook: Workbook, playbook: Playbook) {
  const sheet = workbook.addWorksheet(SHEET_NAMES.quickReference)
  const { quickReference, negotiationStrategy } = playbook

  sheet.getCell('A1').value = 'QUICK REFERENCE GUIDE'
  sheet.getCell('A1').font = TITLE_FONT
  sheet.mergeCells('A1:C1')

  let row = 3
  writeHeading(sheet, row, 'DEAL BREAKERS - Never Accept These Terms', 'C', riskFill('Red'))
  row = writeItems(sheet, row + 1, quickReference.dealBreakers, () => '✗ ', 'A', 'C') + 1

  writeHeading(sheet, row, 'HIGH PRIORITY - Requires Approval for Deviation', 'C', riskFill('Yellow'))
  row = writeItems(sheet, row + 1, quickReference.highPriorityItems, () => '⚠ ', 'A', 'C') + 1

  writeHeading(sheet, row, 'STANDARD ACCEPTABLE TERMS', 'C', riskFill('Green'))
  row = writeItems(sheet, row + 1, quickReference.standardAcceptableTerms, () => '✓ ', 'A', 'C') + 1

  writeHeading(sheet, row, 'RECOMMENDED ORDER OF NEGOTIATION', 'C')
  row = writeItems(
    sheet,
    row + 1,
    quickReference.recommendedOrderOfNegotiation,
    (i) => `${i + 1}. `,
    'A',
    'C'
  )

  row += 2
  writeHeading(sheet, row, 'NEGOTIATION STRATEGY', 'C')
  row += 2

  sheet.getCell(`A${row}`).value = 'Opening Position:'
  sheet.getCell(`A${row}`).font = LABEL_FONT
  sheet.getCell(`B${row}`).value = negotiationStrategy.openingPosition
  sheet.getCell(`B${row}`).alignment = WRAP_ALIGNMENT
  sheet.mergeCells(`B${row}:C${row}`)
  row += 1

  const lists: Array<[string, string[], string, Fill | undefined]> = [
    ['Key Leverage Points:', negotiationStrategy.keyLeveragePoints, '• ', undefined],
    ['Potential Trade-offs:', negotiationStrategy.potentialTradeOffs, '• ', undefined],
    ['Walk-Away Triggers:', negotiationStrategy.walkAwayTriggers, '✗ ', riskFill('Red')],
  ]
  lists.forEach(([label, items, bullet, fill], i) => {
    if (i > 0) row++
    sheet.getCell(`A${row}`).value = label
    sheet.getCell(`A${row}`).font = LABEL_FONT
    if (fill) sheet.getCell(`A${row}`).fill = fill
    row = writeItems(sheet, row + 1, items, () => bullet, 'B', 'C')
  })

  setColumnWidths(sheet, { A: 25, B: 50, C: 30 })
}

// ============================================================================
// Public API
// ============================================================================

export function buildPlaybookWorkbook(playbook: Playbook): Workbook {
  const workbook = new ExcelJS.Workbook()
  workbook.creator = 'Contract Playbook Builder'
  workbook.title = playbook.summary.title
  workbook.created = playbook.generatedAt

  addOverviewSheet(workbook, playbook)
  addClauseSheet(workbook, playbook)
  addDefinitionsSheet(workbook, playbook)
  addQuickReferenceSheet(workbook, playbook)

  return workbook
}

/**
 * Renders the playbook to `outputPath`.
 *
 * @throws RenderFailureError - the workbook could not be built or written
 */
export async function renderPlaybook(playbook: Playbook, outputPath: string): Promise<string> {
  try {
    await buildPlaybookWorkbook(playbook).xlsx.writeFile(outputPath)
  } catch (error) {
    throw new RenderFailureError(
      `Could not write the playbook spreadsheet: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    )
  }

  logger.info('Playbook rendered', {
    outputPath,
    clauseCount: playbook.clauses.length,
    definitionCount: playbook.definitions.length,
  })
  return outputPath
}
