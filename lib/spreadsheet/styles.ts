/**
 * @fileoverview Shared cell styles for the playbook workbook
 *
 * @module lib/spreadsheet/styles
 */

import type { Alignment, Borders, Fill, Font } from 'exceljs'
import { normalizeRiskLevel, type RiskLevel } from '@/agents/types'

/** RGB hex colours (ExcelJS wants ARGB; see {@link solidFill}) */
export const COLORS = {
  headerBg: '1F4E79',
  headerFg: 'FFFFFF',
  red: 'FFCCCC',
  yellow: 'FFFFCC',
  green: 'CCFFCC',
  altRow: 'F2F2F2',
  border: 'CCCCCC',
} as const

export function solidFill(rgb: string): Fill {
  return { type: 'pattern', pattern: 'solid', fgColor: { argb: `FF${rgb}` } }
}

const RISK_COLORS: Record<RiskLevel, string> = {
  Red: COLORS.red,
  Yellow: COLORS.yellow,
  Green: COLORS.green,
}

/** Fill for a risk label; unknown labels are treated as Green */
export function riskFill(level: string): Fill {
  return solidFill(RISK_COLORS[normalizeRiskLevel(level)])
}

export const HEADER_FONT: Partial<Font> = {
  bold: true,
  size: 11,
  color: { argb: `FF${COLORS.headerFg}` },
}
export const HEADER_FILL = solidFill(COLORS.headerBg)
export const ALT_ROW_FILL = solidFill(COLORS.altRow)

export const TITLE_FONT: Partial<Font> = { bold: true, size: 16 }
export const SUBTITLE_FONT: Partial<Font> = { bold: true, size: 12 }
export const LABEL_FONT: Partial<Font> = { bold: true }

export const WRAP_ALIGNMENT: Partial<Alignment> = { wrapText: true, vertical: 'top' }
export const CENTER_ALIGNMENT: Partial<Alignment> = {
  horizontal: 'center',
  vertical: 'middle',
}

const thin = { style: 'thin', color: { argb: `FF${COLORS.border}` } } as const

export const THIN_BORDER: Partial<Borders> = {
  top: thin,
  left: thin,
  bottom: thin,
  right: thin,
}
