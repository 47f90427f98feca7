export {
  buildPlaybookWorkbook,
  renderPlaybook,
  formatList,
  formatFallbacks,
  formatPositionsToAvoid,
  SHEET_NAMES,
  CLAUSE_HEADERS,
  DEFINITION_HEADERS,
} from './playbook-workbook'
export { COLORS, riskFill, solidFill } from './styles'
