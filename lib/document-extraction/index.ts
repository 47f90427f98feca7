/**
 * @fileoverview Document extraction module
 *
 * The PDF extractor is not re-exported: it is loaded on demand by
 * extractDocument so PDF.js stays out of module evaluation.
 *
 * @module lib/document-extraction
 */

export type {
  ExtractionResult,
  QualityMetrics,
  ExtractionWarning,
  DocumentMetadata,
  DocumentStructure,
  SheetSummary,
} from './types'

export { extractDocx } from './docx-extractor'
export { extractXlsx } from './xlsx-extractor'
export { measureTextQuality, MIN_TEXT_LENGTH } from './quality'
export {
  extractDocument,
  getFileExtension,
  isSupportedExtension,
} from './extract-document'
