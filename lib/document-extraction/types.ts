/**
 * @fileoverview Document extraction type definitions
 * @module lib/document-extraction/types
 */

import type { SupportedExtension } from '@/lib/config'

export interface ExtractionWarning {
  type: 'low_text' | 'low_confidence' | 'docx_warning' | 'embedded_images'
  message: string
}

export interface QualityMetrics {
  /** Total character count after normalization */
  charCount: number
  /** Estimated word count */
  wordCount: number
  /** Extraction confidence 0-1 based on text density */
  confidence: number
  /** Warnings from extraction process */
  warnings: ExtractionWarning[]
}

export interface DocumentMetadata {
  title?: string
  author?: string
  creationDate?: string
  modificationDate?: string
}

export interface SheetSummary {
  name: string
  /** Rows holding at least one non-empty cell */
  rowCount: number
}

/** Per-format structural facts about the source document */
export type DocumentStructure =
  | { format: 'pdf'; pageCount: number }
  | { format: 'docx'; paragraphCount: number }
  | { format: 'xlsx'; sheets: SheetSummary[] }

export interface ExtractionResult {
  /** Extracted text, NFC-normalized UTF-8 */
  text: string
  format: SupportedExtension
  /** Quality metrics for logging and warnings */
  quality: QualityMetrics
  structure: DocumentStructure
  /** Document metadata if available */
  metadata: DocumentMetadata
}
