import { z } from 'zod'

// ============================================================================
// Risk Levels
// ============================================================================

/** Traffic-light risk levels, ordered from most to least severe */
export const RISK_LEVELS = ['Red', 'Yellow', 'Green'] as const

export type RiskLevel = (typeof RISK_LEVELS)[number]

/** Sort priority: Red first */
export const RISK_PRIORITY: Record<RiskLevel, number> = {
  Red: 0,
  Yellow: 1,
  Green: 2,
}

/**
 * Maps a model-supplied risk label onto a RiskLevel.
 * `red`/`high` → Red, `yellow`/`medium` → Yellow, anything else → Green.
 */
export function normalizeRiskLevel(value: unknown): RiskLevel {
  const label = typeof value === 'string' ? value.trim().toLowerCase() : ''
  if (label === 'red' || label === 'high') return 'Red'
  if (label === 'yellow' || label === 'medium') return 'Yellow'
  return 'Green'
}

// ============================================================================
// Lenient field helpers
// ============================================================================

/** Scalar text; null/missing → '' and numbers/booleans stringified */
function toText(value: unknown): string {
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  return ''
}

/** List of text; a bare string becomes a one-item list, blanks are dropped */
function toTextList(value: unknown): string[] {
  const items = Array.isArray(value) ? value : [value]
  return items.map(toText).filter((item) => item.trim() !== '')
}

// Keys the model leaves out parse as undefined and take the field default
const text = z.unknown().optional().transform(toText)
const textList = z.unknown().optional().transform(toTextList)
const riskLevel = z.unknown().optional().transform(normalizeRiskLevel)

/** A list of objects; null/missing → [] but any other non-array is rejected */
function objectList<T extends z.ZodType>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((items) => items ?? [])
}

// ============================================================================
// Clause Entries
// ============================================================================

export const preferredPositionSchema = z
  .union([
    z.string().transform((description) => ({ description, sampleLanguage: '' })),
    z.object({ description: text, sampleLanguage: text }),
  ])
  .nullish()
  .transform((position) => position ?? { description: '', sampleLanguage: '' })

export const fallbackPositionSchema = z.object({
  description: text,
  sampleLanguage: text,
  conditions: text,
  tradeOffs: text,
})

export const positionToAvoidSchema = z.object({
  description: text,
  reason: text,
  redFlagLanguage: text,
})

export const clauseEntrySchema = z.object({
  sectionReference: text,
  subpart: text,
  clauseTitle: text,
  originalLanguage: text,
  customerIssues: textList,
  customerEditsToConsider: textList,
  providerIssues: textList,
  providerEditsToConsider: textList,
  preferredPosition: preferredPositionSchema,
  fallbackPositions: objectList(fallbackPositionSchema),
  positionsToAvoid: objectList(positionToAvoidSchema),
  riskLevel,
  approvalRequired: text,
  negotiationTips: textList,
})

export type ClauseEntry = z.infer<typeof clauseEntrySchema>
export type FallbackPosition = z.infer<typeof fallbackPositionSchema>
export type PositionToAvoid = z.infer<typeof positionToAvoidSchema>

// ============================================================================
// Definitions
// ============================================================================

export const definitionEntrySchema = z.object({
  term: text,
  definition: text,
  importance: text,
  customerConsiderations: text,
  providerConsiderations: text,
  suggestedModifications: text,
})

export type DefinitionEntry = z.infer<typeof definitionEntrySchema>

// ============================================================================
// Summary & Strategy
// ============================================================================

export const agreementSummarySchema = z.object({
  title: text,
  agreementType: text,
  parties: text,
  purpose: text,
  keyDates: text,
  governingLaw: text,
  overallRiskLevel: text,
  criticalIssuesCount: z.unknown().optional().transform((value) => {
    const count = typeof value === 'number' ? value : Number.parseInt(toText(value), 10)
    return Number.isFinite(count) && count >= 0 ? Math.floor(count) : 0
  }),
  executiveSummary: text,
})

export type AgreementSummary = z.infer<typeof agreementSummarySchema>

export const negotiationStrategySchema = z.object({
  openingPosition: text,
  keyLeveragePoints: textList,
  potentialTradeOffs: textList,
  walkAwayTriggers: textList,
})

export type NegotiationStrategy = z.infer<typeof negotiationStrategySchema>

// ============================================================================
// Per-chunk analysis
// ============================================================================

/**
 * The object a single model reply must contain. Every section is optional
 * so a chunk with nothing to say (e.g. a signature page) still parses.
 */
export const chunkAnalysisSchema = z.object({
  agreementSummary: agreementSummarySchema.nullish(),
  clauses: objectList(clauseEntrySchema),
  definitions: objectList(definitionEntrySchema),
  negotiationStrategy: negotiationStrategySchema.nullish(),
})

export type ChunkAnalysis = z.infer<typeof chunkAnalysisSchema>

// ============================================================================
// Merged playbook
// ============================================================================

export interface QuickReference {
  dealBreakers: string[]
  highPriorityItems: string[]
  standardAcceptableTerms: string[]
  recommendedOrderOfNegotiation: string[]
}

export interface Playbook {
  summary: AgreementSummary
  clauses: ClauseEntry[]
  definitions: DefinitionEntry[]
  quickReference: QuickReference
  negotiationStrategy: NegotiationStrategy
  riskDistribution: Record<RiskLevel, number>
  /** Caveats about the analysis itself, e.g. sections that could not be analyzed */
  analysisNotes: string[]
  generatedAt: Date
}

// ============================================================================
// Requests
// ============================================================================

/** Negotiation context supplied with the upload */
export interface AnalysisContext {
  agreementType: string
  userRole: string
  riskTolerance: string
}

export const DEFAULT_ANALYSIS_CONTEXT: AnalysisContext = {
  agreementType: 'General Agreement',
  userRole: 'Customer',
  riskTolerance: 'Moderate',
}

/** One chunk's worth of work for the analyst */
export interface AnalysisRequest extends AnalysisContext {
  text: string
  chunkIndex: number
  chunkCount: number
}

/** Legal disclaimer for all outputs */
export const LEGAL_DISCLAIMER =
  'This analysis is AI-generated and does not constitute legal advice. ' +
  'Consult a qualified attorney for legal guidance.'
