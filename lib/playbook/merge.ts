/**
 * @fileoverview Result Merger
 *
 * Combines the ordered per-chunk analyses of one document into a single
 * {@link Playbook}.
 *
 * - Clauses concatenate in chunk order.
 * - Definitions are deduplicated by case-insensitive term; first wins.
 * - Only the first analyzed chunk's agreement summary is used.
 * - Strategy lists concatenate with exact duplicates removed.
 *
 * @module lib/playbook/merge
 */

import type {
  AgreementSummary,
  AnalysisContext,
  ChunkAnalysis,
  ClauseEntry,
  DefinitionEntry,
  NegotiationStrategy,
  Playbook,
} from "@/agents/types"
import {
  buildQuickReference,
  computeRiskDistribution,
  highestRiskLevel,
} from "./quick-reference"

// ============================================================================
// Types
// ============================================================================

/** A chunk that was skipped after exhausting its attempts */
export interface ChunkFailure {
  chunkIndex: number
  code: string
  message: string
}

/** A successfully analyzed chunk */
export interface ChunkResult {
  chunkIndex: number
  analysis: ChunkAnalysis
}

export const INCONCLUSIVE_SUMMARY =
  "Analysis was inconclusive: no clauses could be identified in the document. " +
  "Review the source file and try again."

// ============================================================================
// Section mergers
// ============================================================================

export function dedupeDefinitions(definitions: DefinitionEntry[]): DefinitionEntry[] {
  const seen = new Set<string>()
  const unique: DefinitionEntry[] = []
  for (const definition of definitions) {
    const key = definition.term.trim().toLowerCase()
    if (!key || seen.has(key)) continue
    seen.add(key)
    unique.push(definition)
  }
  return unique
}

function uniqueConcat(lists: string[][]): string[] {
  return [...new Set(lists.flat())]
}

export function mergeStrategies(
  strategies: Array<NegotiationStrategy | null | undefined>
): NegotiationStrategy {
  const present = strategies.filter(
    (strategy): strategy is NegotiationStrategy => strategy != null
  )
  return {
    openingPosition:
      present.find((strategy) => strategy.openingPosition.trim() !== "")
        ?.openingPosition ?? "",
    keyLeveragePoints: uniqueConcat(present.map((s) => s.keyLeveragePoints)),
    potentialTradeOffs: uniqueConcat(present.map((s) => s.potentialTradeOffs)),
    walkAwayTriggers: uniqueConcat(present.map((s) => s.walkAwayTriggers)),
  }
}

function buildSummary(
  first: AgreementSummary | null | undefined,
  clauses: ClauseEntry[],
  context: AnalysisContext
): AgreementSummary {
  const redCount = clauses.filter((clause) => clause.riskLevel === "Red").length
  const summary: AgreementSummary = {
    title: first?.title || context.agreementType,
    agreementType: first?.agreementType || context.agreementType,
    parties: first?.parties ?? "",
    purpose: first?.purpose ?? "",
    keyDates: first?.keyDates ?? "",
    governingLaw: first?.governingLaw ?? "",
    overallRiskLevel: first?.overallRiskLevel || highestRiskLevel(clauses),
    criticalIssuesCount: first ? first.criticalIssuesCount : redCount,
    executiveSummary: first?.executiveSummary ?? "",
  }

  if (clauses.length === 0) {
    summary.executiveSummary = INCONCLUSIVE_SUMMARY
    summary.criticalIssuesCount = 0
  }

  return summary
}

function failureNotes(failures: ChunkFailure[], chunkCount: number): string[] {
  return [...failures]
    .sort((a, b) => a.chunkIndex - b.chunkIndex)
    .map(
      (failure) =>
        `Part ${failure.chunkIndex + 1} of ${chunkCount} could not be analyzed ` +
        `(${failure.code}): ${failure.message}`
    )
}

// ============================================================================
// mergeChunkResults
// ============================================================================

/**
 * Merges per-chunk analyses into a playbook.
 *
 * `results` may arrive in any order; they are merged by chunk index. An
 * empty `results` list still yields a complete playbook with an
 * inconclusive summary.
 */
export function mergeChunkResults(
  results: ChunkResult[],
  context: AnalysisContext,
  failures: ChunkFailure[] = []
): Playbook {
  const ordered = [...results].sort((a, b) => a.chunkIndex - b.chunkIndex)
  const analyses = ordered.map((result) => result.analysis)

  const clauses = analyses.flatMap((analysis) => analysis.clauses)
  const definitions = dedupeDefinitions(analyses.flatMap((analysis) => analysis.definitions))
  const firstSummary = analyses.find((analysis) => analysis.agreementSummary != null)
    ?.agreementSummary
  const chunkCount = results.length + failures.length

  return {
    summary: buildSummary(firstSummary, clauses, context),
    clauses,
    definitions,
    quickReference: buildQuickReference(clauses),
    negotiationStrategy: mergeStrategies(analyses.map((a) => a.negotiationStrategy)),
    riskDistribution: computeRiskDistribution(clauses),
    analysisNotes: failureNotes(failures, chunkCount),
    generatedAt: new Date(),
  }
}
