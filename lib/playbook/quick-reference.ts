/**
 * @fileoverview Quick-reference derivation
 *
 * Partitions merged clauses by risk level and produces the risk-sorted
 * negotiation order shown on the Overview and Quick Reference sheets.
 *
 * @module lib/playbook/quick-reference
 */

import {
  RISK_LEVELS,
  RISK_PRIORITY,
  type ClauseEntry,
  type QuickReference,
  type RiskLevel,
} from "@/agents/types"

/** Items kept per risk bucket */
export const MAX_BUCKET_ITEMS = 15

/** Items kept in the recommended negotiation order */
export const MAX_RECOMMENDED_ITEMS = 10

/** `"<section>: <title>"`, or the title alone when there is no section */
export function clauseLabel(clause: ClauseEntry): string {
  const section = clause.sectionReference.trim()
  const title = clause.clauseTitle.trim() || "Untitled clause"
  return section ? `${section}: ${title}` : title
}

function labelsAt(clauses: ClauseEntry[], level: RiskLevel): string[] {
  return clauses
    .filter((clause) => clause.riskLevel === level)
    .slice(0, MAX_BUCKET_ITEMS)
    .map(clauseLabel)
}

export function buildQuickReference(clauses: ClauseEntry[]): QuickReference {
  // Array.prototype.sort is stable, so equal priorities keep encounter order
  const byPriority = [...clauses].sort(
    (a, b) => RISK_PRIORITY[a.riskLevel] - RISK_PRIORITY[b.riskLevel]
  )

  return {
    dealBreakers: labelsAt(clauses, "Red"),
    highPriorityItems: labelsAt(clauses, "Yellow"),
    standardAcceptableTerms: labelsAt(clauses, "Green"),
    recommendedOrderOfNegotiation: byPriority
      .slice(0, MAX_RECOMMENDED_ITEMS)
      .map(clauseLabel),
  }
}

export function computeRiskDistribution(
  clauses: ClauseEntry[]
): Record<RiskLevel, number> {
  const distribution: Record<RiskLevel, number> = { Red: 0, Yellow: 0, Green: 0 }
  for (const clause of clauses) {
    distribution[clause.riskLevel]++
  }
  return distribution
}

/** Most severe level present; Green for an empty list */
export function highestRiskLevel(clauses: ClauseEntry[]): RiskLevel {
  const distribution = computeRiskDistribution(clauses)
  return RISK_LEVELS.find((level) => distribution[level] > 0) ?? "Green"
}
