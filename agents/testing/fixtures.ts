import type { ClauseEntry, DefinitionEntry, RiskLevel } from '../types'

// ============================================================================
// Sample Clause Text
// ============================================================================

export const SAMPLE_LIABILITY_CLAUSE =
  'IN NO EVENT SHALL EITHER PARTY BE LIABLE FOR ANY INDIRECT, INCIDENTAL OR ' +
  'CONSEQUENTIAL DAMAGES. CUSTOMER\'S TOTAL LIABILITY SHALL BE UNLIMITED.'

export const SAMPLE_PAYMENT_CLAUSE =
  'Customer shall pay all invoices within fifteen (15) days of receipt. ' +
  'Late payments accrue interest at 1.5% per month.'

export const SAMPLE_GOVERNING_LAW_CLAUSE =
  'This Agreement shall be governed by and construed in accordance with ' +
  'the laws of the State of Delaware, without regard to its conflict of law provisions.'

// ============================================================================
// Builders
// ============================================================================

/** A fully-populated clause; override what the test cares about */
export function buildClause(overrides: Partial<ClauseEntry> = {}): ClauseEntry {
  return {
    sectionReference: '9.1',
    subpart: '',
    clauseTitle: 'Limitation of Liability',
    originalLanguage: SAMPLE_LIABILITY_CLAUSE,
    customerIssues: ['Customer liability is uncapped'],
    customerEditsToConsider: ['Make the cap mutual'],
    providerIssues: ['Needs protection from consequential damages'],
    providerEditsToConsider: ['Keep the consequential damages exclusion'],
    preferredPosition: {
      description: 'Mutual cap at 12 months of fees',
      sampleLanguage: 'Each party\'s total liability shall not exceed the fees paid in the prior twelve (12) months.',
    },
    fallbackPositions: [
      {
        description: 'Cap at 24 months of fees',
        sampleLanguage: 'Total liability shall not exceed fees paid in the prior twenty-four (24) months.',
        conditions: 'If the provider refuses a 12-month cap',
        tradeOffs: 'Higher exposure for the customer',
      },
    ],
    positionsToAvoid: [
      {
        description: 'Uncapped customer liability',
        reason: 'Unlimited exposure',
        redFlagLanguage: 'shall be unlimited',
      },
    ],
    riskLevel: 'Red',
    approvalRequired: 'General Counsel',
    negotiationTips: ['Anchor on mutuality'],
    ...overrides,
  }
}

/** Shorthand for a clause identified only by title and risk */
export function clauseWithRisk(clauseTitle: string, riskLevel: RiskLevel, sectionReference = ''): ClauseEntry {
  return buildClause({ clauseTitle, riskLevel, sectionReference })
}

export function buildDefinition(term: string, overrides: Partial<DefinitionEntry> = {}): DefinitionEntry {
  return {
    term,
    definition: `Definition of ${term}`,
    importance: '',
    customerConsiderations: '',
    providerConsiderations: '',
    suggestedModifications: '',
    ...overrides,
  }
}

/**
 * A model reply in the shape the analyst prompt requests, wrapped in prose
 * the way real replies often are.
 */
export function buildAnalysisReply(body: {
  agreementSummary?: Record<string, unknown>
  clauses?: Array<Record<string, unknown>>
  definitions?: Array<Record<string, unknown>>
  negotiationStrategy?: Record<string, unknown>
}): string {
  return `Here is the playbook analysis.\n\n${JSON.stringify(body, null, 2)}\n`
}
