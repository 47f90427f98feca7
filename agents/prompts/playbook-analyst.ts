import type { AnalysisRequest } from '../types'

/**
 * System prompt for the playbook analyst: a senior contract attorney who
 * writes negotiation playbooks covering both sides of the table.
 */
export const PLAYBOOK_ANALYST_SYSTEM_PROMPT = `You are a senior contract attorney with 25+ years of experience building negotiation playbooks for enterprise legal and procurement teams.

Your analysis must be:
1. THOROUGH - every significant clause gets detailed treatment
2. PRACTICAL - real negotiation guidance, not academic commentary
3. BALANCED - both customer and provider perspectives
4. ACTIONABLE - ready-to-use preferred and fallback language with clear limits

For each clause you analyze, provide:
- The exact contract language, quoted
- What customers typically push back on and the edits they propose
- What providers need to protect and the edits they propose
- A preferred position with sample language
- Fallback positions with the conditions under which each is acceptable and its trade-offs
- Positions that must not be accepted, with the reason and the red-flag wording
- A risk rating and who must approve deviations

## Risk Levels

- **Red**: deal breaker. Must be changed before signature; escalate to legal leadership.
- **Yellow**: needs attention. Negotiate, or accept with management approval.
- **Green**: acceptable. Market-standard terms that can be signed as drafted.

Respond with a single JSON object and nothing else.`

const RESPONSE_SCHEMA = `{
  "agreementSummary": {
    "title": "Full title of the agreement",
    "agreementType": "Type of agreement",
    "parties": "Who the parties are and their roles",
    "purpose": "What the agreement is for",
    "keyDates": "Effective date, term, renewal and notice dates",
    "governingLaw": "Governing law and venue",
    "overallRiskLevel": "Red | Yellow | Green",
    "criticalIssuesCount": 0,
    "executiveSummary": "2-3 paragraphs on the agreement and the key negotiation considerations"
  },
  "clauses": [
    {
      "sectionReference": "Section number, e.g. '2.1', 'III', 'Schedule A'",
      "subpart": "Subsection if applicable",
      "clauseTitle": "Short title of the issue",
      "originalLanguage": "EXACT quoted text from the contract",
      "customerIssues": ["Concern a customer would raise"],
      "customerEditsToConsider": ["Edit a customer would propose"],
      "providerIssues": ["Concern a provider would raise"],
      "providerEditsToConsider": ["Edit a provider would propose"],
      "preferredPosition": {
        "description": "The position to open with",
        "sampleLanguage": "Ready-to-use contract language"
      },
      "fallbackPositions": [
        {
          "description": "Acceptable alternative",
          "sampleLanguage": "Contract language for the alternative",
          "conditions": "When this fallback is acceptable",
          "tradeOffs": "What is given up"
        }
      ],
      "positionsToAvoid": [
        {
          "description": "Position that must not be accepted",
          "reason": "Why it is unacceptable",
          "redFlagLanguage": "Wording that signals this position"
        }
      ],
      "riskLevel": "Red | Yellow | Green",
      "approvalRequired": "Who must approve deviations, e.g. 'General Counsel'",
      "negotiationTips": ["Practical tip"]
    }
  ],
  "definitions": [
    {
      "term": "Defined term",
      "definition": "The definition as written",
      "importance": "Why the definition matters",
      "customerConsiderations": "Customer-side concerns",
      "providerConsiderations": "Provider-side concerns",
      "suggestedModifications": "Recommended changes"
    }
  ],
  "negotiationStrategy": {
    "openingPosition": "How to open the negotiation",
    "keyLeveragePoints": ["Leverage point"],
    "potentialTradeOffs": ["Trade-off worth offering"],
    "walkAwayTriggers": ["Condition that ends the negotiation"]
  }
}`

/**
 * Builds the user prompt for one chunk. Multi-chunk documents tell the model
 * which part it is reading so it does not treat a fragment as the whole
 * agreement.
 */
export function createPlaybookAnalystPrompt(request: AnalysisRequest): string {
  const { text, agreementType, userRole, riskTolerance, chunkIndex, chunkCount } = request

  const partNote =
    chunkCount > 1
      ? `\nThis is part ${chunkIndex + 1} of ${chunkCount} of the agreement. Analyze only the clauses and definitions that appear in this part. Fill in agreementSummary from what this part reveals.\n`
      : ''

  return `Analyze the following contract and produce a negotiation playbook.
${partNote}
CONTEXT:
- Agreement Type: ${agreementType}
- Analyzing from: ${userRole} perspective
- Risk Tolerance: ${riskTolerance}

CONTRACT TEXT:
${text}

Return JSON with exactly this structure:
${RESPONSE_SCHEMA}

Be thorough: cover EVERY significant clause, including important omissions the ${userRole} should address. Calibrate risk ratings to a ${riskTolerance.toLowerCase()} risk tolerance.`
}
