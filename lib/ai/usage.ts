/** Pricing per 1M tokens (Sonnet 4.5 rates), used for cost estimates only */
export const PRICING = {
  input: 3.00,
  output: 15.00,
} as const

export interface TokenUsage {
  input: number
  output: number
  total: number
  estimatedCost: number
}

export interface AggregatedUsage {
  byCall: Record<string, TokenUsage>
  total: TokenUsage
}

/** Token usage tracker for one playbook job */
export class UsageTracker {
  private usage: Map<string, TokenUsage> = new Map()

  /** Record usage from a model call, keyed by call label (e.g. `chunk-2`) */
  record(label: string, input: number, output: number): void {
    const existing = this.usage.get(label) ?? { input: 0, output: 0, total: 0, estimatedCost: 0 }
    const cost = this.calculateCost(input, output)

    this.usage.set(label, {
      input: existing.input + input,
      output: existing.output + output,
      total: existing.total + input + output,
      estimatedCost: existing.estimatedCost + cost,
    })
  }

  /** Get total tokens used */
  get totalTokens(): number {
    return Array.from(this.usage.values()).reduce((sum, u) => sum + u.total, 0)
  }

  /** Get aggregated usage report */
  getUsage(): AggregatedUsage {
    const values = Array.from(this.usage.values())
    return {
      byCall: Object.fromEntries(this.usage),
      total: {
        input: values.reduce((sum, u) => sum + u.input, 0),
        output: values.reduce((sum, u) => sum + u.output, 0),
        total: this.totalTokens,
        estimatedCost: values.reduce((sum, u) => sum + u.estimatedCost, 0),
      },
    }
  }

  private calculateCost(input: number, output: number): number {
    const inputCost = (input / 1_000_000) * PRICING.input
    const outputCost = (output / 1_000_000) * PRICING.output
    return Math.round((inputCost + outputCost) * 10000) / 10000
  }
}
