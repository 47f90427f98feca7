import { describe, it, expect, beforeEach } from 'vitest'
import { UsageTracker, PRICING } from './usage'

describe('UsageTracker', () => {
  let tracker: UsageTracker

  beforeEach(() => {
    tracker = new UsageTracker()
  })

  it('starts with zero tokens used', () => {
    expect(tracker.totalTokens).toBe(0)
    expect(tracker.getUsage()).toEqual({
      byCall: {},
      total: { input: 0, output: 0, total: 0, estimatedCost: 0 },
    })
  })

  it('accumulates usage for the same call label', () => {
    tracker.record('chunk-1', 1000, 500)
    tracker.record('chunk-1', 2000, 1000)
    expect(tracker.totalTokens).toBe(4500)
  })

  it('tracks usage per call', () => {
    tracker.record('chunk-1', 1000, 500)
    tracker.record('chunk-2', 2000, 1000)
    const usage = tracker.getUsage()
    expect(usage.byCall['chunk-1'].total).toBe(1500)
    expect(usage.byCall['chunk-2'].total).toBe(3000)
    expect(usage.total.total).toBe(4500)
  })

  it('calculates estimated cost', () => {
    tracker.record('chunk-1', 1_000_000, 100_000) // 1M input, 100K output
    // Input: 1M * $3/1M = $3, Output: 100K * $15/1M = $1.50
    expect(tracker.getUsage().total.estimatedCost).toBeCloseTo(4.5, 2)
  })

  it('defines pricing for Sonnet 4.5', () => {
    expect(PRICING.input).toBe(3.00)
    expect(PRICING.output).toBe(15.00)
  })
})
