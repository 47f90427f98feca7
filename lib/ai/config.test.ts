import { describe, it, expect } from 'vitest'
import { getAnalysisModel, isProviderConfigured, GENERATION_CONFIG } from './config'
import { ProviderUnconfiguredError } from '@/lib/errors'
import type { AiConfig } from '@/lib/config'

const baseConfig: AiConfig = {
  provider: 'anthropic',
  apiKey: 'test-secret',
  model: 'claude-sonnet-4-5',
  timeoutMs: 1_000,
  maxAttempts: 2,
  retryDelayMs: 0,
  maxOutputTokens: 1_024,
}

describe('AI Configuration', () => {
  it('returns a model instance for each provider', () => {
    expect(getAnalysisModel(baseConfig)).toBeDefined()
    expect(getAnalysisModel({ ...baseConfig, provider: 'openai', model: 'gpt-4o' })).toBeDefined()
    expect(
      getAnalysisModel({ ...baseConfig, provider: 'gateway', model: 'anthropic/claude-sonnet-4.5' })
    ).toBeDefined()
  })

  it('throws when the provider has no key', () => {
    expect(() => getAnalysisModel({ ...baseConfig, apiKey: undefined })).toThrow(
      ProviderUnconfiguredError
    )
  })

  it('reports whether a credential is present', () => {
    expect(isProviderConfigured(baseConfig)).toBe(true)
    expect(isProviderConfigured({ ...baseConfig, apiKey: undefined })).toBe(false)
  })

  it('exports generation config with zero temperature', () => {
    expect(GENERATION_CONFIG.temperature).toBe(0)
  })
})
