import { createGateway, type LanguageModel } from 'ai'
import { createAnthropic } from '@ai-sdk/anthropic'
import { createOpenAI } from '@ai-sdk/openai'
import { ProviderUnconfiguredError } from '@/lib/errors'
import type { AiConfig } from '@/lib/config'

/** Default generation config */
export const GENERATION_CONFIG = {
  temperature: 0,
} as const

/** Whether the selected provider has a credential */
export function isProviderConfigured(config: AiConfig): boolean {
  return Boolean(config.apiKey)
}

/**
 * Get the model instance for playbook analysis.
 *
 * @throws ProviderUnconfiguredError - no API key for the selected provider
 */
export function getAnalysisModel(config: AiConfig): LanguageModel {
  const { provider, apiKey, model } = config
  if (!apiKey) {
    throw new ProviderUnconfiguredError(provider)
  }

  switch (provider) {
    case 'anthropic':
      return createAnthropic({ apiKey })(model)
    case 'openai':
      return createOpenAI({ apiKey })(model)
    case 'gateway':
      return createGateway({ apiKey })(model)
  }
}
