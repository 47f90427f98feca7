import type { generateText } from 'ai'

type GenerateTextResult = Awaited<ReturnType<typeof generateText>>

interface UsageOptions {
  inputTokens?: number
  outputTokens?: number
}

/**
 * Builds the subset of a generateText result the analyst reads, typed as
 * the full result so it can feed `vi.mocked(generateText)`.
 */
export function textResult(text: string, usage: UsageOptions = {}): GenerateTextResult {
  const inputTokens = usage.inputTokens ?? 100
  const outputTokens = usage.outputTokens ?? 50
  return {
    text,
    usage: { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens },
    finishReason: 'stop',
  } as unknown as GenerateTextResult
}
