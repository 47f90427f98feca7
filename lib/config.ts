/**
 * @fileoverview Environment configuration
 *
 * Parses `process.env` into a typed {@link AppConfig} once per process.
 * Values are validated with zod so a bad deployment fails at startup rather
 * than halfway through a job.
 *
 * @module lib/config
 */

import { z } from "zod"
import { ValidationError } from "@/lib/errors"

// ============================================================================
// Constants
// ============================================================================

export const SUPPORTED_EXTENSIONS = ["pdf", "docx", "xlsx"] as const
export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number]

export const AI_PROVIDERS = ["anthropic", "openai", "gateway"] as const
export type AiProvider = (typeof AI_PROVIDERS)[number]

export const DEFAULT_MODELS: Record<AiProvider, string> = {
  anthropic: "claude-sonnet-4-5",
  openai: "gpt-4o",
  gateway: "anthropic/claude-sonnet-4.5",
}

// ============================================================================
// Schema
// ============================================================================

const emptyToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value

const optionalString = z.preprocess(emptyToUndefined, z.string().optional())

const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback))

const envSchema = z.object({
  NODE_ENV: z.preprocess(
    emptyToUndefined,
    z.enum(["development", "production", "test"]).default("development")
  ),
  PORT: positiveInt(3005),
  AI_PROVIDER: z.preprocess(emptyToUndefined, z.enum(AI_PROVIDERS).optional()),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: optionalString,
  AI_GATEWAY_API_KEY: optionalString,
  GATEWAY_MODEL: optionalString,
  MAX_FILE_SIZE: positiveInt(50),
  ALLOWED_EXTENSIONS: z.preprocess(
    emptyToUndefined,
    z
      .string()
      .default(SUPPORTED_EXTENSIONS.join(","))
      .transform((raw) =>
        raw
          .split(",")
          .map((ext) => ext.trim().toLowerCase().replace(/^\./, ""))
          .filter(Boolean)
      )
      .pipe(z.array(z.enum(SUPPORTED_EXTENSIONS)).min(1))
  ),
  CHUNK_SIZE: positiveInt(40_000),
  ANALYSIS_TIMEOUT_MS: positiveInt(120_000),
  ANALYSIS_MAX_ATTEMPTS: positiveInt(2),
  ANALYSIS_RETRY_DELAY_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().nonnegative().default(2_000)
  ),
  ANALYSIS_MAX_OUTPUT_TOKENS: positiveInt(8_192),
  UPLOAD_DIR: z.preprocess(emptyToUndefined, z.string().default("uploads")),
  OUTPUT_DIR: z.preprocess(emptyToUndefined, z.string().default("output")),
  SENTRY_DSN: optionalString,
})

// ============================================================================
// Types
// ============================================================================

export interface AiConfig {
  provider: AiProvider
  /** API key for the selected provider, undefined when not configured */
  apiKey: string | undefined
  model: string
  timeoutMs: number
  maxAttempts: number
  retryDelayMs: number
  maxOutputTokens: number
}

export interface AppConfig {
  env: "development" | "production" | "test"
  port: number
  ai: AiConfig
  uploads: {
    dir: string
    outputDir: string
    maxFileSizeBytes: number
    allowedExtensions: SupportedExtension[]
  }
  chunkSize: number
  sentryDsn: string | undefined
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Picks the provider explicitly named, else the first one with a key.
 */
function resolveProvider(env: z.infer<typeof envSchema>): AiProvider {
  if (env.AI_PROVIDER) return env.AI_PROVIDER
  if (env.ANTHROPIC_API_KEY) return "anthropic"
  if (env.OPENAI_API_KEY) return "openai"
  if (env.AI_GATEWAY_API_KEY) return "gateway"
  return "anthropic"
}

/**
 * Parses an environment record into an AppConfig.
 *
 * @throws ValidationError - when a variable is present but invalid
 */
export function loadConfig(
  source: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(source)
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error)
  }
  const env = parsed.data
  const provider = resolveProvider(env)

  const credentials: Record<AiProvider, { apiKey?: string; model?: string }> = {
    anthropic: { apiKey: env.ANTHROPIC_API_KEY, model: env.ANTHROPIC_MODEL },
    openai: { apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL },
    gateway: { apiKey: env.AI_GATEWAY_API_KEY, model: env.GATEWAY_MODEL },
  }

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    ai: {
      provider,
      apiKey: credentials[provider].apiKey,
      model: credentials[provider].model ?? DEFAULT_MODELS[provider],
      timeoutMs: env.ANALYSIS_TIMEOUT_MS,
      maxAttempts: env.ANALYSIS_MAX_ATTEMPTS,
      retryDelayMs: env.ANALYSIS_RETRY_DELAY_MS,
      maxOutputTokens: env.ANALYSIS_MAX_OUTPUT_TOKENS,
    },
    uploads: {
      dir: env.UPLOAD_DIR,
      outputDir: env.OUTPUT_DIR,
      maxFileSizeBytes: env.MAX_FILE_SIZE * 1024 * 1024,
      allowedExtensions: env.ALLOWED_EXTENSIONS,
    },
    chunkSize: env.CHUNK_SIZE,
    sentryDsn: env.SENTRY_DSN,
  }
}

let cached: AppConfig | null = null

/** Process-wide configuration, parsed on first use. */
export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig()
  }
  return cached
}
