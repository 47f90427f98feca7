import { config } from "dotenv"

// .env.local overrides .env for local development
config({ path: [".env.local", ".env"] })

import * as Sentry from "@sentry/node"

Sentry.init({
  dsn: process.env.SENTRY_DSN,

  // Enable structured logging
  enableLogs: true,

  integrations: [
    // Console integration - captures console.log, console.warn, console.error
    Sentry.consoleLoggingIntegration({
      levels: ["log", "warn", "error"],
    }),
    // Vercel AI SDK integration - tracks LLM calls, tokens, latency
    Sentry.vercelAIIntegration({
      recordInputs: false,
      recordOutputs: true,
    }),
  ],

  tracesSampler: ({ name, parentSampled }) => {
    if (name.includes("/api/health")) {
      return 0
    }
    // Always capture playbook runs
    if (name.includes("/api/process")) {
      return 1.0
    }
    if (typeof parentSampled === "boolean") {
      return parentSampled
    }
    return process.env.NODE_ENV === "production" ? 0.1 : 1.0
  },

  debug: false,
})
