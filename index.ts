import "./instrument"

import { serve } from "@hono/node-server"
import { getConfig } from "@/lib/config"
import { logger } from "@/lib/logger"
import { createApp } from "@/server/app"

const config = getConfig()
const app = createApp(config)

serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info("Server listening", {
    port: info.port,
    provider: config.ai.provider,
    model: config.ai.model,
  })
})
