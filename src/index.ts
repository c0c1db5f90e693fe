// src/index.ts — wfm-floor entry point
// Boot sequence: config → market tool → gateway → serve

import { serve } from "@hono/node-server"
import { loadConfig } from "./config.js"
import { createApp } from "./gateway/server.js"
import { MarketTool } from "./market/tool.js"
import { consoleLoggerFactory } from "./shared/logger.js"

const SHUTDOWN_TIMEOUT_MS = 10_000

async function main() {
  const bootStart = Date.now()

  // 1. Load config
  const config = loadConfig()
  const loggers = consoleLoggerFactory(config.logLevel)
  const log = loggers("boot")
  log.info(`config loaded: api=${config.market.apiBase}, port=${config.port}`)

  // 2. Market tool (transport + limiter reset task)
  const tool = new MarketTool(config.market, { loggers })
  await tool.initialize()

  // 3. Gateway
  const app = createApp(tool, { logger: loggers("gateway") })

  // 4. Start HTTP server
  const bootDuration = Date.now() - bootStart
  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    log.info(`ready on :${info.port} (boot: ${bootDuration}ms)`)
  })

  // 5. Graceful shutdown: stop accepting requests, then release the tool.
  let shuttingDown = false
  const gracefulShutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    const start = Date.now()
    log.info(`${signal} received, shutting down gracefully...`)

    server.close()
    await tool.shutdown()

    log.info(`shutdown complete in ${Date.now() - start}ms`)
    process.exit(0)
  }

  const handleSignal = (signal: string) => {
    setTimeout(() => {
      log.error(`forced shutdown after ${SHUTDOWN_TIMEOUT_MS}ms timeout`)
      process.exit(1)
    }, SHUTDOWN_TIMEOUT_MS).unref()

    gracefulShutdown(signal).catch((err: unknown) => {
      log.error("shutdown failed", { error: err instanceof Error ? err.message : String(err) })
      process.exit(1)
    })
  }

  process.on("SIGTERM", () => handleSignal("SIGTERM"))
  process.on("SIGINT", () => handleSignal("SIGINT"))
}

main().catch((err) => {
  console.error("[wfm] fatal:", err)
  process.exit(1)
})
