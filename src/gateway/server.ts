// src/gateway/server.ts — Hono HTTP app exposing the MarketTool

import { Hono } from "hono"
import { isMarketError } from "../market/errors.js"
import type { MarketTool } from "../market/tool.js"
import { silentLogger, type Logger } from "../shared/logger.js"
import { errorBody, statusFor } from "./errors.js"
import { createMarketRoutes } from "./routes/market.js"

export interface AppOptions {
  logger?: Logger
}

export function createApp(tool: MarketTool, options: AppOptions = {}) {
  const app = new Hono()
  const log = options.logger ?? silentLogger

  // Health endpoint
  app.get("/health", (c) => {
    const status = tool.status()
    return c.json(
      {
        status: status.state === "running" ? "healthy" : "unavailable",
        uptime: process.uptime(),
        tool: status.state,
        rate_limiter: {
          running: status.limiter.running,
          admitted: status.limiter.admitted,
          limit: status.limiter.limit,
          window_ms: status.limiter.windowMs,
        },
      },
      status.state === "running" ? 200 : 503,
    )
  })

  app.route("/api/v1", createMarketRoutes(tool))

  app.notFound((c) => c.json({ error: "Not found", code: "NOT_FOUND" }, 404))

  app.onError((err, c) => {
    if (isMarketError(err)) {
      const status = statusFor(err)
      log.warn(`${c.req.method} ${c.req.path} failed`, { code: err.code, status })
      return c.json(errorBody(err), status)
    }
    log.error(`${c.req.method} ${c.req.path} crashed`, { error: err.message })
    return c.json({ error: "Internal server error", code: "INTERNAL" }, 500)
  })

  return app
}
