// src/config.ts — Configuration loader from environment variables

import { parseLogLevel, type LogLevel } from "./shared/logger.js"
import type { MarketToolConfig } from "./market/tool.js"
import {
  DEFAULT_API_BASE,
  DEFAULT_FLOOR_COUNT,
  DEFAULT_REQUEST_LIMIT,
  DEFAULT_REQUEST_WINDOW_MS,
  DEFAULT_RETRY_DELAY_MS,
} from "./market/types.js"

export interface WfmConfig {
  // Gateway
  port: number
  host: string

  logLevel: LogLevel

  /** warframe.market client */
  market: MarketToolConfig
}

type Env = Record<string, string | undefined>

/** Parse an integer from an environment variable, failing fast on NaN. */
function parseIntEnv(env: Env, envKey: string, fallback: string, min = 0): number {
  const raw = env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (isNaN(value)) {
    throw new Error(`${envKey} must be a valid integer (got "${raw}")`)
  }
  if (value < min) {
    throw new Error(`${envKey} must be at least ${min} (got ${value})`)
  }
  return value
}

export function loadConfig(env: Env = process.env): WfmConfig {
  return {
    port: parseIntEnv(env, "PORT", "3000"),
    host: env.HOST ?? "0.0.0.0",

    logLevel: parseLogLevel(env.LOG_LEVEL),

    market: {
      apiBase: env.WFM_API_BASE ?? DEFAULT_API_BASE,
      platform: env.WFM_PLATFORM ?? "pc",
      language: env.WFM_LANGUAGE ?? "en",
      requestLimit: parseIntEnv(env, "WFM_REQUEST_LIMIT", String(DEFAULT_REQUEST_LIMIT), 1),
      requestWindowMs: parseIntEnv(env, "WFM_REQUEST_WINDOW_MS", String(DEFAULT_REQUEST_WINDOW_MS), 1),
      retryDelayMs: parseIntEnv(env, "WFM_RETRY_DELAY_MS", String(DEFAULT_RETRY_DELAY_MS)),
      requestTimeoutMs: parseIntEnv(env, "WFM_REQUEST_TIMEOUT_MS", "10000", 1),
      defaultFloorCount: parseIntEnv(env, "WFM_FLOOR_COUNT", String(DEFAULT_FLOOR_COUNT)),
    },
  }
}
