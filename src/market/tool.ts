// src/market/tool.ts — MarketTool: lifecycle owner and facade over the pipeline
//
// initialize() acquires the shared transport and starts the limiter's reset
// task; shutdown() stops the task, fails fetches still waiting for admission,
// and closes the transport exactly once.
// Every operation refuses to run outside that window (TOOL_NOT_READY).

import { consoleLoggerFactory, type Logger, type LoggerFactory } from "../shared/logger.js"
import { MarketError } from "./errors.js"
import { PayloadFetcher } from "./fetcher.js"
import { FloorPriceResolver } from "./floor.js"
import { ProfileOptimizer, type VerifyOptions } from "./optimizer.js"
import { WindowRateLimiter } from "./rate-limiter.js"
import { FetchTransport, type HttpTransport } from "./transport.js"
import {
  DEFAULT_API_BASE,
  DEFAULT_FLOOR_COUNT,
  DEFAULT_REQUEST_LIMIT,
  DEFAULT_REQUEST_WINDOW_MS,
  DEFAULT_RETRY_DELAY_MS,
  type FloorPriceOutcome,
  type FloorPriceResult,
  type OrderType,
  type ProfileOrder,
  type ProfileOrderVerification,
} from "./types.js"

export interface MarketToolConfig {
  apiBase: string
  platform: string
  language: string
  requestLimit: number
  requestWindowMs: number
  retryDelayMs: number
  requestTimeoutMs: number
  defaultFloorCount: number
}

export const DEFAULT_MARKET_TOOL_CONFIG: MarketToolConfig = {
  apiBase: DEFAULT_API_BASE,
  platform: "pc",
  language: "en",
  requestLimit: DEFAULT_REQUEST_LIMIT,
  requestWindowMs: DEFAULT_REQUEST_WINDOW_MS,
  retryDelayMs: DEFAULT_RETRY_DELAY_MS,
  requestTimeoutMs: 10_000,
  defaultFloorCount: DEFAULT_FLOOR_COUNT,
}

export interface MarketToolDeps {
  /** Builds the transport on initialize(). Default: FetchTransport with API headers */
  createTransport?: (config: MarketToolConfig) => HttpTransport
  loggers?: LoggerFactory
  sleep?: (ms: number) => Promise<void>
}

export type MarketToolState = "idle" | "running" | "closed"

export interface MarketToolStatus {
  state: MarketToolState
  limiter: { running: boolean; admitted: number; limit: number; windowMs: number }
}

interface Pipeline {
  transport: HttpTransport
  resolver: FloorPriceResolver
  optimizer: ProfileOptimizer
}

function defaultTransport(config: MarketToolConfig): HttpTransport {
  return new FetchTransport({
    timeoutMs: config.requestTimeoutMs,
    headers: { Platform: config.platform, Language: config.language },
  })
}

export class MarketTool {
  readonly config: MarketToolConfig
  private readonly limiter: WindowRateLimiter
  private readonly lifetime = new AbortController()
  private readonly loggers: LoggerFactory
  private readonly log: Logger
  private pipeline: Pipeline | undefined
  private state: MarketToolState = "idle"

  constructor(config: Partial<MarketToolConfig> = {}, private readonly deps: MarketToolDeps = {}) {
    this.config = { ...DEFAULT_MARKET_TOOL_CONFIG, ...config }
    this.loggers = deps.loggers ?? consoleLoggerFactory()
    this.log = this.loggers("tool")
    this.limiter = new WindowRateLimiter({
      requestLimit: this.config.requestLimit,
      windowMs: this.config.requestWindowMs,
      logger: this.loggers("rate-limiter"),
    })
  }

  async initialize(): Promise<void> {
    if (this.state === "running") return
    if (this.state === "closed") {
      throw new MarketError("TOOL_NOT_READY", "tool has been shut down and cannot be re-initialized")
    }

    const transport = (this.deps.createTransport ?? defaultTransport)(this.config)
    const fetcher = new PayloadFetcher(
      transport,
      this.limiter,
      {
        apiBase: this.config.apiBase,
        retryDelayMs: this.config.retryDelayMs,
        logger: this.loggers("fetcher"),
        signal: this.lifetime.signal,
      },
      this.deps.sleep,
    )
    const resolver = new FloorPriceResolver(fetcher, this.loggers("floor"))
    const optimizer = new ProfileOptimizer(fetcher, resolver, this.loggers("optimizer"))

    this.pipeline = { transport, resolver, optimizer }
    this.limiter.start()
    this.state = "running"
    this.log.info("initialized", {
      apiBase: this.config.apiBase,
      requestLimit: this.config.requestLimit,
      windowMs: this.config.requestWindowMs,
    })
  }

  async shutdown(): Promise<void> {
    if (this.state === "closed") return
    this.state = "closed"
    this.limiter.stop()
    this.lifetime.abort()

    const pipeline = this.pipeline
    this.pipeline = undefined
    if (pipeline) {
      await pipeline.transport.close()
    }
    this.log.info("shut down")
  }

  status(): MarketToolStatus {
    return {
      state: this.state,
      limiter: {
        running: this.limiter.isRunning,
        admitted: this.limiter.admitted,
        limit: this.limiter.requestLimit,
        windowMs: this.limiter.windowMs,
      },
    }
  }

  async resolveFloorPrices(itemName: string, n: number = this.config.defaultFloorCount): Promise<FloorPriceResult> {
    return this.ready().resolver.resolveFloorPrices(itemName, n)
  }

  async resolveFloorPricesBatch(
    itemNames: readonly string[],
    n: number = this.config.defaultFloorCount,
  ): Promise<FloorPriceOutcome[]> {
    return this.ready().resolver.resolveMany(itemNames, n)
  }

  async getProfileOrders(username: string, orderType: OrderType = "sell"): Promise<ProfileOrder[]> {
    return this.ready().optimizer.getProfileOrders(username, orderType)
  }

  async verifyProfileOrders(username: string, options: VerifyOptions = {}): Promise<ProfileOrderVerification[]> {
    return this.ready().optimizer.verifyProfileOrders(username, {
      ...options,
      count: options.count ?? this.config.defaultFloorCount,
    })
  }

  private ready(): Pipeline {
    if (this.state !== "running" || !this.pipeline) {
      throw new MarketError("TOOL_NOT_READY", `tool is ${this.state}; call initialize() first`)
    }
    return this.pipeline
  }
}
