// src/market/rate-limiter.ts — Fixed-window request limiter for the warframe.market API
//
// Counts admitted requests in the current window and refuses once the limit is
// reached. A background timer zeroes the counter every window. Admits and
// resets run under the same mutex, so a reset never lands between the check
// and the increment of a concurrent admit.

import { AsyncMutex } from "../shared/mutex.js"
import { silentLogger, type Logger } from "../shared/logger.js"
import { DEFAULT_REQUEST_LIMIT, DEFAULT_REQUEST_WINDOW_MS } from "./types.js"

// ── Types ────────────────────────────────────────────────────

export interface WindowRateLimiterConfig {
  requestLimit?: number // default 3
  windowMs?: number     // default 1000
  logger?: Logger
}

/** What the fetcher needs from a limiter. */
export interface AdmissionGate {
  tryAdmit(): Promise<boolean>
}

// ── WindowRateLimiter ────────────────────────────────────────

export class WindowRateLimiter implements AdmissionGate {
  readonly requestLimit: number
  readonly windowMs: number

  private counter = 0
  private timer: ReturnType<typeof setInterval> | undefined
  private readonly mutex = new AsyncMutex()
  private readonly logger: Logger

  constructor(config: WindowRateLimiterConfig = {}) {
    this.requestLimit = config.requestLimit ?? DEFAULT_REQUEST_LIMIT
    this.windowMs = config.windowMs ?? DEFAULT_REQUEST_WINDOW_MS
    this.logger = config.logger ?? silentLogger

    if (!Number.isInteger(this.requestLimit) || this.requestLimit < 1) {
      throw new RangeError(`requestLimit must be a positive integer (got ${this.requestLimit})`)
    }
    if (!Number.isFinite(this.windowMs) || this.windowMs <= 0) {
      throw new RangeError(`windowMs must be positive (got ${this.windowMs})`)
    }
  }

  /** Requests admitted in the current window. */
  get admitted(): number {
    return this.counter
  }

  get isRunning(): boolean {
    return this.timer !== undefined
  }

  // Admit one request if the window has room. Denial has no side effect.
  async tryAdmit(): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      if (this.counter >= this.requestLimit) return false
      this.counter += 1
      this.logger.debug("request admitted", { admitted: this.counter, limit: this.requestLimit })
      return true
    })
  }

  async reset(): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.counter = 0
    })
  }

  /** Start the per-window reset task. No-op if already running. */
  start(): void {
    if (this.timer) return
    this.timer = setInterval(() => {
      this.reset().catch((err: unknown) => {
        this.logger.error("window reset failed", { error: err instanceof Error ? err.message : String(err) })
      })
    }, this.windowMs)
  }

  /** Cancel the reset task. No-op if not running. */
  stop(): void {
    if (!this.timer) return
    clearInterval(this.timer)
    this.timer = undefined
  }
}
