// src/market/fetcher.ts — One logical warframe.market request, honoring the rate limiter
//
// Waits for admission (fixed backoff, unbounded), issues the GET, and decodes
// the payload. A 200 without a payload is an empty result, not an error.
// Non-200 statuses surface as UPSTREAM_STATUS and are never retried here.

import { silentLogger, type Logger } from "../shared/logger.js"
import { EMPTY_PAYLOADS, PAYLOAD_DECODERS, extractPayload } from "./decode.js"
import { MarketError } from "./errors.js"
import type { AdmissionGate } from "./rate-limiter.js"
import type { HttpTransport, TransportResponse } from "./transport.js"
import { DEFAULT_API_BASE, DEFAULT_RETRY_DELAY_MS, type MarketOperation, type PayloadMap } from "./types.js"

export interface PayloadFetcherConfig {
  apiBase?: string
  retryDelayMs?: number
  logger?: Logger
  /** Aborted when the owning tool shuts down; a fetch waiting for admission then fails. */
  signal?: AbortSignal
}

const PATHS: Record<MarketOperation, (name: string) => string> = {
  "item-orders": (name) => `/items/${encodeURIComponent(name)}/orders`,
  "profile-orders": (name) => `/profile/${encodeURIComponent(name)}/orders`,
}

/**
 * Normalize a target name for an operation.
 *
 * Item identifiers are case-insensitive url names ("Blind Rage" → "blind_rage").
 * Usernames are case-sensitive and only trimmed.
 */
export function normalizeTargetName(operation: MarketOperation, targetName: string): string {
  if (typeof targetName !== "string") {
    throw new MarketError("INVALID_ARGUMENT", "target name must be a string", { context: { operation } })
  }
  const trimmed = targetName.trim()
  const normalized = operation === "item-orders"
    ? trimmed.toLowerCase().replace(/\s+/g, "_")
    : trimmed
  if (normalized.length === 0) {
    throw new MarketError("INVALID_ARGUMENT", "target name must not be empty", { context: { operation } })
  }
  return normalized
}

export class PayloadFetcher {
  private readonly apiBase: string
  private readonly retryDelayMs: number
  private readonly logger: Logger
  private readonly signal: AbortSignal | undefined

  constructor(
    private readonly transport: HttpTransport,
    private readonly gate: AdmissionGate,
    config: PayloadFetcherConfig = {},
    private readonly sleep: (ms: number) => Promise<void> = (ms) => new Promise(r => setTimeout(r, ms)),
  ) {
    this.apiBase = (config.apiBase ?? DEFAULT_API_BASE).replace(/\/$/, "")
    this.retryDelayMs = config.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS
    this.logger = config.logger ?? silentLogger
    this.signal = config.signal
  }

  /** URL for an already-normalized target name. */
  buildUrl(operation: MarketOperation, normalizedName: string): string {
    return `${this.apiBase}${PATHS[operation](normalizedName)}`
  }

  async fetch<K extends MarketOperation>(operation: K, targetName: string): Promise<PayloadMap[K]> {
    const name = normalizeTargetName(operation, targetName)
    this.logger.info(`acquiring ${operation} for ${name}`)

    await this.waitForAdmission(operation, name)

    const url = this.buildUrl(operation, name)
    let response: TransportResponse
    try {
      response = await this.transport.get(url)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      this.logger.error(`request failed for ${name}`, { operation, error: message })
      throw new MarketError("NETWORK_ERROR", message, { cause: err, context: { operation, target: name } })
    }

    if (response.status !== 200) {
      this.logger.warn(`expected HTTP 200, got ${response.status}`, { operation, target: name })
      throw new MarketError("UPSTREAM_STATUS", `expected HTTP 200, got HTTP ${response.status}`, {
        status: response.status,
        context: { operation, target: name },
      })
    }

    let body: unknown
    try {
      body = JSON.parse(response.body)
    } catch (err) {
      throw new MarketError("DECODE_FAILED", "response body is not valid JSON", {
        status: response.status,
        cause: err,
        context: { operation, target: name },
      })
    }

    const payload = extractPayload(body)
    if (payload === undefined) {
      this.logger.warn(`response for ${name} has no payload, treating as empty`, { operation })
      return EMPTY_PAYLOADS[operation]()
    }

    this.logger.info(`acquired ${operation} for ${name}`)
    return PAYLOAD_DECODERS[operation](payload, this.logger)
  }

  fetchItemOrders(itemName: string): Promise<PayloadMap["item-orders"]> {
    return this.fetch("item-orders", itemName)
  }

  fetchProfileOrders(username: string): Promise<PayloadMap["profile-orders"]> {
    return this.fetch("profile-orders", username)
  }

  // Fixed delay, no attempt cap. Only shutdown ends the wait early.
  private async waitForAdmission(operation: MarketOperation, name: string): Promise<void> {
    this.throwIfClosed(operation, name)
    while (!(await this.gate.tryAdmit())) {
      this.logger.warn(`request limit reached, retrying in ${this.retryDelayMs}ms`, { operation, target: name })
      await this.sleep(this.retryDelayMs)
      this.throwIfClosed(operation, name)
    }
  }

  private throwIfClosed(operation: MarketOperation, name: string): void {
    if (this.signal?.aborted) {
      throw new MarketError("TOOL_NOT_READY", `shut down while waiting to request ${name}`, {
        context: { operation, target: name },
      })
    }
  }
}
