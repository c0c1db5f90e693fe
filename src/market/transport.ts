// src/market/transport.ts — GET transport shared by every fetch of a MarketTool
// Wraps fetch with default headers and a per-request timeout. close() aborts
// whatever is still in flight and refuses new requests.

export interface TransportResponse {
  status: number
  body: string
}

export interface HttpTransport {
  get(url: string): Promise<TransportResponse>
  close(): Promise<void>
}

export interface FetchTransportConfig {
  timeoutMs: number
  headers?: Record<string, string>
  /** Injectable fetch (tests, custom agents). Default: globalThis.fetch */
  fetch?: typeof globalThis.fetch
}

export class TransportClosedError extends Error {
  constructor() {
    super("Transport is closed")
    this.name = "TransportClosedError"
  }
}

export class FetchTransport implements HttpTransport {
  private readonly _fetch: typeof globalThis.fetch
  private readonly inFlight = new Set<AbortController>()
  private closed = false

  constructor(private readonly config: FetchTransportConfig) {
    this._fetch = config.fetch ?? globalThis.fetch
  }

  get isClosed(): boolean {
    return this.closed
  }

  async get(url: string): Promise<TransportResponse> {
    if (this.closed) throw new TransportClosedError()

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs)
    this.inFlight.add(controller)

    try {
      const res = await this._fetch(url, {
        method: "GET",
        headers: { Accept: "application/json", ...this.config.headers },
        signal: controller.signal,
      })
      const body = await res.text()
      return { status: res.status, body }
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") {
        if (this.closed) throw new TransportClosedError()
        throw new Error(`Request timed out after ${this.config.timeoutMs}ms: ${url}`)
      }
      throw err
    } finally {
      clearTimeout(timeoutId)
      this.inFlight.delete(controller)
    }
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    for (const controller of this.inFlight) controller.abort()
    this.inFlight.clear()
  }
}
