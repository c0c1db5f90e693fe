// src/market/errors.ts — Typed error for marketplace operations

/** Error codes for marketplace operations */
export type MarketErrorCode =
  | "UPSTREAM_STATUS"
  | "NETWORK_ERROR"
  | "DECODE_FAILED"
  | "INTEGRITY_VIOLATION"
  | "INVALID_ARGUMENT"
  | "TOOL_NOT_READY"

export class MarketError extends Error {
  readonly name = "MarketError"
  readonly code: MarketErrorCode
  /** HTTP status observed upstream, for UPSTREAM_STATUS (and DECODE_FAILED, always 200). */
  readonly status?: number
  readonly context: Record<string, unknown>

  constructor(
    code: MarketErrorCode,
    message: string,
    opts: { status?: number; context?: Record<string, unknown>; cause?: unknown } = {},
  ) {
    super(`[wfm] ${code}: ${message}`, opts.cause !== undefined ? { cause: opts.cause } : undefined)
    this.code = code
    this.status = opts.status
    this.context = opts.context ?? {}
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      ...(this.status !== undefined ? { status: this.status } : {}),
      context: this.context,
    }
  }
}

export function isMarketError(err: unknown): err is MarketError {
  return err instanceof MarketError
}

/** Wrap anything thrown into a MarketError, keeping MarketErrors as they are. */
export function toMarketError(err: unknown, fallback: MarketErrorCode = "NETWORK_ERROR"): MarketError {
  if (err instanceof MarketError) return err
  const message = err instanceof Error ? err.message : String(err)
  return new MarketError(fallback, message, { cause: err })
}
