// src/gateway/errors.ts — MarketError → HTTP status and body

import type { MarketError } from "../market/errors.js"

export type ErrorStatus = 400 | 404 | 500 | 502 | 503

export function statusFor(err: MarketError): ErrorStatus {
  switch (err.code) {
    case "INVALID_ARGUMENT":
      return 400
    case "UPSTREAM_STATUS":
      return err.status === 404 ? 404 : 502
    case "NETWORK_ERROR":
    case "DECODE_FAILED":
    case "INTEGRITY_VIOLATION":
      return 502
    case "TOOL_NOT_READY":
      return 503
  }
}

export function errorBody(err: MarketError) {
  return {
    error: err.message,
    code: err.code,
    ...(err.status !== undefined ? { upstream_status: err.status } : {}),
  }
}
