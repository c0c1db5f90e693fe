// src/market/types.ts — Order, Payload, and result types for the warframe.market pipeline
//
// Orders are decoded from the API's snake_case JSON into these readonly shapes.
// Only `id` is guaranteed; everything else may be missing on malformed data and
// is checked by the filter/extractor stages, which drop (and log) bad orders.

import type { MarketError } from "./errors.js"

// ── Constants ────────────────────────────────────────────────

/** warframe.market ToS: at most 3 requests per second */
export const DEFAULT_REQUEST_LIMIT = 3

export const DEFAULT_REQUEST_WINDOW_MS = 1000

/** Fixed delay between admission attempts when the window is full */
export const DEFAULT_RETRY_DELAY_MS = 1000

export const DEFAULT_FLOOR_COUNT = 5

export const DEFAULT_API_BASE = "https://api.warframe.market/v1"

// ── Enums ────────────────────────────────────────────────────

export const ORDER_TYPES = ["sell", "buy"] as const
export type OrderType = (typeof ORDER_TYPES)[number]

export const USER_STATUSES = ["ingame", "online", "offline"] as const
export type UserStatus = (typeof USER_STATUSES)[number]

export type MarketOperation = "item-orders" | "profile-orders"

// ── Orders ───────────────────────────────────────────────────

export interface Order {
  readonly id: string
  /** Price in platinum. Absence is a data-quality defect. */
  readonly platinum?: number
  readonly orderType?: OrderType
  readonly visible?: boolean
  readonly quantity?: number
  readonly platform?: string
  readonly region?: string
  readonly createdAt?: string
  readonly updatedAt?: string
}

/** Seller presence embedded in item orders */
export interface User {
  readonly id?: string
  readonly ingameName?: string
  /** Undefined when the API sent an unknown or missing status */
  readonly status?: UserStatus
  readonly region?: string
}

export interface ItemOrder extends Order {
  readonly user?: User
}

/** Catalog reference embedded in profile orders */
export interface ItemRef {
  readonly id?: string
  /** Canonical item identifier, e.g. "blind_rage" */
  readonly urlName: string
  /** Display names keyed by locale, e.g. { en: "Blind Rage" } */
  readonly names: Readonly<Record<string, string>>
}

export interface ProfileOrder extends Order {
  readonly item?: ItemRef
}

// ── Payloads ─────────────────────────────────────────────────

export interface ItemOrdersPayload {
  orders: ItemOrder[]
}

export interface ProfileOrdersPayload {
  sellOrders: ProfileOrder[]
  buyOrders: ProfileOrder[]
}

export interface PayloadMap {
  "item-orders": ItemOrdersPayload
  "profile-orders": ProfileOrdersPayload
}

// ── Results ──────────────────────────────────────────────────

export interface FloorPriceResult {
  itemName: string
  /** Bottom-N prices, ascending */
  prices: number[]
}

export type FloorPriceOutcome =
  | { ok: true; itemName: string; result: FloorPriceResult }
  | { ok: false; itemName: string; error: MarketError }

export interface ProfileOrderOptimizerResult {
  orderId: string
  itemName: string
  /** The seller's own price; null when their order carries none */
  listedPrice: number | null
  floorPrices: number[]
}

export type ProfileOrderVerification =
  | ({ ok: true } & ProfileOrderOptimizerResult)
  | { ok: false; orderId: string; itemName: string; listedPrice: number | null; error: MarketError }
