// src/market/decode.ts — warframe.market wire format → domain model
//
// The API speaks snake_case (order_type, ingame_name, url_name, ...). Orders
// without a string id are dropped here so they never reach the filters.
// Other missing fields are carried as undefined for the later stages to judge.

import { Type } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { Logger } from "../shared/logger.js"
import {
  ORDER_TYPES,
  USER_STATUSES,
  type ItemOrder,
  type ItemOrdersPayload,
  type ItemRef,
  type MarketOperation,
  type Order,
  type OrderType,
  type PayloadMap,
  type ProfileOrder,
  type ProfileOrdersPayload,
  type User,
  type UserStatus,
} from "./types.js"

// ── Wire schemas ─────────────────────────────────────────────

const WireEnvelope = Type.Object({
  payload: Type.Record(Type.String(), Type.Unknown()),
})

const WireOrderIdentity = Type.Object({
  id: Type.String({ minLength: 1 }),
})

const WireItemRef = Type.Object({
  url_name: Type.String({ minLength: 1 }),
  id: Type.Optional(Type.String()),
})

const WireLocalizedName = Type.Object({
  item_name: Type.String(),
})

type Wire = Record<string, unknown>

function isRecord(value: unknown): value is Wire {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function optString(obj: Wire, key: string): string | undefined {
  const v = obj[key]
  return typeof v === "string" ? v : undefined
}

function optNumber(obj: Wire, key: string): number | undefined {
  const v = obj[key]
  return typeof v === "number" && Number.isFinite(v) ? v : undefined
}

function optBoolean(obj: Wire, key: string): boolean | undefined {
  const v = obj[key]
  return typeof v === "boolean" ? v : undefined
}

function parseOrderType(value: unknown): OrderType | undefined {
  return ORDER_TYPES.find((t) => t === value)
}

function parseUserStatus(value: unknown): UserStatus | undefined {
  return USER_STATUSES.find((s) => s === value)
}

// ── Envelope ─────────────────────────────────────────────────

/** The `payload` object of a response body, or undefined when absent. */
export function extractPayload(body: unknown): Wire | undefined {
  return Value.Check(WireEnvelope, body) ? body.payload : undefined
}

// ── Orders ───────────────────────────────────────────────────

function decodeBase(raw: Wire & { id: string }): Order {
  return {
    id: raw.id,
    platinum: optNumber(raw, "platinum"),
    orderType: parseOrderType(raw.order_type),
    visible: optBoolean(raw, "visible"),
    quantity: optNumber(raw, "quantity"),
    platform: optString(raw, "platform"),
    region: optString(raw, "region"),
    createdAt: optString(raw, "creation_date"),
    updatedAt: optString(raw, "last_update"),
  }
}

function decodeUser(raw: unknown): User | undefined {
  if (!isRecord(raw)) return undefined
  return {
    id: optString(raw, "id"),
    ingameName: optString(raw, "ingame_name"),
    status: parseUserStatus(raw.status),
    region: optString(raw, "region"),
  }
}

function decodeItemRef(raw: unknown): ItemRef | undefined {
  if (!isRecord(raw) || !Value.Check(WireItemRef, raw)) return undefined

  const names: Record<string, string> = {}
  for (const [locale, value] of Object.entries(raw)) {
    if (isRecord(value) && Value.Check(WireLocalizedName, value)) {
      names[locale] = value.item_name
    }
  }
  return { id: raw.id, urlName: raw.url_name, names }
}

function decodeOrders<T extends Order>(
  raw: unknown,
  field: string,
  decode: (order: Wire & { id: string }) => T,
  log: Logger,
): T[] {
  if (raw === undefined) return []
  if (!Array.isArray(raw)) {
    log.warn("payload field is not a list, treating as empty", { field })
    return []
  }

  const out: T[] = []
  for (const entry of raw) {
    if (!isRecord(entry) || !Value.Check(WireOrderIdentity, entry)) {
      log.warn("dropping order without id", { field })
      continue
    }
    out.push(decode(entry))
  }
  return out
}

export function decodeItemOrdersPayload(payload: Wire, log: Logger): ItemOrdersPayload {
  return {
    orders: decodeOrders<ItemOrder>(
      payload.orders,
      "orders",
      (raw) => ({ ...decodeBase(raw), user: decodeUser(raw.user) }),
      log,
    ),
  }
}

export function decodeProfileOrdersPayload(payload: Wire, log: Logger): ProfileOrdersPayload {
  const decode = (raw: Wire & { id: string }): ProfileOrder => ({
    ...decodeBase(raw),
    item: decodeItemRef(raw.item),
  })
  return {
    sellOrders: decodeOrders(payload.sell_orders, "sell_orders", decode, log),
    buyOrders: decodeOrders(payload.buy_orders, "buy_orders", decode, log),
  }
}

// ── Per-operation dispatch ───────────────────────────────────

type PayloadDecoders = { [K in MarketOperation]: (payload: Wire, log: Logger) => PayloadMap[K] }
type EmptyPayloads = { [K in MarketOperation]: () => PayloadMap[K] }

export const PAYLOAD_DECODERS: PayloadDecoders = {
  "item-orders": decodeItemOrdersPayload,
  "profile-orders": decodeProfileOrdersPayload,
}

export const EMPTY_PAYLOADS: EmptyPayloads = {
  "item-orders": () => ({ orders: [] }),
  "profile-orders": () => ({ sellOrders: [], buyOrders: [] }),
}
