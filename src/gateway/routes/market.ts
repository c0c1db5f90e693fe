// src/gateway/routes/market.ts — Floor-price and profile routes over a MarketTool
//
// Bodies are snake_case. Query parameters are validated here; everything else
// is left to the tool, whose MarketErrors are mapped by the app's error handler.

import { Hono, type Context } from "hono"
import type { MarketTool } from "../../market/tool.js"
import {
  ORDER_TYPES,
  type FloorPriceOutcome,
  type OrderType,
  type ProfileOrder,
  type ProfileOrderVerification,
} from "../../market/types.js"
import { errorBody } from "../errors.js"

/** Upper bound on `count` */
const MAX_COUNT = 100
const MAX_BATCH_ITEMS = 20

type Parsed<T> = { ok: true; value: T } | { ok: false; message: string }

function parseCount(raw: string | undefined, fallback: number): Parsed<number> {
  if (raw === undefined) return { ok: true, value: fallback }
  if (!/^\d+$/.test(raw)) return { ok: false, message: "count must be a non-negative integer" }
  const value = parseInt(raw, 10)
  if (value > MAX_COUNT) return { ok: false, message: `count must be at most ${MAX_COUNT}` }
  return { ok: true, value }
}

function parseOrderType(raw: string | undefined): Parsed<OrderType> {
  if (raw === undefined) return { ok: true, value: "sell" }
  const match = ORDER_TYPES.find((t) => t === raw.toLowerCase())
  if (!match) return { ok: false, message: `type must be one of ${ORDER_TYPES.join(", ")}` }
  return { ok: true, value: match }
}

function parseBoolean(raw: string | undefined, fallback: boolean): Parsed<boolean> {
  if (raw === undefined) return { ok: true, value: fallback }
  if (raw === "true" || raw === "1") return { ok: true, value: true }
  if (raw === "false" || raw === "0") return { ok: true, value: false }
  return { ok: false, message: "visible_only must be true or false" }
}

function invalid(c: Context, message: string) {
  return c.json({ error: message, code: "INVALID_REQUEST" }, 400)
}

export function profileOrderJson(order: ProfileOrder) {
  return {
    id: order.id,
    platinum: order.platinum ?? null,
    order_type: order.orderType ?? null,
    visible: order.visible ?? null,
    quantity: order.quantity ?? null,
    region: order.region ?? null,
    creation_date: order.createdAt ?? null,
    last_update: order.updatedAt ?? null,
    item: order.item
      ? { id: order.item.id ?? null, url_name: order.item.urlName, names: order.item.names }
      : null,
  }
}

function outcomeJson(outcome: FloorPriceOutcome) {
  if (outcome.ok) {
    return { item_name: outcome.result.itemName, prices: outcome.result.prices }
  }
  return { item_name: outcome.itemName, error: errorBody(outcome.error) }
}

function verificationJson(entry: ProfileOrderVerification) {
  const base = { order_id: entry.orderId, item_name: entry.itemName, listed_price: entry.listedPrice }
  if (entry.ok) return { ...base, floor_prices: entry.floorPrices }
  return { ...base, error: errorBody(entry.error) }
}

export function createMarketRoutes(tool: MarketTool) {
  const routes = new Hono()
  const defaultCount = tool.config.defaultFloorCount

  routes.get("/items/:itemName/floor-prices", async (c) => {
    const count = parseCount(c.req.query("count"), defaultCount)
    if (!count.ok) return invalid(c, count.message)

    const result = await tool.resolveFloorPrices(c.req.param("itemName"), count.value)
    return c.json({ item_name: result.itemName, prices: result.prices })
  })

  routes.get("/floor-prices", async (c) => {
    const count = parseCount(c.req.query("count"), defaultCount)
    if (!count.ok) return invalid(c, count.message)

    const items = (c.req.query("items") ?? "").split(",").map((s) => s.trim()).filter(Boolean)
    if (items.length === 0) return invalid(c, "items must name at least one item")
    if (items.length > MAX_BATCH_ITEMS) return invalid(c, `items must name at most ${MAX_BATCH_ITEMS} items`)

    const outcomes = await tool.resolveFloorPricesBatch(items, count.value)
    return c.json({ results: outcomes.map(outcomeJson) })
  })

  routes.get("/profiles/:username/orders", async (c) => {
    const orderType = parseOrderType(c.req.query("type"))
    if (!orderType.ok) return invalid(c, orderType.message)

    const username = c.req.param("username")
    const orders = await tool.getProfileOrders(username, orderType.value)
    return c.json({ username, order_type: orderType.value, orders: orders.map(profileOrderJson) })
  })

  routes.get("/profiles/:username/verify", async (c) => {
    const orderType = parseOrderType(c.req.query("type"))
    if (!orderType.ok) return invalid(c, orderType.message)
    const count = parseCount(c.req.query("count"), defaultCount)
    if (!count.ok) return invalid(c, count.message)
    const visibleOnly = parseBoolean(c.req.query("visible_only"), true)
    if (!visibleOnly.ok) return invalid(c, visibleOnly.message)

    const username = c.req.param("username")
    const results = await tool.verifyProfileOrders(username, {
      orderType: orderType.value,
      count: count.value,
      visibleOnly: visibleOnly.value,
    })
    return c.json({ username, order_type: orderType.value, results: results.map(verificationJson) })
  })

  return routes
}
