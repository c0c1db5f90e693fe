// tests/gateway/market-routes.test.ts — HTTP gateway over the MarketTool

import { describe, it, expect, beforeEach, afterEach } from "vitest"
import { createApp } from "../../src/gateway/server.js"
import { statusFor } from "../../src/gateway/errors.js"
import { MarketError } from "../../src/market/errors.js"
import { MarketTool } from "../../src/market/tool.js"
import { silentLogger } from "../../src/shared/logger.js"
import {
  API_BASE,
  StubTransport,
  itemOrdersBody,
  itemUrl,
  noSleep,
  profileOrdersBody,
  profileUrl,
  wireItemOrder,
  wireProfileOrder,
} from "../helpers/market.js"

let transport: StubTransport
let tool: MarketTool

beforeEach(async () => {
  transport = new StubTransport()
  tool = new MarketTool(
    { apiBase: API_BASE, requestLimit: 100 },
    { createTransport: () => transport, loggers: () => silentLogger, sleep: noSleep },
  )
  await tool.initialize()
})

afterEach(async () => {
  await tool.shutdown()
})

describe("GET /health", () => {
  it("reports the tool and limiter state", async () => {
    const res = await createApp(tool).request("/health")
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({
      status: "healthy",
      tool: "running",
      rate_limiter: { running: true, admitted: 0, limit: 100, window_ms: 1000 },
    })
  })

  it("returns 503 once the tool is shut down", async () => {
    await tool.shutdown()
    const res = await createApp(tool).request("/health")
    expect(res.status).toBe(503)
    expect(await res.json()).toMatchObject({ status: "unavailable", tool: "closed" })
  })
})

describe("GET /api/v1/items/:itemName/floor-prices", () => {
  it("returns the bottom prices", async () => {
    transport.onJson(itemUrl("catalyzing_shields"), itemOrdersBody([
      wireItemOrder(45), wireItemOrder(30), wireItemOrder(60), wireItemOrder(30), wireItemOrder(90),
    ]))

    const res = await createApp(tool).request("/api/v1/items/catalyzing_shields/floor-prices?count=3")

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ item_name: "catalyzing_shields", prices: [30, 30, 45] })
  })

  it("maps an unknown item to 404", async () => {
    const res = await createApp(tool).request("/api/v1/items/not_an_item/floor-prices")

    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({
      error: "[wfm] UPSTREAM_STATUS: expected HTTP 200, got HTTP 404",
      code: "UPSTREAM_STATUS",
      upstream_status: 404,
    })
  })

  it("maps other upstream statuses to 502", async () => {
    transport.onJson(itemUrl("serration"), { error: "down" }, 503)
    const res = await createApp(tool).request("/api/v1/items/serration/floor-prices")
    expect(res.status).toBe(502)
    expect(await res.json()).toMatchObject({ code: "UPSTREAM_STATUS", upstream_status: 503 })
  })

  it("rejects a malformed count", async () => {
    const app = createApp(tool)

    const bad = await app.request("/api/v1/items/serration/floor-prices?count=-2")
    const big = await app.request("/api/v1/items/serration/floor-prices?count=101")

    expect(bad.status).toBe(400)
    expect(await bad.json()).toEqual({ error: "count must be a non-negative integer", code: "INVALID_REQUEST" })
    expect(big.status).toBe(400)
    expect(transport.calls).toEqual([])
  })
})

describe("GET /api/v1/floor-prices", () => {
  it("resolves a batch with per-item errors", async () => {
    transport.onJson(itemUrl("serration"), itemOrdersBody([wireItemOrder(10), wireItemOrder(8)]))

    const res = await createApp(tool).request("/api/v1/floor-prices?items=serration,%20missing&count=1")

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      results: [
        { item_name: "serration", prices: [8] },
        {
          item_name: "missing",
          error: {
            error: "[wfm] UPSTREAM_STATUS: expected HTTP 200, got HTTP 404",
            code: "UPSTREAM_STATUS",
            upstream_status: 404,
          },
        },
      ],
    })
  })

  it("requires at least one item", async () => {
    const res = await createApp(tool).request("/api/v1/floor-prices?items=,")
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: "items must name at least one item", code: "INVALID_REQUEST" })
  })
})

describe("profile routes", () => {
  beforeEach(() => {
    transport.onJson(profileUrl("TennoTrader"), profileOrdersBody(
      [wireProfileOrder("s1", "blind_rage", 25)],
      [wireProfileOrder("b1", "serration", 8, { type: "buy" })],
    ))
    transport.onJson(itemUrl("blind_rage"), itemOrdersBody([
      wireItemOrder(28), wireItemOrder(20), wireItemOrder(30), wireItemOrder(25), wireItemOrder(22),
    ]))
  })

  it("lists buy orders in snake_case", async () => {
    const res = await createApp(tool).request("/api/v1/profiles/TennoTrader/orders?type=BUY")

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      username: "TennoTrader",
      order_type: "buy",
      orders: [{
        id: "b1",
        platinum: 8,
        order_type: "buy",
        visible: true,
        quantity: 1,
        region: "en",
        creation_date: null,
        last_update: null,
        item: { id: "item-serration", url_name: "serration", names: { en: "serration" } },
      }],
    })
  })

  it("rejects an unknown order type", async () => {
    const res = await createApp(tool).request("/api/v1/profiles/TennoTrader/orders?type=trade")
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: "type must be one of sell, buy", code: "INVALID_REQUEST" })
  })

  it("verifies listings against the floor", async () => {
    const res = await createApp(tool).request("/api/v1/profiles/TennoTrader/verify")

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      username: "TennoTrader",
      order_type: "sell",
      results: [{ order_id: "s1", item_name: "blind_rage", listed_price: 25, floor_prices: [20, 22, 25, 28, 30] }],
    })
  })

  it("maps an integrity violation to 502", async () => {
    transport.onJson(profileUrl("Broken"), profileOrdersBody([wireProfileOrder("x1", null, 5)]))

    const res = await createApp(tool).request("/api/v1/profiles/Broken/verify")

    expect(res.status).toBe(502)
    expect(await res.json()).toEqual({
      error: "[wfm] INTEGRITY_VIOLATION: profile order x1 has no item reference",
      code: "INTEGRITY_VIOLATION",
    })
  })

  it("rejects a malformed visible_only flag", async () => {
    const res = await createApp(tool).request("/api/v1/profiles/TennoTrader/verify?visible_only=maybe")
    expect(res.status).toBe(400)
  })
})

describe("statusFor", () => {
  it("maps each error code to an HTTP status", () => {
    expect(statusFor(new MarketError("INVALID_ARGUMENT", "x"))).toBe(400)
    expect(statusFor(new MarketError("UPSTREAM_STATUS", "x", { status: 404 }))).toBe(404)
    expect(statusFor(new MarketError("UPSTREAM_STATUS", "x", { status: 500 }))).toBe(502)
    expect(statusFor(new MarketError("NETWORK_ERROR", "x"))).toBe(502)
    expect(statusFor(new MarketError("DECODE_FAILED", "x", { status: 200 }))).toBe(502)
    expect(statusFor(new MarketError("TOOL_NOT_READY", "x"))).toBe(503)
  })

  it("returns 503 from the API after shutdown", async () => {
    await tool.shutdown()
    const res = await createApp(tool).request("/api/v1/items/serration/floor-prices")
    expect(res.status).toBe(503)
    expect(await res.json()).toMatchObject({ code: "TOOL_NOT_READY" })
  })
})
