// src/market/floor.ts — Bottom-N sell prices for an item
// Pipeline: fetch item orders → in-game sell orders → ascending prices → first N.

import { silentLogger, type Logger } from "../shared/logger.js"
import { MarketError, toMarketError } from "./errors.js"
import { normalizeTargetName, type PayloadFetcher } from "./fetcher.js"
import { assertList, filterItemOrders } from "./filter.js"
import { extractPrices } from "./prices.js"
import { DEFAULT_FLOOR_COUNT, type FloorPriceOutcome, type FloorPriceResult } from "./types.js"

export function assertCount(n: number): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new MarketError("INVALID_ARGUMENT", `count must be a non-negative integer (got ${n})`)
  }
}

// Failed entries use the same key as successful ones where the name is usable.
function attributedName(raw: string): string {
  return typeof raw === "string" && raw.trim() !== "" ? normalizeTargetName("item-orders", raw) : raw
}

export class FloorPriceResolver {
  constructor(
    private readonly fetcher: PayloadFetcher,
    private readonly logger: Logger = silentLogger,
  ) {}

  async resolveFloorPrices(itemName: string, n: number = DEFAULT_FLOOR_COUNT): Promise<FloorPriceResult> {
    assertCount(n)
    const name = normalizeTargetName("item-orders", itemName)

    const { orders } = await this.fetcher.fetch("item-orders", name)
    const sellOrders = filterItemOrders(orders, "sell", this.logger)
    const prices = extractPrices(sellOrders, false, this.logger)

    return { itemName: name, prices: prices.slice(0, n) }
  }

  /**
   * Resolve several items concurrently. One outcome per input, in input order;
   * a failing item does not affect the others.
   */
  async resolveMany(itemNames: readonly string[], n: number = DEFAULT_FLOOR_COUNT): Promise<FloorPriceOutcome[]> {
    assertList(itemNames, "resolveMany", "item names")
    assertCount(n)

    const settled = await Promise.allSettled(itemNames.map((item) => this.resolveFloorPrices(item, n)))

    return settled.map((outcome, i): FloorPriceOutcome => {
      const itemName = itemNames[i]
      if (outcome.status === "fulfilled") {
        return { ok: true, itemName: outcome.value.itemName, result: outcome.value }
      }
      const error = toMarketError(outcome.reason)
      const name = attributedName(itemName)
      this.logger.warn(`floor price resolution failed for ${name}`, { code: error.code, status: error.status })
      return { ok: false, itemName: name, error }
    })
  }
}
