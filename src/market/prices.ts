// src/market/prices.ts — Project orders to sorted platinum prices

import { silentLogger, type Logger } from "../shared/logger.js"
import { assertList } from "./filter.js"
import type { Order } from "./types.js"

export function isValidPrice(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0
}

/**
 * Prices of the given orders, ascending unless `descending` is set.
 * Orders without a non-negative integer price are skipped with a warning.
 */
export function extractPrices(
  orders: readonly Order[],
  descending = false,
  log: Logger = silentLogger,
): number[] {
  assertList(orders, "extractPrices")

  const prices: number[] = []
  for (const order of orders) {
    if (isValidPrice(order.platinum)) {
      prices.push(order.platinum)
      continue
    }
    log.warn(`order ${order.id} has no usable platinum price`, { platinum: order.platinum ?? null })
  }

  return descending ? prices.sort((a, b) => b - a) : prices.sort((a, b) => a - b)
}
