// src/market/filter.ts — Order selection for price discovery
//
// Only sellers currently in game count toward a floor price. Malformed orders
// are logged and dropped; the rest of the batch carries on. Relative input
// order is preserved; nothing here sorts.

import { silentLogger, type Logger } from "../shared/logger.js"
import { MarketError } from "./errors.js"
import type { ItemOrder, OrderType, ProfileOrder } from "./types.js"

export function assertList(value: unknown, stage: string, what = "orders"): asserts value is readonly unknown[] {
  if (!Array.isArray(value)) {
    throw new MarketError("INVALID_ARGUMENT", `${stage} expects a list of ${what}`, {
      context: { received: value === null ? "null" : typeof value },
    })
  }
}

export function filterItemOrders(
  orders: readonly ItemOrder[],
  wantedType: OrderType,
  log: Logger = silentLogger,
): ItemOrder[] {
  assertList(orders, "filterItemOrders")

  return orders.filter((order) => {
    if (order.orderType === undefined) {
      log.warn(`order ${order.id} is malformed: missing order type`)
      return false
    }
    if (order.orderType !== wantedType) return false
    if (order.user === undefined) {
      log.warn(`order ${order.id} is malformed: no seller attached`)
      return false
    }

    switch (order.user.status) {
      case "ingame":
        return true
      case "online":
      case "offline":
        return false
      default:
        log.warn(`order ${order.id} has an unsupported seller status`)
        return false
    }
  })
}

export function filterVisible(orders: readonly ProfileOrder[]): ProfileOrder[] {
  assertList(orders, "filterVisible")
  return orders.filter((order) => order.visible === true)
}
