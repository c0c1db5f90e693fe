// src/market/optimizer.ts — Compare a seller's listed prices with the current market floor
//
// Each (visible) profile order is paired with the floor prices of its item.
// A profile order without an item reference violates the upstream contract and
// fails the whole call before any floor price is fetched. Floor-price failures
// are attributed to their order and do not block the others.

import { silentLogger, type Logger } from "../shared/logger.js"
import { MarketError, toMarketError } from "./errors.js"
import type { PayloadFetcher } from "./fetcher.js"
import { filterVisible } from "./filter.js"
import { assertCount, type FloorPriceResolver } from "./floor.js"
import { isValidPrice } from "./prices.js"
import {
  DEFAULT_FLOOR_COUNT,
  ORDER_TYPES,
  type FloorPriceResult,
  type OrderType,
  type ProfileOrder,
  type ProfileOrderVerification,
} from "./types.js"

export interface VerifyOptions {
  orderType?: OrderType
  /** Floor prices per item. Default 5 */
  count?: number
  /** Skip hidden listings. Default true */
  visibleOnly?: boolean
}

function assertOrderType(orderType: OrderType): void {
  if (!ORDER_TYPES.includes(orderType)) {
    throw new MarketError("INVALID_ARGUMENT", `order type must be one of ${ORDER_TYPES.join(", ")} (got "${orderType}")`)
  }
}

export class ProfileOptimizer {
  constructor(
    private readonly fetcher: PayloadFetcher,
    private readonly resolver: FloorPriceResolver,
    private readonly logger: Logger = silentLogger,
  ) {}

  async getProfileOrders(username: string, orderType: OrderType = "sell"): Promise<ProfileOrder[]> {
    assertOrderType(orderType)
    const payload = await this.fetcher.fetch("profile-orders", username)
    return orderType === "sell" ? payload.sellOrders : payload.buyOrders
  }

  async verifyProfileOrders(username: string, options: VerifyOptions = {}): Promise<ProfileOrderVerification[]> {
    const orderType = options.orderType ?? "sell"
    const count = options.count ?? DEFAULT_FLOOR_COUNT
    const visibleOnly = options.visibleOnly ?? true
    assertOrderType(orderType)
    assertCount(count)

    const orders = await this.getProfileOrders(username, orderType)
    const candidates = visibleOnly ? filterVisible(orders) : orders

    const entries = candidates.map((order) => {
      if (!order.item) {
        throw new MarketError("INTEGRITY_VIOLATION", `profile order ${order.id} has no item reference`, {
          context: { username, orderId: order.id },
        })
      }
      return { order, itemName: order.item.urlName }
    })

    // One floor-price lookup per distinct item
    const items = [...new Set(entries.map((e) => e.itemName))]
    const settled = await Promise.allSettled(items.map((item) => this.resolver.resolveFloorPrices(item, count)))
    const floorFor = (item: string): PromiseSettledResult<FloorPriceResult> => settled[items.indexOf(item)]

    return entries.map(({ order, itemName }): ProfileOrderVerification => {
      let listedPrice: number | null = null
      if (isValidPrice(order.platinum)) {
        listedPrice = order.platinum
      } else {
        this.logger.warn(`profile order ${order.id} has no usable platinum price`, { username, itemName })
      }

      const floor = floorFor(itemName)
      if (floor.status === "fulfilled") {
        return { ok: true, orderId: order.id, itemName, listedPrice, floorPrices: floor.value.prices }
      }

      const error = toMarketError(floor.reason)
      this.logger.warn(`floor prices unavailable for ${itemName}`, { username, orderId: order.id, code: error.code })
      return { ok: false, orderId: order.id, itemName, listedPrice, error }
    })
  }
}
