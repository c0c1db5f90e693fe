#!/usr/bin/env tsx
// scripts/floor-prices.ts — Print the bottom-N floor prices for one or more items
//
// Usage: tsx scripts/floor-prices.ts <item> [item...] [--count N]

import { loadConfig } from "../src/config.js"
import { MarketTool } from "../src/market/tool.js"
import { consoleLoggerFactory } from "../src/shared/logger.js"

function parseArgs(argv: string[]): { items: string[]; count: number | undefined } {
  const items: string[] = []
  let count: number | undefined
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === "--count") {
      const raw = argv[++i] ?? ""
      if (!/^\d+$/.test(raw)) throw new Error(`--count must be a non-negative integer (got "${raw}")`)
      count = parseInt(raw, 10)
    } else {
      items.push(arg)
    }
  }
  return { items, count }
}

async function run(): Promise<number> {
  const { items, count } = parseArgs(process.argv.slice(2))
  if (items.length === 0) {
    console.error("usage: floor-prices <item> [item...] [--count N]")
    return 2
  }

  const config = loadConfig()
  const tool = new MarketTool(config.market, { loggers: consoleLoggerFactory(config.logLevel) })
  await tool.initialize()

  try {
    const outcomes = await tool.resolveFloorPricesBatch(items, count)
    let failed = 0
    for (const outcome of outcomes) {
      if (outcome.ok) {
        const { itemName, prices } = outcome.result
        console.log(`${itemName} bottom ${prices.length} floor prices are: [${prices.join(", ")}]`)
      } else {
        failed++
        console.error(`${outcome.itemName}: ${outcome.error.message}`)
      }
    }
    return failed > 0 ? 1 : 0
  } finally {
    await tool.shutdown()
  }
}

run()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error("[floor-prices] FAIL:", err)
    process.exit(1)
  })
