// src/index.ts — Auction house service entry point

import { serve } from "@hono/node-server"
import { Hono } from "hono"
import { loadConfig } from "./config.js"
import { AuctionHouse } from "./auction/house.js"
import { createAuctionLogger } from "./auction/logger.js"
import { FixedPriceBatchModule } from "./auction/modules/fixed-price-batch.js"
import { FixedPriceSaleModule } from "./auction/modules/fixed-price-sale.js"
import { ModuleRegistry } from "./auction/modules/registry.js"
import { ledgerRoutes } from "./auction/ledger-routes.js"
import { auctionRoutes } from "./auction/routes.js"
import { InMemoryTokenLedger } from "./auction/token.js"

async function main() {
  console.log("[auction] booting auction house...")

  const config = loadConfig()
  console.log(`[auction] config loaded: port=${config.port}, payout=${config.sellerPayoutMode}, grace=${config.settlementGracePeriodSeconds}s`)

  const registry = new ModuleRegistry()
    .register("FPB", new FixedPriceBatchModule())
    .register("FPS", new FixedPriceSaleModule())
  console.log(`[auction] modules registered: ${registry.types.join(", ")}`)

  const ledger = new InMemoryTokenLedger(config.houseAddress)
  for (const token of config.tokens) {
    ledger.createToken(token.address, token.decimals)
  }
  console.log(`[auction] tokens registered: ${config.tokens.length}`)

  const house = new AuctionHouse({
    registry,
    tokens: ledger,
    address: config.houseAddress,
    protocol: { governance: config.governanceAddress, protocol: config.protocolAddress },
    config: {
      sellerPayoutMode: config.sellerPayoutMode,
      settlementGracePeriod: config.settlementGracePeriodSeconds,
    },
    logger: createAuctionLogger(),
  })

  const app = new Hono()
  app.get("/health", (c) => c.json({ status: "ok", lots: house.lotCount }))
  app.route("/api/v1", auctionRoutes(house))
  app.route("/api/v1", ledgerRoutes({ ledger, governance: config.governanceAddress, house: config.houseAddress }))

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    console.log(`[auction] listening on ${config.host}:${info.port}`)
  })

  const shutdown = (signal: string) => {
    console.log(`[auction] ${signal} received, shutting down...`)
    server.close(() => {
      console.log("[auction] shutdown complete")
      process.exit(0)
    })
    setTimeout(() => {
      console.error("[auction] forced shutdown after 10s timeout")
      process.exit(1)
    }, 10_000).unref()
  }

  process.on("SIGTERM", () => shutdown("SIGTERM"))
  process.on("SIGINT", () => shutdown("SIGINT"))
}

main().catch((err) => {
  console.error("[auction] fatal:", err)
  process.exit(1)
})
