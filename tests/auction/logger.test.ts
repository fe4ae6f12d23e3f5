// tests/auction/logger.test.ts — JSON line operation logger

import { describe, it, expect } from "vitest"
import { AuctionError } from "../../src/auction/errors.js"
import { createAuctionLogger } from "../../src/auction/logger.js"

const FIXED = () => new Date("2024-01-01T00:00:00.000Z")

describe("createAuctionLogger", () => {
  it("writes bigint metadata as decimal strings", () => {
    const lines: string[] = []
    createAuctionLogger((line) => lines.push(line), FIXED).log("bid", 3, { amount: 10n ** 18n, bid_id: 1 })

    expect(lines).toEqual([
      '{"timestamp":"2024-01-01T00:00:00.000Z","operation":"bid","lot_id":3,"amount":"1000000000000000000","bid_id":1}',
    ])
  })

  it("adds the error code for auction errors only", () => {
    const lines: string[] = []
    const logger = createAuctionLogger((line) => lines.push(line), FIXED)
    logger.logError("settle", 0, new AuctionError("Lot 0 is settled", "INVALID_STATE"))
    logger.logError("claim_rewards", null, new Error("transfer reverted"))

    expect(lines.map((line) => JSON.parse(line))).toEqual([
      { timestamp: "2024-01-01T00:00:00.000Z", operation: "settle", lot_id: 0, error: "Lot 0 is settled", error_code: "INVALID_STATE" },
      { timestamp: "2024-01-01T00:00:00.000Z", operation: "claim_rewards", lot_id: null, error: "transfer reverted" },
    ])
  })
})
