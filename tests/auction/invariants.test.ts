// tests/auction/invariants.test.ts — Property-based conservation and decimal-scale checks

import { describe, it, expect } from "vitest"
import * as fc from "fast-check"
import type { Address } from "viem"
import {
  ALICE,
  BASE,
  BOB,
  CAROL,
  CURATOR,
  GOVERNANCE,
  HOUSE,
  PROTOCOL,
  QUOTE,
  REFERRER,
  REFERRER_2,
  SELLER,
  SELLER_BASE,
  concludeLot,
  createBatchLot,
  createHarness,
  placeBid,
} from "./harness.js"

const BIDDERS: readonly Address[] = [ALICE, BOB, CAROL]
const REFERRERS: readonly (Address | null)[] = [null, REFERRER, REFERRER_2]

// --- Arbitraries ---

const arbBid = fc.record({
  bidder: fc.integer({ min: 0, max: 2 }),
  amount: fc.bigInt({ min: 10n ** 15n, max: 8n * 10n ** 18n }),
  referrer: fc.integer({ min: 0, max: 2 }),
})

const arbScenario = fc.record({
  protocolFee: fc.integer({ min: 0, max: 5_000 }),
  referrerFee: fc.integer({ min: 0, max: 5_000 }),
  curatorFee: fc.option(fc.integer({ min: 0, max: 2_000 }), { nil: null }),
  prefunded: fc.boolean(),
  capacity: fc.bigInt({ min: 10n ** 18n, max: 20n * 10n ** 18n }),
  bids: fc.array(arbBid, { minLength: 1, maxLength: 5 }),
})

type Scenario = typeof arbScenario extends fc.Arbitrary<infer T> ? T : never

// --- Helpers ---

function runToCompletion(scenario: Scenario) {
  const h = createHarness()
  h.house.setFee(GOVERNANCE, "FPB", "protocol", scenario.protocolFee)
  h.house.setFee(GOVERNANCE, "FPB", "referrer", scenario.referrerFee)
  h.house.setFee(GOVERNANCE, "FPB", "maxCurator", 5_000)
  if (scenario.curatorFee !== null) {
    h.house.setCuratorFee(CURATOR, "FPB", scenario.curatorFee)
  }

  const lotId = createBatchLot(h, {
    capacity: scenario.capacity,
    prefunded: scenario.prefunded,
    curator: scenario.curatorFee === null ? undefined : CURATOR,
  })
  if (scenario.curatorFee !== null) h.house.curate(lotId, CURATOR)

  let paidIn = 0n
  for (const bid of scenario.bids) {
    if (h.house.getLotStatus(lotId) !== "STARTED") break
    const bidder = BIDDERS[bid.bidder] ?? ALICE
    placeBid(h, bidder, bid.amount, lotId, REFERRERS[bid.referrer] ?? null)
    paidIn += bid.amount
    expect(h.house.getLotRouting(lotId).funding >= 0n).toBe(true)
  }

  concludeLot(h)
  h.house.settle(lotId)
  for (const bid of h.house.listBids(lotId)) {
    if (bid.status === "UNCLAIMED") h.house.claimBids(lotId, [bid.id], bid.bidder)
  }
  return { h, lotId, paidIn }
}

// --- Properties ---

describe("conservation", () => {
  it("every quote unit paid in ends with the seller, a bidder or an unclaimed reward", () => {
    fc.assert(
      fc.property(arbScenario, (scenario) => {
        const { h, paidIn } = runToCompletion(scenario)
        const quote = (holder: Address) => h.tokens.balanceOf(QUOTE, holder)

        const refunds = BIDDERS.reduce((sum, bidder) => sum + quote(bidder), 0n)
        const rewards =
          h.house.rewardsOf(PROTOCOL, QUOTE) + h.house.rewardsOf(REFERRER, QUOTE) + h.house.rewardsOf(REFERRER_2, QUOTE)

        expect(quote(SELLER) + refunds + rewards).toBe(paidIn)
        expect(quote(HOUSE)).toBe(rewards)
      }),
      { numRuns: 60 },
    )
  })

  it("the house holds no base and no funding once every bid is claimed", () => {
    fc.assert(
      fc.property(arbScenario, (scenario) => {
        const { h, lotId } = runToCompletion(scenario)
        const base = (holder: Address) => h.tokens.balanceOf(BASE, holder)

        expect(h.house.getLotRouting(lotId).funding).toBe(0n)
        expect(base(HOUSE)).toBe(0n)
        expect(base(SELLER) + base(CURATOR) + BIDDERS.reduce((sum, b) => sum + base(b), 0n)).toBe(SELLER_BASE)
      }),
      { numRuns: 60 },
    )
  })
})

describe("decimal scale", () => {
  function settleWith(baseDecimals: number, quoteDecimals: number, units: readonly bigint[]) {
    const h = createHarness({ baseDecimals, quoteDecimals })
    h.house.setFee(GOVERNANCE, "FPB", "protocol", 1_234)
    createBatchLot(h, {
      capacity: 10n * 10n ** BigInt(baseDecimals),
      price: 2n * 10n ** BigInt(quoteDecimals),
    })
    const quoteUnit = 10n ** BigInt(quoteDecimals - 6)
    for (const [i, u] of units.entries()) {
      if (h.house.getLotStatus(0) !== "STARTED") break
      placeBid(h, BIDDERS[i % BIDDERS.length] ?? ALICE, u * quoteUnit)
    }
    concludeLot(h)
    return h.house.settle(0).record
  }

  it("gives the same economic result at 13/17 decimals as at 18/18", () => {
    fc.assert(
      fc.property(fc.array(fc.bigInt({ min: 1_000_000n, max: 8_000_000n }), { minLength: 1, maxLength: 4 }), (units) => {
        const native = settleWith(18, 18, units)
        const scaled = settleWith(13, 17, units)

        expect(scaled.totalOut * 10n ** 5n).toBe(native.totalOut)
        expect(scaled.pfPayout * 10n ** 5n).toBe(native.pfPayout)

        const feeGap = native.protocolFee - scaled.protocolFee * 10n
        expect(feeGap >= 0n && feeGap < 10n).toBe(true)
      }),
      { numRuns: 40 },
    )
  })
})
