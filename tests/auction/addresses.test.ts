// tests/auction/addresses.test.ts — Lowercase and checksum spellings name the same account

import { describe, it, expect, beforeEach } from "vitest"
import { getAddress, type Address } from "viem"
import { auctionRoutes } from "../../src/auction/routes.js"
import {
  ALICE,
  BASE,
  DURATION,
  E18,
  GOVERNANCE,
  PROTOCOL,
  REFERRER,
  createHarness,
  errorCode,
  fund,
  type Harness,
} from "./harness.js"

const LOWER_SELLER: Address = "0xabcdefabcdefabcdefabcdefabcdefabcdefabcd"
const LOWER_QUOTE: Address = "0xcccccccccccccccccccccccccccccccccccccccc"
const LOWER_CURATOR: Address = "0xdddddddddddddddddddddddddddddddddddddddd"
const SELLER = getAddress(LOWER_SELLER)
const QUOTE = getAddress(LOWER_QUOTE)
const CURATOR = getAddress(LOWER_CURATOR)

let h: Harness

beforeEach(() => {
  h = createHarness({ sellerPayoutMode: "claim" })
  h.tokens.createToken(LOWER_QUOTE, 18)
  fund(h.tokens, BASE, LOWER_SELLER, 100n * E18)
  h.house.setFee(GOVERNANCE, "FPB", "protocol", 1_000)
  h.house.setFee(GOVERNANCE, "FPB", "maxCurator", 5_000)
  h.house.setCuratorFee(LOWER_CURATOR, "FPB", 2_000)
})

function createLot(): number {
  return h.house.auction(LOWER_SELLER, {
    auctionType: "FPB",
    baseToken: BASE,
    quoteToken: LOWER_QUOTE,
    capacity: 10n * E18,
    duration: DURATION,
    prefunded: true,
    curator: LOWER_CURATOR,
    implParams: { price: 2n * E18, minFillPercent: 0 },
  })
}

describe("address normalization", () => {
  it("stores every address of a lot in checksum form", () => {
    const lotId = createLot()

    expect(h.house.getLotRouting(lotId)).toMatchObject({ seller: SELLER, quoteToken: QUOTE })
    expect(h.house.getLotFees(lotId).curator).toBe(CURATOR)
    expect(h.house.getCurationState(lotId)).toBe("FEE_LOCKED")
  })

  it("lets either spelling act for the seller, curator and protocol", () => {
    const lotId = createLot()
    expect(h.house.curate(lotId, CURATOR)).toEqual({ curatorFee: 2_000, reserve: 2n * 10n ** 17n })

    fund(h.tokens, QUOTE, ALICE, 20n * E18)
    h.house.bid(ALICE, { lotId, amount: 20n * E18 })
    h.house.settle(lotId)

    expect(h.house.rewardsOf(PROTOCOL, LOWER_QUOTE)).toBe(2n * 10n ** 17n)
    expect(h.house.rewardsOf(PROTOCOL, QUOTE)).toBe(2n * 10n ** 17n)
    expect(h.house.claimProceeds(lotId, SELLER)).toEqual({ lotId, quote: 198n * 10n ** 17n, base: 0n })
    expect(h.tokens.balanceOf(LOWER_QUOTE, SELLER)).toBe(198n * 10n ** 17n)
    expect(h.house.claimRewards(PROTOCOL, LOWER_QUOTE)).toBe(2n * 10n ** 17n)
    expect(h.house.rewardsOf(PROTOCOL, QUOTE)).toBe(0n)
  })

  it("cancels with the lowercase spelling of a checksum seller", () => {
    const lotId = createLot()
    expect(h.house.cancel(lotId, LOWER_SELLER)).toBe(10n * E18)
    expect(h.house.getLotStatus(lotId)).toBe("CANCELLED")
  })

  it("keys referrer rewards by checksum address", () => {
    const lowerReferrer: Address = "0xeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeee"
    h.house.setFee(GOVERNANCE, "FPB", "referrer", 500)
    const lotId = createLot()
    fund(h.tokens, QUOTE, ALICE, 20n * E18)
    h.house.bid(ALICE, { lotId, amount: 20n * E18, referrer: lowerReferrer })
    h.house.settle(lotId)

    expect(h.house.getBid(lotId, 1).referrer).toBe(getAddress(lowerReferrer))
    expect(h.house.rewardsOf(getAddress(lowerReferrer), QUOTE)).toBe(1n * 10n ** 17n)
    expect(h.house.rewardsOf(REFERRER, QUOTE)).toBe(0n)
  })

  it("rejects a malformed caller before touching state", () => {
    expect(errorCode(() => h.house.cancel(0, "0x1234"))).toBe("INVALID_PARAMS")
    expect(h.house.lotCount).toBe(0)
  })
})

describe("address normalization over HTTP", () => {
  it("claims rewards and proceeds for a lot created with lowercase addresses", async () => {
    const app = auctionRoutes(h.house)
    const lotId = createLot()
    fund(h.tokens, QUOTE, ALICE, 20n * E18)
    h.house.bid(ALICE, { lotId, amount: 20n * E18 })
    h.house.settle(lotId)

    const rewards = await app.request("/rewards/claim", {
      method: "POST",
      headers: { "Content-Type": "application/json", "x-principal": PROTOCOL },
      body: JSON.stringify({ token: LOWER_QUOTE }),
    })
    expect(await rewards.json()).toEqual({ recipient: PROTOCOL, token: QUOTE, amount: "200000000000000000" })

    const proceeds = await app.request(`/lots/${lotId}/claim-proceeds`, {
      method: "POST",
      headers: { "x-principal": LOWER_SELLER },
    })
    expect(proceeds.status).toBe(200)
    expect(await proceeds.json()).toEqual({ lotId, quote: "19800000000000000000", base: "0" })
  })
})
