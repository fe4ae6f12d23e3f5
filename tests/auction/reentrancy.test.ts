// tests/auction/reentrancy.test.ts — Malicious tokens re-entering the house, and full rollback on failure

import { describe, it, expect, beforeEach } from "vitest"
import { isAuctionError } from "../../src/auction/errors.js"
import type { TokenTransfer } from "../../src/auction/token.js"
import { ALICE, BASE, BOB, E18, HOUSE, QUOTE, createBatchLot, createHarness, placeBid, type Harness } from "./harness.js"

let h: Harness

interface Attempt {
  code: string
  reentrant: string | number | boolean | undefined
}

/** Run fn and record how the house rejected it. */
function attempt(fn: () => unknown, into: Attempt[]): void {
  try {
    fn()
    into.push({ code: "ACCEPTED", reentrant: undefined })
  } catch (err) {
    if (!isAuctionError(err)) throw err
    into.push({ code: err.code, reentrant: err.details.reentrant })
  }
}

beforeEach(() => {
  h = createHarness()
  createBatchLot(h)
  placeBid(h, ALICE, 18n * E18)
  placeBid(h, BOB, 6n * E18)
})

describe("re-entrant calls from a token transfer", () => {
  it("rejects settle and claim re-entered during settlement", () => {
    const attempts: Attempt[] = []
    h.tokens.setTransferHook(QUOTE, (t: TokenTransfer) => {
      if (t.from !== HOUSE || t.to !== BOB) return
      attempt(() => h.house.settle(0), attempts)
      attempt(() => h.house.claimBids(0, [1], ALICE), attempts)
    })

    const receipt = h.house.settle(0)

    expect(attempts).toEqual([
      { code: "INVALID_STATE", reentrant: true },
      { code: "INVALID_STATE", reentrant: true },
    ])
    expect(receipt.settled).toBe(true)
    expect(h.tokens.balanceOf(BASE, BOB)).toBe(1n * E18)
    expect(h.tokens.balanceOf(QUOTE, BOB)).toBe(4n * E18)
    expect(h.tokens.balanceOf(BASE, ALICE)).toBe(0n)
    expect(h.house.getBid(0, 1).status).toBe("UNCLAIMED")
  })

  it("pays a bid once when the bidder re-enters claimBids", () => {
    h.house.settle(0)
    const attempts: Attempt[] = []
    h.tokens.setTransferHook(BASE, (t: TokenTransfer) => {
      if (t.from === HOUSE && t.to === ALICE) attempt(() => h.house.claimBids(0, [1], ALICE), attempts)
    })

    h.house.claimBids(0, [1], ALICE)

    expect(attempts).toEqual([{ code: "INVALID_STATE", reentrant: true }])
    expect(h.tokens.balanceOf(BASE, ALICE)).toBe(9n * E18)
    expect(h.house.getLotRouting(0).funding).toBe(0n)
  })
})

describe("failed calls on another lot during a transfer", () => {
  it("leave the outer settlement intact", () => {
    const other = createBatchLot(h)
    const attempts: Attempt[] = []
    h.tokens.setTransferHook(QUOTE, (t: TokenTransfer) => {
      if (t.from === HOUSE && t.to === BOB) attempt(() => h.house.claimBids(other, [1], BOB), attempts)
    })

    h.house.settle(0)

    expect(attempts).toEqual([{ code: "INVALID_STATE", reentrant: undefined }])
    expect(h.house.getLotStatus(0)).toBe("SETTLED")
    expect(h.house.getBid(0, 2).status).toBe("CLAIMED")
    expect(h.house.getLotRouting(0).funding).toBe(9n * E18)
    expect(h.house.claimBids(0, [1], ALICE)).toEqual([{ bidId: 1, payout: 9n * E18, refund: 0n }])
  })
})

describe("rollback", () => {
  it("restores every balance, record and module state when a transfer fails", () => {
    h.tokens.setTransferHook(QUOTE, (t: TokenTransfer) => {
      if (t.to === BOB) throw new Error("transfer reverted")
    })

    expect(() => h.house.settle(0)).toThrow("transfer reverted")

    expect(h.house.getLotStatus(0)).toBe("CONCLUDED")
    expect(h.house.getSettlement(0)).toBeUndefined()
    expect(h.house.getBid(0, 2)).toMatchObject({ status: "UNCLAIMED", outcome: null })
    expect(h.house.getLotRouting(0).funding).toBe(10n * E18)
    expect(h.tokens.balanceOf(BASE, BOB)).toBe(0n)
    expect(h.tokens.balanceOf(QUOTE, HOUSE)).toBe(24n * E18)
    expect(h.batch.lotStatus(0)).toBe("soldOut")

    h.tokens.setTransferHook(QUOTE, undefined)
    expect(h.house.settle(0).settled).toBe(true)
  })
})
