// tests/auction/curation.test.ts — Curator registration, approval and reserve sizing

import { describe, it, expect, beforeEach } from "vitest"
import {
  ALICE,
  BASE,
  BOB,
  CURATOR,
  E18,
  GOVERNANCE,
  SELLER,
  SELLER_BASE,
  concludeLot,
  createBatchLot,
  createHarness,
  errorCode,
  placeBid,
  type Harness,
} from "./harness.js"

let h: Harness

beforeEach(() => {
  h = createHarness()
  h.house.setFee(GOVERNANCE, "FPB", "maxCurator", 1_000)
})

describe("setCuratorFee", () => {
  it("rejects fees above the auction type's maximum", () => {
    expect(errorCode(() => h.house.setCuratorFee(CURATOR, "FPB", 1_001))).toBe("INVALID_FEE")
    expect(errorCode(() => h.house.setCuratorFee(CURATOR, "FPS", 1))).toBe("INVALID_FEE")
  })

  it("rejects percents outside 0..100000", () => {
    expect(errorCode(() => h.house.setCuratorFee(CURATOR, "FPB", -1))).toBe("INVALID_FEE")
    expect(errorCode(() => h.house.setCuratorFee(CURATOR, "FPB", 0.5))).toBe("INVALID_FEE")
  })
})

describe("curation state", () => {
  it("moves NO_CURATOR, CURATOR_SET, FEE_LOCKED, APPROVED", () => {
    const plain = createBatchLot(h)
    const curated = createBatchLot(h, { curator: CURATOR })

    expect(h.house.getCurationState(plain)).toBe("NO_CURATOR")
    expect(h.house.getCurationState(curated)).toBe("CURATOR_SET")

    h.house.setCuratorFee(CURATOR, "FPB", 800)
    expect(h.house.getCurationState(curated)).toBe("FEE_LOCKED")

    expect(h.house.curate(curated, CURATOR)).toEqual({ curatorFee: 800, reserve: 8n * 10n ** 16n })
    expect(h.house.getCurationState(curated)).toBe("APPROVED")
    expect(h.house.getLotFees(curated)).toMatchObject({ curated: true, curatorFee: 800 })
  })
})

describe("curate", () => {
  beforeEach(() => {
    createBatchLot(h, { curator: CURATOR })
  })

  it("requires a registered fee", () => {
    expect(errorCode(() => h.house.curate(0, CURATOR))).toBe("INVALID_STATE")
  })

  describe("with a registered fee", () => {
    beforeEach(() => {
      h.house.setCuratorFee(CURATOR, "FPB", 900)
    })

    it("is curator-only", () => {
      expect(errorCode(() => h.house.curate(0, SELLER))).toBe("NOT_PERMITTED")
    })

    it("can only happen once", () => {
      h.house.curate(0, CURATOR)
      expect(errorCode(() => h.house.curate(0, CURATOR))).toBe("INVALID_STATE")
    })

    it("is closed once the lot concludes or is cancelled", () => {
      concludeLot(h)
      expect(errorCode(() => h.house.curate(0, CURATOR))).toBe("INVALID_STATE")

      createBatchLot(h, { curator: CURATOR })
      h.house.cancel(1, SELLER)
      expect(errorCode(() => h.house.curate(1, CURATOR))).toBe("INVALID_STATE")
    })

    it("clamps the locked fee to the current maximum", () => {
      h.house.setFee(GOVERNANCE, "FPB", "maxCurator", 500)
      expect(h.house.curate(0, CURATOR)).toEqual({ curatorFee: 500, reserve: 5n * 10n ** 16n })
    })

    it("escrows the reserve from the seller on prefunded lots", () => {
      h.house.curate(0, CURATOR)
      expect(h.house.getLotRouting(0).funding).toBe(10n * E18 + 9n * 10n ** 16n)
      expect(h.tokens.balanceOf(BASE, SELLER)).toBe(SELLER_BASE - 10n * E18 - 9n * 10n ** 16n)
    })

    it("keeps the locked fee when governance changes the maximum later", () => {
      h.house.curate(0, CURATOR)
      h.house.setFee(GOVERNANCE, "FPB", "maxCurator", 0)
      placeBid(h, ALICE, 20n * E18)

      expect(h.house.settle(0).record.curatorFee).toBe(9n * 10n ** 16n)
      expect(h.tokens.balanceOf(BASE, CURATOR)).toBe(9n * 10n ** 16n)
    })
  })

  it("escrows nothing on lots without prefunding", () => {
    h.house.setCuratorFee(CURATOR, "FPB", 900)
    const lotId = createBatchLot(h, { curator: CURATOR, prefunded: false })

    expect(h.house.curate(lotId, CURATOR).reserve).toBe(0n)
    expect(h.house.getLotRouting(lotId).funding).toBe(0n)
  })

  it("rejects lots that name no curator", () => {
    const lotId = createBatchLot(h)
    expect(errorCode(() => h.house.curate(lotId, BOB))).toBe("NOT_PERMITTED")
  })
})
