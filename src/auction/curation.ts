// src/auction/curation.ts — Curator fees, approval and reserve sizing
//
// Per-lot state: NO_CURATOR → CURATOR_SET → FEE_LOCKED → APPROVED.
// The curator's fee is charged on the sold amount. On pre-funded lots the
// largest possible fee is escrowed at approval, so settlement never depends on
// later governance changes; whatever is left of that reserve goes back to the
// seller.

import type { Address } from "viem"
import { enabled } from "./callbacks.js"
import type { Custody } from "./custody.js"
import { AuctionError } from "./errors.js"
import { assertPercent, percentOf } from "./fixed-point.js"
import type { FundingTracker } from "./funding.js"
import { isConcluded, type LotRuntime } from "./lifecycle.js"
import type { AuctionStore } from "./store.js"

export type CurationState = "NO_CURATOR" | "CURATOR_SET" | "FEE_LOCKED" | "APPROVED"

export interface CurationResult {
  curatorFee: number
  reserve: bigint
}

export class CurationEngine {
  constructor(
    private readonly store: AuctionStore,
    private readonly funding: FundingTracker,
    private readonly custody: Custody,
    private readonly runtime: LotRuntime,
  ) {}

  /**
   * Register the fee a curator charges for lots of an auction type.
   * @throws AuctionError INVALID_FEE above the auction type's maxCurator
   */
  setCuratorFee(curator: Address, auctionType: string, percent: number): void {
    assertPercent(percent, "curatorFee")
    const { maxCurator } = this.store.getFeeConfig(auctionType)
    if (percent > maxCurator) {
      throw new AuctionError(`Curator fee ${percent} exceeds maximum ${maxCurator}`, "INVALID_FEE", {
        auctionType,
        percent,
        maxCurator,
      })
    }
    this.store.putCuratorFee(auctionType, curator, percent)
  }

  state(lotId: number): CurationState {
    const lot = this.store.getLot(lotId)
    const fees = this.store.getLotFees(lotId)
    if (fees.curator === null) return "NO_CURATOR"
    if (fees.curated) return "APPROVED"
    return this.store.getCuratorFee(lot.auctionType, fees.curator) === undefined ? "CURATOR_SET" : "FEE_LOCKED"
  }

  /**
   * Curator approves the lot. The fee percent is locked, clamped to the
   * current maxCurator, and on pre-funded lots the reserve is collected.
   */
  curate(lotId: number, caller: Address, now: number): CurationResult {
    const lot = this.store.getLot(lotId)
    const fees = this.store.getLotFees(lotId)

    if (fees.curator === null || caller !== fees.curator) {
      throw new AuctionError("Only the designated curator may curate", "NOT_PERMITTED", { lotId, caller })
    }
    if (lot.status !== "ACTIVE" || isConcluded(lot, this.runtime.module(lotId), now)) {
      throw new AuctionError(`Lot ${lotId} can no longer be curated`, "INVALID_STATE", { lotId, status: lot.status })
    }
    if (fees.curated) {
      throw new AuctionError(`Lot ${lotId} is already curated`, "INVALID_STATE", { lotId })
    }
    const registered = this.store.getCuratorFee(lot.auctionType, fees.curator)
    if (registered === undefined) {
      throw new AuctionError("Curator has not set a fee for this auction type", "INVALID_STATE", {
        lotId,
        auctionType: lot.auctionType,
      })
    }

    const curatorFee = Math.min(registered, this.store.getFeeConfig(lot.auctionType).maxCurator)
    fees.curated = true
    fees.curatorFee = curatorFee

    const reserve = this.maxPotentialFee(lotId)
    const callbacks = this.runtime.callbacks(lotId)
    if (reserve > 0n) {
      this.funding.collect(lotId, reserve)
      this.custody.pullExact(lot.baseToken, this.custody.baseAccount(lot, callbacks), reserve, "curator reserve")
    }

    if (enabled(callbacks, "onCurate")) {
      callbacks.onCurate?.(lotId, curatorFee, reserve)
    }
    return { curatorFee, reserve }
  }

  /** floor(sold × curatorFee / 100_000); zero unless approved. */
  curatorFee(lotId: number, sold: bigint): bigint {
    const lot = this.store.getLot(lotId)
    const fees = this.store.getLotFees(lotId)
    if (!fees.curated) return 0n
    return percentOf(sold, fees.curatorFee, lot.baseDecimals, "floor")
  }

  /** Reserve escrowed at approval: ceil(capacity × curatorFee / 100_000) on pre-funded lots. */
  maxPotentialFee(lotId: number): bigint {
    const lot = this.store.getLot(lotId)
    const fees = this.store.getLotFees(lotId)
    if (!fees.curated || !lot.prefunded) return 0n
    return percentOf(lot.capacity, fees.curatorFee, lot.baseDecimals, "ceil")
  }
}
