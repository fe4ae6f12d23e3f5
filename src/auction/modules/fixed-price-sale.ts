// src/auction/modules/fixed-price-sale.ts — Fixed-price atomic sale module
//
// Each purchase pays out immediately at a fixed price, bounded by the
// remaining capacity and a per-purchase maximum.

import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { AuctionError } from "../errors.js"
import { Journal } from "../transaction.js"
import { mulDiv } from "../fixed-point.js"
import type { AtomicAuctionModule, ModuleLotParams, ModuleLotStatus, ModuleLotView } from "./types.js"

export const FixedPriceSaleParams = Type.Object({
  /** Quote (native units) per one whole base token */
  price: Type.BigInt(),
  /** Largest payout of a single purchase, parts per 100,000 of capacity */
  maxPayoutPercent: Type.Integer({ minimum: 1, maximum: 100_000 }),
})

export type FixedPriceSaleParams = Static<typeof FixedPriceSaleParams>

interface SaleLot {
  capacity: bigint
  baseUnit: bigint
  price: bigint
  maxPayout: bigint
  sold: bigint
  status: ModuleLotStatus
}

export class FixedPriceSaleModule implements AtomicAuctionModule {
  readonly kind = "atomic" as const
  private readonly lots = new Map<number, SaleLot>()
  private readonly journal = new Journal()

  begin(): () => void {
    return this.journal.begin()
  }

  commit(): void {
    this.journal.commit()
  }

  auction(lotId: number, params: ModuleLotParams): void {
    if (!Value.Check(FixedPriceSaleParams, params.implParams)) {
      throw new AuctionError("Invalid fixed-price sale parameters", "INVALID_PARAMS", { lotId })
    }
    const { price, maxPayoutPercent } = params.implParams
    if (price <= 0n) {
      throw new AuctionError("Price must be positive", "INVALID_PARAMS", { lotId, price: price.toString() })
    }
    this.journal.entry("lots", this.lots, lotId)
    this.lots.set(lotId, {
      capacity: params.capacity,
      baseUnit: 10n ** BigInt(params.baseDecimals),
      price,
      maxPayout: mulDiv(params.capacity, BigInt(maxPayoutPercent), 100_000n, "floor"),
      sold: 0n,
      status: "open",
    })
  }

  cancelAuction(lotId: number): void {
    const lot = this.lot(lotId)
    if (lot.status !== "open") {
      throw new AuctionError(`Lot ${lotId} is ${lot.status}`, "INVALID_STATE", { lotId, status: lot.status })
    }
    lot.status = "cancelled"
  }

  lotStatus(lotId: number): ModuleLotStatus {
    return this.lot(lotId).status
  }

  getLot(lotId: number): ModuleLotView {
    const lot = this.lot(lotId)
    return { capacity: lot.capacity, committed: lot.sold, status: lot.status }
  }

  purchase(lotId: number, amount: bigint, _auctionData: unknown): bigint {
    const lot = this.lot(lotId)
    if (lot.status !== "open") {
      throw new AuctionError(`Lot ${lotId} is not accepting purchases`, "MARKET_NOT_ACTIVE", { lotId })
    }
    const payout = mulDiv(amount, lot.baseUnit, lot.price, "floor")
    if (payout === 0n) {
      throw new AuctionError("Purchase amount buys nothing at the fixed price", "INVALID_PARAMS", {
        lotId,
        amount: amount.toString(),
      })
    }
    if (payout > lot.maxPayout) {
      throw new AuctionError("Payout exceeds the per-purchase maximum", "INVALID_PARAMS", {
        lotId,
        payout: payout.toString(),
        maxPayout: lot.maxPayout.toString(),
      })
    }
    if (lot.sold + payout > lot.capacity) {
      throw new AuctionError("Payout exceeds remaining capacity", "INVALID_PARAMS", {
        lotId,
        payout: payout.toString(),
        remaining: (lot.capacity - lot.sold).toString(),
      })
    }

    lot.sold += payout
    if (lot.sold === lot.capacity) {
      lot.status = "soldOut"
    }
    return payout
  }

  private lot(lotId: number): SaleLot {
    const lot = this.lots.get(lotId)
    if (!lot) {
      throw new AuctionError(`Lot ${lotId} is not registered with this module`, "INVALID_LOT_ID", { lotId })
    }
    this.journal.fields(`lot:${lotId}`, lot)
    return lot
  }
}
