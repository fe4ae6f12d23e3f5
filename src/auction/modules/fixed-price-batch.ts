// src/auction/modules/fixed-price-batch.ts — Fixed-price batch auction module
//
// Bids commit quote at a fixed price. The lot sells out once committed payout
// reaches capacity. At settlement bids fill in arrival order; the bid that
// crosses capacity is partially filled and refunded the remainder. If fewer
// than minFillPercent of capacity would sell, nothing settles and every bid is
// refunded.

import type { Address } from "viem"
import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { AuctionError, invalidBidId } from "../errors.js"
import { Journal } from "../transaction.js"
import { assertPercent, mulDiv } from "../fixed-point.js"
import type { BidOutcome, Settlement } from "../types.js"
import type { BatchAuctionModule, ModuleLotParams, ModuleLotStatus, ModuleLotView, SettleOutput } from "./types.js"

export const FixedPriceBatchParams = Type.Object({
  /** Quote (native units) per one whole base token */
  price: Type.BigInt(),
  /** Minimum share of capacity that must sell, parts per 100,000 */
  minFillPercent: Type.Integer({ minimum: 0, maximum: 100_000 }),
})

export type FixedPriceBatchParams = Static<typeof FixedPriceBatchParams>

interface BatchBid {
  bidder: Address
  referrer: Address | null
  amount: bigint
  cancelled: boolean
}

interface BatchLot {
  capacity: bigint
  baseUnit: bigint
  price: bigint
  minFilled: bigint
  bids: Map<number, BatchBid>
  nextBidId: number
  /** Full payout of all live bids */
  committed: bigint
  status: ModuleLotStatus
  outcomes: Map<number, BidOutcome>
}

export class FixedPriceBatchModule implements BatchAuctionModule {
  readonly kind = "batch" as const
  private readonly lots = new Map<number, BatchLot>()
  private readonly journal = new Journal()

  begin(): () => void {
    return this.journal.begin()
  }

  commit(): void {
    this.journal.commit()
  }

  auction(lotId: number, params: ModuleLotParams): void {
    if (!Value.Check(FixedPriceBatchParams, params.implParams)) {
      throw new AuctionError("Invalid fixed-price batch parameters", "INVALID_PARAMS", { lotId })
    }
    const { price, minFillPercent } = params.implParams
    if (price <= 0n) {
      throw new AuctionError("Price must be positive", "INVALID_PARAMS", { lotId, price: price.toString() })
    }
    assertPercent(minFillPercent, "minFillPercent")

    this.journal.entry("lots", this.lots, lotId)
    this.lots.set(lotId, {
      capacity: params.capacity,
      baseUnit: 10n ** BigInt(params.baseDecimals),
      price,
      minFilled: mulDiv(params.capacity, BigInt(minFillPercent), 100_000n, "ceil"),
      bids: new Map(),
      nextBidId: 1,
      committed: 0n,
      status: "open",
      outcomes: new Map(),
    })
  }

  cancelAuction(lotId: number): void {
    const lot = this.lot(lotId)
    this.requireStatus(lotId, lot, ["open", "soldOut"])
    lot.status = "cancelled"
  }

  lotStatus(lotId: number): ModuleLotStatus {
    return this.lot(lotId).status
  }

  getLot(lotId: number): ModuleLotView {
    const lot = this.lot(lotId)
    return { capacity: lot.capacity, committed: lot.committed, status: lot.status }
  }

  bid(lotId: number, bidder: Address, referrer: Address | null, amount: bigint, _auctionData: unknown): number {
    const lot = this.lot(lotId)
    if (lot.status !== "open") {
      throw new AuctionError(`Lot ${lotId} is not accepting bids`, "MARKET_NOT_ACTIVE", { lotId, status: lot.status })
    }
    const payout = this.payoutFor(lot, amount)
    if (payout === 0n) {
      throw new AuctionError("Bid amount buys nothing at the fixed price", "INVALID_PARAMS", {
        lotId,
        amount: amount.toString(),
      })
    }

    const bidId = lot.nextBidId++
    lot.bids.set(bidId, { bidder, referrer, amount, cancelled: false })
    lot.committed += payout
    if (lot.committed >= lot.capacity) {
      lot.status = "soldOut"
    }
    return bidId
  }

  refundBid(lotId: number, bidId: number): bigint {
    const lot = this.lot(lotId)
    this.requireStatus(lotId, lot, ["open"])
    const bid = lot.bids.get(bidId)
    if (!bid) throw invalidBidId(lotId, bidId)
    if (bid.cancelled) throw invalidBidId(lotId, bidId, "is already refunded")

    bid.cancelled = true
    lot.committed -= this.payoutFor(lot, bid.amount)
    return bid.amount
  }

  settle(lotId: number): SettleOutput {
    const lot = this.lot(lotId)
    this.requireStatus(lotId, lot, ["open", "soldOut"])

    let filled = 0n
    let totalIn = 0n
    let partial: { bidId: number; bid: BatchBid; payout: bigint; refund: bigint } | null = null
    const outcomes = new Map<number, BidOutcome>()

    for (const [bidId, bid] of [...lot.bids].sort(([a], [b]) => a - b)) {
      if (bid.cancelled) continue
      const full = this.payoutFor(lot, bid.amount)

      if (filled >= lot.capacity) {
        outcomes.set(bidId, refundAll(bid.amount))
      } else if (filled + full <= lot.capacity) {
        outcomes.set(bidId, { paid: bid.amount, payout: full, refund: 0n })
        filled += full
        totalIn += bid.amount
      } else {
        const fill = lot.capacity - filled
        const cost = mulDiv(fill, lot.price, lot.baseUnit, "ceil")
        const refund = bid.amount - cost
        outcomes.set(bidId, { paid: bid.amount, payout: fill, refund })
        partial = { bidId, bid, payout: fill, refund }
        filled = lot.capacity
        totalIn += bid.amount
      }
    }

    lot.status = "settled"

    if (filled === 0n || filled < lot.minFilled) {
      for (const [bidId, bid] of lot.bids) {
        if (!bid.cancelled) lot.outcomes.set(bidId, refundAll(bid.amount))
      }
      return { settlement: { totalIn: 0n, totalOut: 0n, pfRefund: 0n, pfPayout: 0n, auctionOutput: { price: lot.price } } }
    }

    lot.outcomes = outcomes
    const settlement: Settlement = {
      totalIn,
      totalOut: filled,
      pfRefund: partial?.refund ?? 0n,
      pfPayout: partial?.payout ?? 0n,
      auctionOutput: { price: lot.price },
    }
    if (partial) {
      settlement.pfBidId = partial.bidId
      settlement.pfBidder = partial.bid.bidder
      settlement.pfReferrer = partial.bid.referrer
    }
    return { settlement }
  }

  bidOutcome(lotId: number, bidId: number): BidOutcome {
    const lot = this.lot(lotId)
    const bid = lot.bids.get(bidId)
    if (!bid) throw invalidBidId(lotId, bidId)
    if (bid.cancelled) return refundAll(bid.amount)
    this.requireStatus(lotId, lot, ["settled", "aborted"])
    return lot.outcomes.get(bidId) ?? refundAll(bid.amount)
  }

  abort(lotId: number): void {
    const lot = this.lot(lotId)
    this.requireStatus(lotId, lot, ["open", "soldOut"])
    lot.status = "aborted"
    lot.outcomes = new Map()
  }

  private payoutFor(lot: BatchLot, amount: bigint): bigint {
    return mulDiv(amount, lot.baseUnit, lot.price, "floor")
  }

  private lot(lotId: number): BatchLot {
    const lot = this.lots.get(lotId)
    if (!lot) {
      throw new AuctionError(`Lot ${lotId} is not registered with this module`, "INVALID_LOT_ID", { lotId })
    }
    this.journal.fields(`lot:${lotId}`, lot)
    return lot
  }

  private requireStatus(lotId: number, lot: BatchLot, allowed: readonly ModuleLotStatus[]): void {
    if (!allowed.includes(lot.status)) {
      throw new AuctionError(`Lot ${lotId} is ${lot.status}`, "INVALID_STATE", { lotId, status: lot.status })
    }
  }
}

function refundAll(amount: bigint): BidOutcome {
  return { paid: amount, payout: 0n, refund: amount }
}
