// src/auction/claims.ts — Seller and bidder claim flows
//
// claimProceeds: seller pulls whatever the lot still owes them and the lot
// becomes CLAIMED. claimBids: bidders pull payout and/or refund per bid.
// refundBid: a bidder withdraws a bid before the lot concludes.
//
// Claim flags and funding move before any token leaves the house.

import type { Address } from "viem"
import { enabled } from "./callbacks.js"
import type { Custody } from "./custody.js"
import { AuctionError, invalidBidId, invariantViolation } from "./errors.js"
import type { FundingTracker } from "./funding.js"
import { isConcluded, type LotRuntime } from "./lifecycle.js"
import type { AuctionStore } from "./store.js"
import type { BidOutcome, BidRecord, Lot } from "./types.js"

export interface ProceedsClaim {
  lotId: number
  /** Quote paid to the seller (or the callback custody address) */
  quote: bigint
  /** Base returned: unsold capacity plus unused curator reserve */
  base: bigint
}

export interface BidClaim {
  bidId: number
  payout: bigint
  refund: bigint
}

export class ClaimEngine {
  constructor(
    private readonly store: AuctionStore,
    private readonly funding: FundingTracker,
    private readonly custody: Custody,
    private readonly runtime: LotRuntime,
    private readonly clock: () => number,
  ) {}

  // ── Seller ─────────────────────────────────────────────────

  /**
   * Seller collects outstanding proceeds.
   * @throws AuctionError NOT_PERMITTED unless caller is the seller
   * @throws AuctionError INVALID_STATE when nothing is claimable (including a repeat claim)
   */
  claimProceeds(lotId: number, caller: Address): ProceedsClaim {
    const lot = this.store.getLot(lotId)
    if (caller !== lot.seller) {
      throw new AuctionError("Only the seller may claim proceeds", "NOT_PERMITTED", { lotId, caller })
    }

    const module = this.runtime.module(lotId)
    const claimable =
      module.kind === "batch"
        ? lot.status === "SETTLED"
        : lot.status === "ACTIVE" && isConcluded(lot, module, this.clock())
    if (!claimable) {
      throw new AuctionError(`Lot ${lotId} has no claimable proceeds (${lot.status.toLowerCase()})`, "INVALID_STATE", {
        lotId,
        status: lot.status,
      })
    }

    const quote = lot.proceeds.quote
    const base = module.kind === "batch" ? lot.proceeds.base : lot.funding
    lot.proceeds = { quote: 0n, base: 0n }
    this.funding.disburse(lotId, base, "seller proceeds")
    lot.status = "CLAIMED"

    const callbacks = this.runtime.callbacks(lotId)
    this.custody.push(lot.quoteToken, this.custody.quoteRecipient(lot, callbacks), quote)
    this.custody.push(lot.baseToken, this.custody.baseAccount(lot, callbacks), base)

    if (enabled(callbacks, "onClaimProceeds")) {
      callbacks.onClaimProceeds?.(lotId, quote, base)
    }
    return { lotId, quote, base }
  }

  // ── Bidders ────────────────────────────────────────────────

  /**
   * Pay out and/or refund each listed bid. All ids are checked before any
   * bid is touched.
   */
  claimBids(lotId: number, bidIds: readonly number[], caller: Address): BidClaim[] {
    const lot = this.store.getLot(lotId)
    if (this.runtime.module(lotId).kind !== "batch") {
      throw new AuctionError(`Lot ${lotId} is not a batch auction`, "NOT_IMPLEMENTED", { lotId })
    }
    if (lot.status === "ACTIVE") {
      throw new AuctionError(`Lot ${lotId} is not settled`, "INVALID_STATE", { lotId, status: lot.status })
    }
    if (bidIds.length === 0) {
      throw new AuctionError("No bid ids given", "INVALID_PARAMS", { lotId })
    }
    if (new Set(bidIds).size !== bidIds.length) {
      throw new AuctionError("Duplicate bid ids", "INVALID_PARAMS", { lotId })
    }

    const bids = bidIds.map((bidId) => this.claimableBid(lot, bidId, caller))
    const settled = bids.map((bid) => {
      const outcome = this.outcomeOf(lot, bid)
      bid.status = outcome.payout > 0n ? "CLAIMED" : "REFUNDED"
      bid.outcome = outcome
      this.funding.disburse(lotId, outcome.payout, `bid ${bid.id} payout`)
      return { bidder: bid.bidder, claim: { bidId: bid.id, payout: outcome.payout, refund: outcome.refund } }
    })

    for (const { bidder, claim } of settled) {
      this.custody.push(lot.baseToken, bidder, claim.payout)
      this.custody.push(lot.quoteToken, bidder, claim.refund)
    }
    return settled.map(({ claim }) => claim)
  }

  /**
   * Withdraw a bid before the lot concludes. The module drops it from
   * clearing and the full amount goes back to the bidder.
   */
  refundBid(lotId: number, bidId: number, caller: Address): bigint {
    const lot = this.store.getLot(lotId)
    const module = this.runtime.module(lotId)
    if (module.kind !== "batch") {
      throw new AuctionError(`Lot ${lotId} is not a batch auction`, "NOT_IMPLEMENTED", { lotId })
    }
    if (lot.status !== "ACTIVE") {
      throw new AuctionError(`Lot ${lotId} is ${lot.status.toLowerCase()}`, "INVALID_STATE", {
        lotId,
        status: lot.status,
      })
    }
    if (isConcluded(lot, module, this.clock())) {
      throw new AuctionError(`Lot ${lotId} has concluded`, "MARKET_NOT_ACTIVE", { lotId })
    }
    const bid = this.claimableBid(lot, bidId, caller)

    const refund = module.refundBid(lotId, bidId)
    if (refund !== bid.amount) {
      throw invariantViolation("module refund differs from the recorded bid", {
        lotId,
        bidId,
        amount: bid.amount.toString(),
        refund: refund.toString(),
      })
    }

    bid.status = "REFUNDED"
    bid.outcome = { paid: bid.amount, payout: 0n, refund }
    this.custody.push(lot.quoteToken, bid.bidder, refund)
    return refund
  }

  // ── Internals ──────────────────────────────────────────────

  private claimableBid(lot: Lot, bidId: number, caller: Address): BidRecord {
    const bid = this.store.getBid(lot.id, bidId)
    if (bid.bidder !== caller) {
      throw new AuctionError(`Bid ${bidId} does not belong to caller`, "NOT_BIDDER", { lotId: lot.id, bidId, caller })
    }
    if (bid.status !== "UNCLAIMED") {
      throw invalidBidId(lot.id, bidId, `is already ${bid.status.toLowerCase()}`)
    }
    return bid
  }

  private outcomeOf(lot: Lot, bid: BidRecord): BidOutcome {
    if (lot.status === "CANCELLED") {
      return { paid: bid.amount, payout: 0n, refund: bid.amount }
    }
    if (bid.outcome === null) {
      throw invariantViolation("settled bid has no outcome", { lotId: lot.id, bidId: bid.id })
    }
    return bid.outcome
  }
}
