// src/auction/settlement.ts — Batch settlement engine
//
// settle():
// 1. Ask the lot's module for its settlement (module errors propagate as-is)
// 2. Validate it against the house's own bid records
// 3. Not settled (totalOut = 0): every bid refundable, all funding back to seller
// 4. Settled: lock fees, split effectiveIn = totalIn − pfRefund, pay curator,
//    resolve the partial fill, return unsold capacity and unused reserve
// 5. Record, then move tokens
//
// Conservation, per settled lot:
//   quote: sellerNet + protocolFee + referrerFees + refunds = Σ bids paid
//   base:  bidder payouts + curatorFee + sellerBase = capacity + reserve
//
// Runs inside the house's transaction: any throw leaves no trace.

import type { Address } from "viem"
import { ulid } from "ulid"
import type { AuctionCallbacks } from "./callbacks.js"
import type { Custody } from "./custody.js"
import type { CurationEngine } from "./curation.js"
import { AuctionError, invariantViolation } from "./errors.js"
import type { FeeContribution, FeeLedger } from "./fee-ledger.js"
import { assertAmount } from "./fixed-point.js"
import type { FundingTracker } from "./funding.js"
import { isConcluded, type LotRuntime } from "./lifecycle.js"
import type { BatchAuctionModule } from "./modules/types.js"
import type { RewardsLedger } from "./rewards.js"
import type { AuctionStore } from "./store.js"
import type { BidRecord, Lot, Settlement, SettlementReceipt, SettlementRecord } from "./types.js"

export type SellerPayoutMode = "push" | "claim"

export interface SettlementEngineOptions {
  /** push: seller paid at settlement; claim: seller pulls via claimProceeds */
  sellerPayoutMode: SellerPayoutMode
  /** Seconds after conclusion before an unsettled batch lot may be aborted */
  settlementGracePeriod: number
  clock: () => number
}

const EMPTY_SETTLEMENT: Settlement = { totalIn: 0n, totalOut: 0n, pfRefund: 0n, pfPayout: 0n }

export class SettlementEngine {
  constructor(
    private readonly store: AuctionStore,
    private readonly fees: FeeLedger,
    private readonly funding: FundingTracker,
    private readonly curation: CurationEngine,
    private readonly rewards: RewardsLedger,
    private readonly custody: Custody,
    private readonly runtime: LotRuntime,
    private readonly options: SettlementEngineOptions,
  ) {}

  /**
   * Settle a concluded batch lot.
   * @throws AuctionError INVALID_LOT_ID | NOT_IMPLEMENTED | INVALID_STATE | MARKET_NOT_ACTIVE
   * @throws AuctionError INVARIANT_VIOLATION if the module output is inconsistent
   */
  settle(lotId: number): SettlementReceipt {
    const lot = this.store.getLot(lotId)
    const module = this.batchModule(lotId)
    this.requireSettleable(lot, module)

    const { settlement } = module.settle(lotId)
    return this.finalize(lot, module, settlement, false)
  }

  /**
   * Abort a batch lot nobody settled within the grace period. Bidders get
   * full refunds and the seller gets the escrow back.
   */
  abort(lotId: number): SettlementReceipt {
    const lot = this.store.getLot(lotId)
    const module = this.batchModule(lotId)
    this.requireSettleable(lot, module)

    const now = this.options.clock()
    const abortableAt = lot.conclusion + this.options.settlementGracePeriod
    if (now < abortableAt) {
      throw new AuctionError(`Lot ${lotId} may not be aborted before ${abortableAt}`, "INVALID_STATE", {
        lotId,
        abortableAt,
      })
    }

    module.abort(lotId)
    return this.finalize(lot, module, EMPTY_SETTLEMENT, true)
  }

  // ── Preconditions ──────────────────────────────────────────

  private batchModule(lotId: number): BatchAuctionModule {
    const module = this.runtime.module(lotId)
    if (module.kind !== "batch") {
      throw new AuctionError(`Lot ${lotId} is not a batch auction`, "NOT_IMPLEMENTED", { lotId })
    }
    return module
  }

  private requireSettleable(lot: Lot, module: BatchAuctionModule): void {
    if (lot.status !== "ACTIVE") {
      throw new AuctionError(`Lot ${lot.id} is ${lot.status.toLowerCase()}`, "INVALID_STATE", {
        lotId: lot.id,
        status: lot.status,
      })
    }
    if (!isConcluded(lot, module, this.options.clock())) {
      throw new AuctionError(`Lot ${lot.id} has not concluded`, "MARKET_NOT_ACTIVE", { lotId: lot.id })
    }
  }

  // ── Finalization ───────────────────────────────────────────

  private finalize(lot: Lot, module: BatchAuctionModule, settlement: Settlement, aborted: boolean): SettlementReceipt {
    this.validate(lot, settlement)
    const bids = this.store.listBids(lot.id).filter((b) => b.status === "UNCLAIMED")

    return settlement.totalOut === 0n
      ? this.finalizeUnsettled(lot, bids, aborted)
      : this.finalizeSettled(lot, module, bids, settlement)
  }

  private finalizeUnsettled(lot: Lot, bids: BidRecord[], aborted: boolean): SettlementReceipt {
    for (const bid of bids) {
      bid.outcome = { paid: bid.amount, payout: 0n, refund: bid.amount }
    }

    const sellerBase = lot.funding
    lot.status = "SETTLED"
    const record = this.record(lot, {
      effectiveIn: 0n,
      protocolFee: 0n,
      referrerFees: 0n,
      curatorFee: 0n,
      sellerQuote: 0n,
      sellerBase,
      aborted,
    }, EMPTY_SETTLEMENT)

    this.creditSeller(lot, 0n, sellerBase)
    this.paySeller(lot, 0n, sellerBase)
    return { id: ulid(), lotId: lot.id, settled: false, record }
  }

  private finalizeSettled(
    lot: Lot,
    module: BatchAuctionModule,
    bids: BidRecord[],
    settlement: Settlement,
  ): SettlementReceipt {
    const lotFees = this.store.getLotFees(lot.id)
    this.fees.lockInFees(lot.id, lot.auctionType)

    const effectiveIn = settlement.totalIn - settlement.pfRefund
    const contributions = this.applyOutcomes(lot, module, bids, settlement, effectiveIn)
    const allocation = this.fees.allocate(lotFees, contributions, lot.quoteDecimals)
    const curatorFee = this.curation.curatorFee(lot.id, settlement.totalOut)
    const callbacks = this.runtime.callbacks(lot.id)

    const owed = lot.prefunded ? 0n : settlement.totalOut + curatorFee
    this.funding.collect(lot.id, owed)

    // Everything above totalOut + curatorFee belongs to the seller
    const sellerBase = lot.funding - settlement.totalOut - curatorFee
    if (sellerBase < 0n) {
      throw invariantViolation("funding does not cover settlement", {
        lotId: lot.id,
        funding: lot.funding.toString(),
        totalOut: settlement.totalOut.toString(),
        curatorFee: curatorFee.toString(),
      })
    }

    // State first
    lot.sold = settlement.totalOut
    lot.purchased = effectiveIn
    lot.status = "SETTLED"
    this.funding.disburse(lot.id, curatorFee, "curator fee")

    let pfBidder: Address | null = null
    if (settlement.pfBidId !== undefined) {
      const pfBid = this.store.getBid(lot.id, settlement.pfBidId)
      pfBid.status = "CLAIMED"
      pfBidder = pfBid.bidder
      this.funding.disburse(lot.id, settlement.pfPayout, "partial fill payout")
    }

    this.rewards.accrue(this.store.protocol.protocol, lot.quoteToken, allocation.protocolFee)
    for (const [referrer, fee] of allocation.referrerFees) {
      this.rewards.accrue(referrer, lot.quoteToken, fee)
    }
    this.creditSeller(lot, allocation.sellerNet, sellerBase)

    const record = this.record(lot, {
      effectiveIn,
      protocolFee: allocation.protocolFee,
      referrerFees: allocation.totalReferrerFees,
      curatorFee,
      sellerQuote: allocation.sellerNet,
      sellerBase,
      aborted: false,
    }, settlement)

    // Then tokens
    this.custody.pullExact(lot.baseToken, this.custody.baseAccount(lot, callbacks), owed, "settlement payout")
    const curator = lotFees.curator
    if (curator !== null) {
      this.custody.push(lot.baseToken, curator, curatorFee)
    }
    if (pfBidder !== null) {
      this.custody.push(lot.baseToken, pfBidder, settlement.pfPayout)
      this.custody.push(lot.quoteToken, pfBidder, settlement.pfRefund)
    }
    this.paySeller(lot, allocation.sellerNet, sellerBase, callbacks)

    return { id: ulid(), lotId: lot.id, settled: true, record }
  }

  /**
   * Fix every live bid's outcome and check the module's totals against them.
   * @returns quote retained per bid, for fee allocation
   */
  private applyOutcomes(
    lot: Lot,
    module: BatchAuctionModule,
    bids: BidRecord[],
    settlement: Settlement,
    effectiveIn: bigint,
  ): FeeContribution[] {
    let retained = 0n
    let paidOut = 0n
    const contributions: FeeContribution[] = []

    for (const bid of bids) {
      const outcome = module.bidOutcome(lot.id, bid.id)
      if (outcome.paid !== bid.amount || outcome.refund > outcome.paid) {
        throw invariantViolation("module bid outcome disagrees with the recorded bid", {
          lotId: lot.id,
          bidId: bid.id,
          amount: bid.amount.toString(),
          paid: outcome.paid.toString(),
          refund: outcome.refund.toString(),
        })
      }
      if (bid.id === settlement.pfBidId && (outcome.payout !== settlement.pfPayout || outcome.refund !== settlement.pfRefund)) {
        throw invariantViolation("partial fill disagrees with the bid outcome", { lotId: lot.id, bidId: bid.id })
      }

      bid.outcome = outcome
      const kept = outcome.paid - outcome.refund
      retained += kept
      paidOut += outcome.payout
      if (kept > 0n) {
        contributions.push({ referrer: bid.referrer, amount: kept })
      }
    }

    if (retained !== effectiveIn || paidOut !== settlement.totalOut) {
      throw invariantViolation("settlement totals do not match bid outcomes", {
        lotId: lot.id,
        effectiveIn: effectiveIn.toString(),
        retained: retained.toString(),
        totalOut: settlement.totalOut.toString(),
        paidOut: paidOut.toString(),
      })
    }
    return contributions
  }

  private validate(lot: Lot, settlement: Settlement): void {
    const { totalIn, totalOut, pfRefund, pfPayout } = settlement
    for (const [field, value] of Object.entries({ totalIn, totalOut, pfRefund, pfPayout })) {
      assertAmount(value, field)
    }

    const fail = (reason: string): never => {
      throw invariantViolation(`invalid settlement: ${reason}`, {
        lotId: lot.id,
        totalIn: totalIn.toString(),
        totalOut: totalOut.toString(),
        pfRefund: pfRefund.toString(),
        pfPayout: pfPayout.toString(),
      })
    }

    if (totalOut > lot.capacity) fail("totalOut exceeds capacity")
    if (pfPayout > totalOut) fail("pfPayout exceeds totalOut")
    if (pfRefund > totalIn) fail("pfRefund exceeds totalIn")
    if (totalOut === 0n && (totalIn > 0n || pfRefund > 0n || pfPayout > 0n)) fail("nothing sold but quote cleared")

    const hasPartial = pfRefund > 0n || pfPayout > 0n
    if (hasPartial && settlement.pfBidId === undefined) fail("partial fill without a bid id")
    if (settlement.pfBidId !== undefined) {
      const pfBid = this.store.getBid(lot.id, settlement.pfBidId)
      if (pfBid.status !== "UNCLAIMED") fail("partial fill on a refunded bid")
      if (settlement.pfBidder !== undefined && settlement.pfBidder !== pfBid.bidder) fail("pfBidder is not the bid owner")
    }
  }

  // ── Seller ─────────────────────────────────────────────────

  /** Book the seller's share: disbursed now in push mode, held as proceeds in claim mode. */
  private creditSeller(lot: Lot, quote: bigint, base: bigint): void {
    if (this.options.sellerPayoutMode === "claim") {
      lot.proceeds = { quote, base }
      return
    }
    this.funding.disburse(lot.id, base, "seller return")
  }

  /** Push mode only; claim mode leaves the transfer to claimProceeds. */
  private paySeller(lot: Lot, quote: bigint, base: bigint, callbacks?: AuctionCallbacks): void {
    if (this.options.sellerPayoutMode === "claim") return
    const cb = callbacks ?? this.runtime.callbacks(lot.id)
    this.custody.push(lot.quoteToken, this.custody.quoteRecipient(lot, cb), quote)
    this.custody.push(lot.baseToken, this.custody.baseAccount(lot, cb), base)
  }

  private record(
    lot: Lot,
    amounts: Pick<
      SettlementRecord,
      "effectiveIn" | "protocolFee" | "referrerFees" | "curatorFee" | "sellerQuote" | "sellerBase" | "aborted"
    >,
    settlement: Settlement,
  ): SettlementRecord {
    const record: SettlementRecord = {
      lotId: lot.id,
      totalIn: settlement.totalIn,
      totalOut: settlement.totalOut,
      pfBidId: settlement.pfBidId ?? null,
      pfRefund: settlement.pfRefund,
      pfPayout: settlement.pfPayout,
      ...amounts,
      settledAt: this.options.clock(),
    }
    this.store.putSettlement(record)
    return record
  }
}
