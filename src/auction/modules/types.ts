// src/auction/modules/types.ts — Auction-type module contracts
//
// Price discovery lives behind these interfaces. The house hands a module the
// amounts it actually received and consumes the module's settlement output;
// it never looks inside a module's book.

import type { Address } from "viem"
import type { Transactional } from "../transaction.js"
import type { AuctionKind, BidOutcome, Settlement } from "../types.js"

export interface ModuleLotParams {
  start: number
  conclusion: number
  capacity: bigint
  baseDecimals: number
  quoteDecimals: number
  /** Module-specific parameters, validated by the module */
  implParams: unknown
}

export type ModuleLotStatus = "open" | "soldOut" | "settled" | "aborted" | "cancelled"

export interface ModuleLotView {
  capacity: bigint
  /** Base committed by bids or sold by purchases so far */
  committed: bigint
  status: ModuleLotStatus
}

interface AuctionModuleBase extends Transactional {
  readonly kind: AuctionKind
  /** Register a lot. @throws AuctionError INVALID_PARAMS on bad implParams */
  auction(lotId: number, params: ModuleLotParams): void
  cancelAuction(lotId: number): void
  lotStatus(lotId: number): ModuleLotStatus
  getLot(lotId: number): ModuleLotView
}

export interface SettleOutput {
  settlement: Settlement
}

export interface BatchAuctionModule extends AuctionModuleBase {
  readonly kind: "batch"
  /** @returns the new bid id, unique within the lot */
  bid(lotId: number, bidder: Address, referrer: Address | null, amount: bigint, auctionData: unknown): number
  /** Exclude a bid from clearing. @returns the quote amount to return */
  refundBid(lotId: number, bidId: number): bigint
  settle(lotId: number): SettleOutput
  /** Outcome of a bid after settle(). */
  bidOutcome(lotId: number, bidId: number): BidOutcome
  abort(lotId: number): void
}

export interface AtomicAuctionModule extends AuctionModuleBase {
  readonly kind: "atomic"
  /** @returns the base payout for amount of quote */
  purchase(lotId: number, amount: bigint, auctionData: unknown): bigint
}

export type AuctionModule = BatchAuctionModule | AtomicAuctionModule
