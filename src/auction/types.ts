// src/auction/types.ts — Lot, fee, bid and settlement types
//
// Amounts are bigint in the token's native decimals unless a name says
// otherwise. Fee percents are integers in parts per 100,000 (100_000 = 100%).
// Timestamps are unix seconds.

import type { Address } from "viem"

// ── Constants ────────────────────────────────────────────────

/** Fee denominator: 100_000 = 100% */
export const ONE_HUNDRED_PERCENT = 100_000

/** Decimals of the internal accounting scale */
export const INTERNAL_DECIMALS = 18

export const MIN_TOKEN_DECIMALS = 6
export const MAX_TOKEN_DECIMALS = 18

/** Ceiling for native token amounts (uint96) */
export const MAX_AMOUNT = (1n << 96n) - 1n

/** Ceiling for amounts on the internal 18-decimal scale (uint128) */
export const MAX_INTERNAL_AMOUNT = (1n << 128n) - 1n

// ── Lot ──────────────────────────────────────────────────────

export type AuctionKind = "batch" | "atomic"

/** Persisted lot status. CREATED/STARTED/CONCLUDED are derived from time. */
export const PersistedLotStatus = {
  ACTIVE: "ACTIVE",
  CANCELLED: "CANCELLED",
  SETTLED: "SETTLED",
  CLAIMED: "CLAIMED",
} as const

export type PersistedLotStatus = (typeof PersistedLotStatus)[keyof typeof PersistedLotStatus]

export const LotStatus = {
  CREATED: "CREATED",
  STARTED: "STARTED",
  CONCLUDED: "CONCLUDED",
  CANCELLED: "CANCELLED",
  SETTLED: "SETTLED",
  CLAIMED: "CLAIMED",
} as const

export type LotStatus = (typeof LotStatus)[keyof typeof LotStatus]

export interface SellerProceeds {
  /** Net quote owed to the seller, not yet transferred */
  quote: bigint
  /** Unsold capacity plus unused curator reserve, not yet transferred */
  base: bigint
}

export interface Lot {
  id: number
  seller: Address
  baseToken: Address
  quoteToken: Address
  baseDecimals: number
  quoteDecimals: number
  /** Registry key of the auction module */
  auctionType: string
  kind: AuctionKind
  capacity: bigint
  start: number
  conclusion: number
  prefunded: boolean
  /** Custody address of the lot's callbacks, if any */
  callbacks: Address | null
  /** Base tokens escrowed for this lot and not yet disbursed */
  funding: bigint
  /** Base sold (atomic: cumulative payouts, batch: cleared totalOut) */
  sold: bigint
  /** Quote taken (atomic: cumulative payments, batch: effectiveIn) */
  purchased: bigint
  proceeds: SellerProceeds
  status: PersistedLotStatus
}

// ── Fees ─────────────────────────────────────────────────────

export type FeeKind = "protocol" | "referrer" | "maxCurator"

export interface FeeConfig {
  protocol: number
  referrer: number
  maxCurator: number
}

export interface LotFees {
  curator: Address | null
  curated: boolean
  /** Locked when the curator approves the lot */
  curatorFee: number
  /** Locked at the first fee-accruing event */
  protocolFee: number
  referrerFee: number
  locked: boolean
}

export interface FeeSplit {
  protocolFee: bigint
  referrerFee: bigint
  net: bigint
}

export interface ProtocolConfig {
  governance: Address
  /** Recipient of protocol fees */
  protocol: Address
}

// ── Bids ─────────────────────────────────────────────────────

export type BidClaimStatus = "UNCLAIMED" | "CLAIMED" | "REFUNDED"

export interface BidOutcome {
  /** Quote the bid committed */
  paid: bigint
  /** Base the bid receives */
  payout: bigint
  /** Quote returned to the bidder */
  refund: bigint
}

export interface BidRecord {
  id: number
  lotId: number
  bidder: Address
  referrer: Address | null
  /** Quote actually received when the bid was placed */
  amount: bigint
  status: BidClaimStatus
  /** Fixed at settlement (or cancellation) */
  outcome: BidOutcome | null
}

// ── Settlement ───────────────────────────────────────────────

/** Output of a batch module's settle(). */
export interface Settlement {
  /** Quote cleared, including the partially filled bid's full amount */
  totalIn: bigint
  /** Base sold, including pfPayout */
  totalOut: bigint
  pfBidId?: number
  pfBidder?: Address
  pfReferrer?: Address | null
  pfRefund: bigint
  pfPayout: bigint
  auctionOutput?: unknown
}

export interface SettlementRecord {
  lotId: number
  totalIn: bigint
  totalOut: bigint
  effectiveIn: bigint
  pfBidId: number | null
  pfRefund: bigint
  pfPayout: bigint
  protocolFee: bigint
  referrerFees: bigint
  curatorFee: bigint
  sellerQuote: bigint
  sellerBase: bigint
  aborted: boolean
  settledAt: number
}

export interface SettlementReceipt {
  /** ULID */
  id: string
  lotId: number
  settled: boolean
  record: SettlementRecord
}

// ── Store ────────────────────────────────────────────────────

export interface AuctionState {
  nextLotId: number
  lots: Map<number, Lot>
  lotFees: Map<number, LotFees>
  bids: Map<number, Map<number, BidRecord>>
  settlements: Map<number, SettlementRecord>
  feeConfigs: Map<string, FeeConfig>
  /** Keyed by `${auctionType}:${curator}` */
  curatorFees: Map<string, number>
  /** Keyed by `${recipient}:${token}` */
  rewards: Map<string, bigint>
  protocol: ProtocolConfig
}
