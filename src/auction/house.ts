// src/auction/house.ts — Auction house facade
//
// The single entry point for every state-mutating call. Each call:
// 0. Brings every address it is given to checksum form
// 1. Takes the per-lot reentrancy lock
// 2. Runs inside one transaction over bindings, store, tokens and the lot's module
// 3. Logs one structured line, success or failure
//
// Lot creation, cancellation, bids and atomic purchases live here; settlement,
// claims and curation are delegated to their engines.

import type { Address } from "viem"
import { toAddress, toNonZeroAddress } from "./address.js"
import { type AuctionCallbacks, enabled, validateCallbacks } from "./callbacks.js"
import { type BidClaim, ClaimEngine, type ProceedsClaim } from "./claims.js"
import { type CurationResult, type CurationState, CurationEngine } from "./curation.js"
import { Custody } from "./custody.js"
import { AuctionError } from "./errors.js"
import { FeeLedger, hasReferrer } from "./fee-ledger.js"
import { assertAmount, assertDecimals } from "./fixed-point.js"
import { FundingTracker } from "./funding.js"
import { deriveStatus, isConcluded, LotBindings } from "./lifecycle.js"
import { type AuctionLogger, type AuctionOperation, createAuctionLogger } from "./logger.js"
import type { AtomicAuctionModule, AuctionModule, BatchAuctionModule } from "./modules/types.js"
import type { ModuleRegistry } from "./modules/registry.js"
import { RewardsLedger } from "./rewards.js"
import { type SellerPayoutMode, SettlementEngine } from "./settlement.js"
import { AuctionStore } from "./store.js"
import type { PermitApproval, TokenMover } from "./token.js"
import { atomically, LotGuard, type Transactional } from "./transaction.js"
import type {
  AuctionKind,
  BidRecord,
  FeeConfig,
  FeeKind,
  FeeSplit,
  Lot,
  LotFees,
  LotStatus,
  ProtocolConfig,
  SettlementReceipt,
  SettlementRecord,
} from "./types.js"

// ── Parameters ───────────────────────────────────────────────

export interface AuctionHouseConfig {
  sellerPayoutMode: SellerPayoutMode
  /** Seconds after conclusion before an unsettled batch lot may be aborted */
  settlementGracePeriod: number
}

export interface AuctionHouseDeps {
  registry: ModuleRegistry
  tokens: TokenMover
  /** The house's own custody address */
  address: Address
  protocol: ProtocolConfig
  config: AuctionHouseConfig
  /** Unix seconds */
  clock?: () => number
  logger?: AuctionLogger
}

export interface CreateLotParams {
  auctionType: string
  baseToken: Address
  quoteToken: Address
  capacity: bigint
  /** Unix seconds; omitted or 0 starts now */
  start?: number
  /** Seconds */
  duration: number
  prefunded: boolean
  curator?: Address | null
  callbacks?: AuctionCallbacks
  implParams: unknown
}

export interface BidParams {
  lotId: number
  referrer?: Address | null
  amount: bigint
  auctionData?: unknown
  permit?: PermitApproval
}

export interface PurchaseParams extends BidParams {
  /** Smallest acceptable payout */
  minAmountOut: bigint
}

export interface PurchaseResult extends FeeSplit {
  /** Quote actually received */
  amount: bigint
  payout: bigint
  curatorFee: bigint
}

export interface LotRouting {
  seller: Address
  baseToken: Address
  quoteToken: Address
  auctionType: string
  callbacks: Address | null
  funding: bigint
  prefunded: boolean
}

export interface LotData {
  kind: AuctionKind
  start: number
  conclusion: number
  capacity: bigint
  sold: bigint
  purchased: bigint
  baseDecimals: number
  quoteDecimals: number
}

// ── Auction House ────────────────────────────────────────────

export class AuctionHouse {
  readonly address: Address
  private readonly registry: ModuleRegistry
  private readonly tokens: TokenMover
  private readonly clock: () => number
  private readonly logger: AuctionLogger

  private readonly store: AuctionStore
  private readonly bindings = new LotBindings()
  private readonly guard = new LotGuard()
  private readonly fees: FeeLedger
  private readonly rewards: RewardsLedger
  private readonly funding: FundingTracker
  private readonly custody: Custody
  private readonly curation: CurationEngine
  private readonly settlement: SettlementEngine
  private readonly claims: ClaimEngine

  constructor(deps: AuctionHouseDeps) {
    this.address = toAddress(deps.address, "address")
    this.registry = deps.registry
    this.tokens = deps.tokens
    this.clock = deps.clock ?? (() => Math.floor(Date.now() / 1000))
    this.logger = deps.logger ?? createAuctionLogger()

    this.store = new AuctionStore({
      governance: toAddress(deps.protocol.governance, "governance"),
      protocol: toAddress(deps.protocol.protocol, "protocol"),
    })
    this.fees = new FeeLedger(this.store)
    this.rewards = new RewardsLedger(this.store)
    this.funding = new FundingTracker(this.store)
    this.custody = new Custody(deps.tokens, this.address)
    this.curation = new CurationEngine(this.store, this.funding, this.custody, this.bindings)
    this.settlement = new SettlementEngine(
      this.store,
      this.fees,
      this.funding,
      this.curation,
      this.rewards,
      this.custody,
      this.bindings,
      {
        sellerPayoutMode: deps.config.sellerPayoutMode,
        settlementGracePeriod: deps.config.settlementGracePeriod,
        clock: this.clock,
      },
    )
    this.claims = new ClaimEngine(this.store, this.funding, this.custody, this.bindings, this.clock)
  }

  // ── Lot Lifecycle ──────────────────────────────────────────

  /**
   * Create a lot.
   * @returns the new lot id
   * @throws AuctionError INVALID_PARAMS on bad tokens, amounts, times or callbacks
   */
  auction(caller: Address, params: CreateLotParams): number {
    const seller = this.principal("auction", null, caller)
    const module = this.logged("auction", null, () => this.registry.resolve(params.auctionType))
    return this.execute("auction", null, "house:create", [module], () => this.createLot(seller, params, module), (id) => ({
      created_lot_id: id,
      auction_type: params.auctionType,
      prefunded: params.prefunded,
    }))
  }

  /** Seller withdraws the lot before it concludes; escrow goes back to the seller. */
  cancel(lotId: number, caller: Address): bigint {
    const seller = this.principal("cancel", lotId, caller)
    return this.onLot("cancel", lotId, (lot, module) => {
      if (seller !== lot.seller) {
        throw new AuctionError("Only the seller may cancel", "NOT_PERMITTED", { lotId, caller: seller })
      }
      if (lot.status !== "ACTIVE") {
        throw new AuctionError(`Lot ${lotId} is ${lot.status.toLowerCase()}`, "INVALID_STATE", { lotId, status: lot.status })
      }
      if (isConcluded(lot, module, this.clock())) {
        throw new AuctionError(`Lot ${lotId} has concluded`, "MARKET_NOT_ACTIVE", { lotId })
      }

      module.cancelAuction(lotId)
      const refund = this.funding.drain(lotId, "cancellation")
      lot.status = "CANCELLED"

      const callbacks = this.bindings.callbacks(lotId)
      this.custody.push(lot.baseToken, this.custody.baseAccount(lot, callbacks), refund)
      if (enabled(callbacks, "onCancel")) {
        callbacks.onCancel?.(lotId, refund, lot.prefunded)
      }
      return refund
    })
  }

  // ── Trading ────────────────────────────────────────────────

  /**
   * Place a bid on a batch lot. The bid is recorded at the quote amount the
   * house actually received.
   * @returns the bid id
   */
  bid(caller: Address, params: BidParams): number {
    const bidder = this.principal("bid", params.lotId, caller)
    return this.onLot("bid", params.lotId, (lot, module) => {
      const batch = this.requireBatch(lot.id, module)
      this.requireLive(lot, module)
      const referrer = normalizeReferrer(params.referrer)
      const received = this.collectQuote(lot, bidder, params)

      this.fees.lockInFees(lot.id, lot.auctionType)
      const bidId = batch.bid(lot.id, bidder, referrer, received, params.auctionData)
      const bid: BidRecord = {
        id: bidId,
        lotId: lot.id,
        bidder,
        referrer,
        amount: received,
        status: "UNCLAIMED",
        outcome: null,
      }
      this.store.putBid(bid)

      const callbacks = this.bindings.callbacks(lot.id)
      if (enabled(callbacks, "onBid")) {
        callbacks.onBid?.(lot.id, bidId, bidder, received)
      }
      return bidId
    }, { amount: params.amount })
  }

  /** Buy from an atomic lot. Fees, payout and seller net settle immediately. */
  purchase(caller: Address, params: PurchaseParams): PurchaseResult {
    const buyer = this.principal("purchase", params.lotId, caller)
    return this.onLot("purchase", params.lotId, (lot, module) => {
      const atomic = this.requireAtomic(lot.id, module)
      this.requireLive(lot, module)
      assertAmount(params.minAmountOut, "minAmountOut")
      const referrer = normalizeReferrer(params.referrer)
      const received = this.collectQuote(lot, buyer, params)

      this.fees.lockInFees(lot.id, lot.auctionType)
      const lotFees = this.store.getLotFees(lot.id)
      const payout = atomic.purchase(lot.id, received, params.auctionData)
      if (payout < params.minAmountOut) {
        throw new AuctionError(`Payout ${payout} is below minimum ${params.minAmountOut}`, "INVALID_PARAMS", {
          lotId: lot.id,
          payout: payout.toString(),
          minAmountOut: params.minAmountOut.toString(),
        })
      }

      const split = this.fees.computeSplit(received, lotFees.protocolFee, lotFees.referrerFee, referrer, lot.quoteDecimals)
      const curatorFee = this.curation.curatorFee(lot.id, payout)
      const owed = payout + curatorFee
      const callbacks = this.bindings.callbacks(lot.id)

      // State first
      if (!lot.prefunded) this.funding.collect(lot.id, owed)
      this.funding.disburse(lot.id, owed, "purchase payout")
      lot.sold += payout
      lot.purchased += received
      this.rewards.accrue(this.store.protocol.protocol, lot.quoteToken, split.protocolFee)
      if (hasReferrer(referrer)) {
        this.rewards.accrue(referrer, lot.quoteToken, split.referrerFee)
      }

      // Then tokens
      if (!lot.prefunded) {
        this.custody.pullExact(lot.baseToken, this.custody.baseAccount(lot, callbacks), owed, "purchase payout")
      }
      this.custody.push(lot.quoteToken, this.custody.quoteRecipient(lot, callbacks), split.net)
      this.custody.push(lot.baseToken, buyer, payout)
      if (lotFees.curator !== null) {
        this.custody.push(lot.baseToken, lotFees.curator, curatorFee)
      }
      if (enabled(callbacks, "onPurchase")) {
        callbacks.onPurchase?.(lot.id, buyer, received, payout, lot.prefunded)
      }
      return { amount: received, payout, curatorFee, ...split }
    }, { amount: params.amount })
  }

  // ── Curation ───────────────────────────────────────────────

  curate(lotId: number, caller: Address): CurationResult {
    const curator = this.principal("curate", lotId, caller)
    return this.onLot("curate", lotId, () => this.curation.curate(lotId, curator, this.clock()))
  }

  setCuratorFee(caller: Address, auctionType: string, percent: number): void {
    const curator = this.principal("set_curator_fee", null, caller)
    this.execute("set_curator_fee", null, "house:config", [], () => this.curation.setCuratorFee(curator, auctionType, percent), () => ({
      curator,
      auction_type: auctionType,
      percent,
    }))
  }

  // ── Settlement and Claims ──────────────────────────────────

  settle(lotId: number): SettlementReceipt {
    return this.onLot("settle", lotId, () => this.settlement.settle(lotId))
  }

  abort(lotId: number): SettlementReceipt {
    return this.onLot("abort", lotId, () => this.settlement.abort(lotId))
  }

  claimProceeds(lotId: number, caller: Address): ProceedsClaim {
    const seller = this.principal("claim_proceeds", lotId, caller)
    return this.onLot("claim_proceeds", lotId, () => this.claims.claimProceeds(lotId, seller))
  }

  claimBids(lotId: number, bidIds: readonly number[], caller: Address): BidClaim[] {
    const bidder = this.principal("claim_bids", lotId, caller)
    return this.onLot("claim_bids", lotId, () => this.claims.claimBids(lotId, bidIds, bidder), { bids: bidIds.length })
  }

  refundBid(lotId: number, bidId: number, caller: Address): bigint {
    const bidder = this.principal("refund_bid", lotId, caller)
    return this.onLot("refund_bid", lotId, () => this.claims.refundBid(lotId, bidId, bidder), { bid_id: bidId })
  }

  /** Withdraw accrued protocol/referrer fees for one token. */
  claimRewards(caller: Address, token: Address): bigint {
    const recipient = this.principal("claim_rewards", null, caller)
    const rewardToken = this.logged("claim_rewards", null, () => toAddress(token, "token"))
    return this.execute("claim_rewards", null, `rewards:${recipient}`, [], () => {
      const amount = this.rewards.take(recipient, rewardToken)
      this.custody.push(rewardToken, recipient, amount)
      return amount
    }, (amount) => ({ recipient, token: rewardToken, amount }))
  }

  // ── Governance ─────────────────────────────────────────────

  setFee(caller: Address, auctionType: string, kind: FeeKind, percent: number): FeeConfig {
    const governance = this.principal("set_fee", null, caller)
    return this.execute("set_fee", null, "house:config", [], () => this.fees.setFee(governance, auctionType, kind, percent), () => ({
      auction_type: auctionType,
      kind,
      percent,
    }))
  }

  /** Change the protocol fee recipient. Accrued rewards stay with the old recipient. */
  setProtocol(caller: Address, protocol: Address): void {
    const governance = this.principal("set_protocol", null, caller)
    this.execute("set_protocol", null, "house:config", [], () => {
      if (governance !== this.store.protocol.governance) {
        throw new AuctionError("Only governance may set the protocol address", "NOT_PERMITTED", { caller: governance })
      }
      this.store.setProtocolRecipient(toNonZeroAddress(protocol, "protocol"))
    }, () => ({ protocol: this.store.protocol.protocol }))
  }

  // ── Views ──────────────────────────────────────────────────

  get lotCount(): number {
    return this.store.lotCount
  }

  get protocol(): ProtocolConfig {
    return { ...this.store.protocol }
  }

  getFees(auctionType: string): FeeConfig {
    return this.fees.getFees(auctionType)
  }

  getLotRouting(lotId: number): LotRouting {
    const lot = this.store.getLot(lotId)
    return {
      seller: lot.seller,
      baseToken: lot.baseToken,
      quoteToken: lot.quoteToken,
      auctionType: lot.auctionType,
      callbacks: lot.callbacks,
      funding: lot.funding,
      prefunded: lot.prefunded,
    }
  }

  getLotFees(lotId: number): LotFees {
    return { ...this.store.getLotFees(lotId) }
  }

  getLotData(lotId: number): LotData {
    const lot = this.store.getLot(lotId)
    return {
      kind: lot.kind,
      start: lot.start,
      conclusion: lot.conclusion,
      capacity: lot.capacity,
      sold: lot.sold,
      purchased: lot.purchased,
      baseDecimals: lot.baseDecimals,
      quoteDecimals: lot.quoteDecimals,
    }
  }

  getLotStatus(lotId: number): LotStatus {
    return deriveStatus(this.store.getLot(lotId), this.bindings.module(lotId), this.clock())
  }

  getLotProceeds(lotId: number): Lot["proceeds"] {
    return { ...this.store.getLot(lotId).proceeds }
  }

  getBid(lotId: number, bidId: number): BidRecord {
    return structuredClone(this.store.getBid(lotId, bidId))
  }

  listBids(lotId: number): BidRecord[] {
    return structuredClone(this.store.listBids(lotId))
  }

  getSettlement(lotId: number): SettlementRecord | undefined {
    this.store.getLot(lotId)
    const record = this.store.getSettlement(lotId)
    return record ? { ...record } : undefined
  }

  rewardsOf(recipient: Address, token: Address): bigint {
    return this.rewards.balanceOf(toAddress(recipient, "recipient"), toAddress(token, "token"))
  }

  getCurationState(lotId: number): CurationState {
    return this.curation.state(lotId)
  }

  // ── Internals ──────────────────────────────────────────────

  private createLot(seller: Address, params: CreateLotParams, module: AuctionModule): number {
    const baseToken = toNonZeroAddress(params.baseToken, "baseToken")
    const quoteToken = toNonZeroAddress(params.quoteToken, "quoteToken")
    assertAmount(params.capacity, "capacity")
    if (params.capacity === 0n) {
      throw new AuctionError("Capacity must be positive", "INVALID_PARAMS", { field: "capacity" })
    }

    const now = this.clock()
    const start = params.start === undefined || params.start === 0 ? now : params.start
    if (!Number.isInteger(start) || start < now) {
      throw new AuctionError("Start must not be in the past", "INVALID_PARAMS", { start, now })
    }
    if (!Number.isInteger(params.duration) || params.duration <= 0) {
      throw new AuctionError("Duration must be a positive number of seconds", "INVALID_PARAMS", {
        duration: params.duration,
      })
    }

    const curator = params.curator ? toNonZeroAddress(params.curator, "curator") : null
    const callbacks = params.callbacks
    if (callbacks) validateCallbacks(callbacks)
    const callbacksAddress = callbacks ? toAddress(callbacks.address, "callbacks") : null

    const baseDecimals = assertDecimals(this.tokens.decimals(baseToken), "baseDecimals")
    const quoteDecimals = assertDecimals(this.tokens.decimals(quoteToken), "quoteDecimals")

    const lot: Lot = {
      id: this.store.allocateLotId(),
      seller,
      baseToken,
      quoteToken,
      baseDecimals,
      quoteDecimals,
      auctionType: params.auctionType,
      kind: module.kind,
      capacity: params.capacity,
      start,
      conclusion: start + params.duration,
      prefunded: params.prefunded,
      callbacks: callbacksAddress,
      funding: 0n,
      sold: 0n,
      purchased: 0n,
      proceeds: { quote: 0n, base: 0n },
      status: "ACTIVE",
    }
    this.store.putLot(lot, {
      curator,
      curated: false,
      curatorFee: 0,
      protocolFee: 0,
      referrerFee: 0,
      locked: false,
    })
    this.bindings.bind(lot.id, module, callbacks)

    module.auction(lot.id, {
      start,
      conclusion: lot.conclusion,
      capacity: lot.capacity,
      baseDecimals,
      quoteDecimals,
      implParams: params.implParams,
    })

    if (enabled(callbacks, "onCreate")) {
      callbacks.onCreate?.({
        lotId: lot.id,
        seller,
        baseToken: lot.baseToken,
        quoteToken: lot.quoteToken,
        capacity: lot.capacity,
        prefund: lot.prefunded,
      })
    }

    if (lot.prefunded) {
      this.funding.collect(lot.id, lot.capacity)
      this.custody.pullExact(lot.baseToken, this.custody.baseAccount(lot, callbacks), lot.capacity, "capacity")
    }
    return lot.id
  }

  private collectQuote(lot: Lot, caller: Address, params: BidParams): bigint {
    assertAmount(params.amount, "amount")
    if (params.amount === 0n) {
      throw new AuctionError("Amount must be positive", "INVALID_PARAMS", { lotId: lot.id, field: "amount" })
    }
    if (params.permit) {
      this.custody.permit(lot.quoteToken, caller, this.address, params.amount, params.permit)
    }
    const received = this.custody.pull(lot.quoteToken, caller, params.amount)
    if (received === 0n) {
      throw new AuctionError("Nothing received", "INVALID_PARAMS", { lotId: lot.id, amount: params.amount.toString() })
    }
    return received
  }

  private requireLive(lot: Lot, module: AuctionModule): void {
    const now = this.clock()
    if (lot.status !== "ACTIVE" || now < lot.start || isConcluded(lot, module, now)) {
      throw new AuctionError(`Lot ${lot.id} is not live`, "MARKET_NOT_ACTIVE", {
        lotId: lot.id,
        status: deriveStatus(lot, module, now),
      })
    }
  }

  private requireBatch(lotId: number, module: AuctionModule): BatchAuctionModule {
    if (module.kind !== "batch") {
      throw new AuctionError(`Lot ${lotId} is not a batch auction`, "NOT_IMPLEMENTED", { lotId })
    }
    return module
  }

  private requireAtomic(lotId: number, module: AuctionModule): AtomicAuctionModule {
    if (module.kind !== "atomic") {
      throw new AuctionError(`Lot ${lotId} is not an atomic auction`, "NOT_IMPLEMENTED", { lotId })
    }
    return module
  }

  /** Run fn for an existing lot under its lock and transaction. */
  private onLot<T>(
    operation: AuctionOperation,
    lotId: number,
    fn: (lot: Lot, module: AuctionModule) => T,
    metadata: Record<string, unknown> = {},
  ): T {
    const module = this.logged(operation, lotId, () => this.bindings.module(lotId))
    return this.execute(operation, lotId, `lot:${lotId}`, [module], () => fn(this.store.getLot(lotId), module), () => metadata)
  }

  /** Checksum form of the caller; a malformed one is logged and rejected. */
  private principal(operation: AuctionOperation, lotId: number | null, caller: string): Address {
    return this.logged(operation, lotId, () => toAddress(caller, "caller"))
  }

  /** Log a failure that happens before the transaction opens. */
  private logged<T>(operation: AuctionOperation, lotId: number | null, fn: () => T): T {
    try {
      return fn()
    } catch (err) {
      this.logger.logError(operation, lotId, err)
      throw err
    }
  }

  private execute<T>(
    operation: AuctionOperation,
    lotId: number | null,
    lockKey: string,
    participants: readonly Transactional[],
    fn: () => T,
    describe: (result: T) => Record<string, unknown>,
  ): T {
    let result: T
    try {
      result = this.guard.run(lockKey, () =>
        atomically([this.bindings, this.store, this.tokens, ...participants], fn),
      )
    } catch (err) {
      this.logger.logError(operation, lotId, err)
      throw err
    }
    this.logger.log(operation, lotId, describe(result))
    return result
  }
}

function normalizeReferrer(referrer: Address | null | undefined): Address | null {
  return hasReferrer(referrer) ? toAddress(referrer, "referrer") : null
}
