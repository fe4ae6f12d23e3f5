// src/auction/store.ts — In-memory auction state with snapshot/restore
//
// Single owned store for lots, fees, bids, settlements, rewards and the
// protocol configuration. Every accessor that hands out a mutable record, and
// every write, is recorded in the undo journal first, so a rollback restores
// only what the transaction touched, in place.

import type { Address } from "viem"
import type {
  AuctionState,
  BidRecord,
  FeeConfig,
  Lot,
  LotFees,
  ProtocolConfig,
  SettlementRecord,
} from "./types.js"
import { Journal, type Transactional } from "./transaction.js"
import { invalidBidId, invalidLotId } from "./errors.js"

const EMPTY_FEE_CONFIG: FeeConfig = { protocol: 0, referrer: 0, maxCurator: 0 }

export class AuctionStore implements Transactional {
  private readonly state: AuctionState
  private readonly journal = new Journal()

  constructor(protocol: ProtocolConfig) {
    this.state = {
      nextLotId: 0,
      lots: new Map(),
      lotFees: new Map(),
      bids: new Map(),
      settlements: new Map(),
      feeConfigs: new Map(),
      curatorFees: new Map(),
      rewards: new Map(),
      protocol: { ...protocol },
    }
  }

  begin(): () => void {
    return this.journal.begin()
  }

  commit(): void {
    this.journal.commit()
  }

  // ── Protocol ───────────────────────────────────────────────

  get protocol(): ProtocolConfig {
    return this.state.protocol
  }

  setProtocolRecipient(protocol: Address): void {
    this.journal.fields("protocol", this.state.protocol)
    this.state.protocol.protocol = protocol
  }

  // ── Lots ───────────────────────────────────────────────────

  /** Allocate the next lot id. Ids are never reused. */
  allocateLotId(): number {
    const nextLotId = this.state.nextLotId
    this.journal.record("nextLotId", () => () => {
      this.state.nextLotId = nextLotId
    })
    return this.state.nextLotId++
  }

  get lotCount(): number {
    return this.state.nextLotId
  }

  putLot(lot: Lot, fees: LotFees): void {
    this.journal.entry("lots", this.state.lots, lot.id)
    this.journal.entry("lotFees", this.state.lotFees, lot.id)
    this.journal.entry("bids", this.state.bids, lot.id)
    this.state.lots.set(lot.id, lot)
    this.state.lotFees.set(lot.id, fees)
    this.state.bids.set(lot.id, new Map())
  }

  /** @throws AuctionError INVALID_LOT_ID */
  getLot(lotId: number): Lot {
    const lot = this.state.lots.get(lotId)
    if (!lot) throw invalidLotId(lotId)
    this.journal.fields(`lot:${lotId}`, lot)
    return lot
  }

  hasLot(lotId: number): boolean {
    return this.state.lots.has(lotId)
  }

  getLotFees(lotId: number): LotFees {
    const fees = this.state.lotFees.get(lotId)
    if (!fees) throw invalidLotId(lotId)
    this.journal.fields(`lotFees:${lotId}`, fees)
    return fees
  }

  // ── Bids ───────────────────────────────────────────────────

  putBid(bid: BidRecord): void {
    const bids = this.bidsOf(bid.lotId)
    this.journal.entry(`bids:${bid.lotId}`, bids, bid.id)
    bids.set(bid.id, bid)
  }

  /** @throws AuctionError INVALID_BID_ID */
  getBid(lotId: number, bidId: number): BidRecord {
    const bid = this.bidsOf(lotId).get(bidId)
    if (!bid) throw invalidBidId(lotId, bidId)
    this.journal.fields(`bid:${lotId}:${bidId}`, bid)
    return bid
  }

  listBids(lotId: number): BidRecord[] {
    const bids = [...this.bidsOf(lotId).values()]
    for (const bid of bids) {
      this.journal.fields(`bid:${lotId}:${bid.id}`, bid)
    }
    return bids
  }

  private bidsOf(lotId: number): Map<number, BidRecord> {
    const bids = this.state.bids.get(lotId)
    if (!bids) throw invalidLotId(lotId)
    return bids
  }

  // ── Settlements ────────────────────────────────────────────

  putSettlement(record: SettlementRecord): void {
    this.journal.entry("settlements", this.state.settlements, record.lotId)
    this.state.settlements.set(record.lotId, record)
  }

  getSettlement(lotId: number): SettlementRecord | undefined {
    return this.state.settlements.get(lotId)
  }

  // ── Fee Configuration ──────────────────────────────────────

  getFeeConfig(auctionType: string): FeeConfig {
    return { ...(this.state.feeConfigs.get(auctionType) ?? EMPTY_FEE_CONFIG) }
  }

  putFeeConfig(auctionType: string, config: FeeConfig): void {
    this.journal.entry("feeConfigs", this.state.feeConfigs, auctionType)
    this.state.feeConfigs.set(auctionType, { ...config })
  }

  getCuratorFee(auctionType: string, curator: Address): number | undefined {
    return this.state.curatorFees.get(`${auctionType}:${curator}`)
  }

  putCuratorFee(auctionType: string, curator: Address, percent: number): void {
    const key = `${auctionType}:${curator}`
    this.journal.entry("curatorFees", this.state.curatorFees, key)
    this.state.curatorFees.set(key, percent)
  }

  // ── Rewards ────────────────────────────────────────────────

  getReward(recipient: Address, token: Address): bigint {
    return this.state.rewards.get(`${recipient}:${token}`) ?? 0n
  }

  putReward(recipient: Address, token: Address, amount: bigint): void {
    const key = `${recipient}:${token}`
    this.journal.entry("rewards", this.state.rewards, key)
    if (amount === 0n) {
      this.state.rewards.delete(key)
    } else {
      this.state.rewards.set(key, amount)
    }
  }
}
