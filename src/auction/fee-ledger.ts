// src/auction/fee-ledger.ts — Fee configuration, per-lot lock-in and fee splits
//
// Governance sets protocol/referrer/maxCurator percents per auction type.
// A lot copies protocol/referrer percents at its first fee-accruing event and
// never re-reads them, so later governance changes cannot reach in-flight lots.
//
// Absent referrer policy: the referrer share stays in the seller's net.
// It is never redirected to the protocol.

import type { Address } from "viem"
import { zeroAddress } from "viem"
import { AuctionError } from "./errors.js"
import { assertPercent, percentOf } from "./fixed-point.js"
import type { AuctionStore } from "./store.js"
import type { FeeConfig, FeeKind, FeeSplit, LotFees } from "./types.js"
import { INTERNAL_DECIMALS, ONE_HUNDRED_PERCENT } from "./types.js"

export interface FeeContribution {
  referrer: Address | null
  amount: bigint
}

export interface FeeAllocation {
  protocolFee: bigint
  /** Fee per referrer; absent referrers do not appear */
  referrerFees: Map<Address, bigint>
  totalReferrerFees: bigint
  sellerNet: bigint
}

export function hasReferrer(referrer: Address | null | undefined): referrer is Address {
  return referrer !== null && referrer !== undefined && referrer !== zeroAddress
}

export class FeeLedger {
  constructor(private readonly store: AuctionStore) {}

  // ── Governance ─────────────────────────────────────────────

  /**
   * Set a fee percent for an auction type.
   * @throws AuctionError NOT_PERMITTED unless caller is governance
   * @throws AuctionError INVALID_FEE if out of range, or protocol + referrer > 100%
   */
  setFee(caller: Address, auctionType: string, kind: FeeKind, percent: number): FeeConfig {
    if (caller !== this.store.protocol.governance) {
      throw new AuctionError("Only governance may set fees", "NOT_PERMITTED", { caller })
    }
    assertPercent(percent, kind)

    const config = this.store.getFeeConfig(auctionType)
    config[kind] = percent

    if (config.protocol + config.referrer > ONE_HUNDRED_PERCENT) {
      throw new AuctionError(
        `Protocol + referrer fee exceeds 100% (${config.protocol} + ${config.referrer})`,
        "INVALID_FEE",
        { auctionType, protocol: config.protocol, referrer: config.referrer },
      )
    }

    this.store.putFeeConfig(auctionType, config)
    return config
  }

  getFees(auctionType: string): FeeConfig {
    return this.store.getFeeConfig(auctionType)
  }

  // ── Lock-in ────────────────────────────────────────────────

  /**
   * Copy the current protocol/referrer percents into the lot's fees.
   * Only the first call locks; later calls leave the snapshot untouched.
   * @returns true if this call performed the lock
   */
  lockInFees(lotId: number, auctionType: string): boolean {
    const lotFees = this.store.getLotFees(lotId)
    if (lotFees.locked) return false

    const config = this.store.getFeeConfig(auctionType)
    lotFees.protocolFee = config.protocol
    lotFees.referrerFee = config.referrer
    lotFees.locked = true
    return true
  }

  // ── Splits ─────────────────────────────────────────────────

  /**
   * Split a gross quote amount into protocol fee, referrer fee and net.
   * Both fees are floored. With no referrer the referrer share stays in net.
   */
  computeSplit(
    gross: bigint,
    protocolPercent: number,
    referrerPercent: number,
    referrer: Address | null = null,
    decimals: number = INTERNAL_DECIMALS,
  ): FeeSplit {
    const protocolFee = percentOf(gross, protocolPercent, decimals, "floor")
    const referrerFee = hasReferrer(referrer) ? percentOf(gross, referrerPercent, decimals, "floor") : 0n
    const net = gross - protocolFee - referrerFee
    if (net < 0n) {
      throw new AuctionError("Fee split produced negative net", "INVARIANT_VIOLATION", {
        gross: gross.toString(),
        protocolPercent,
        referrerPercent,
      })
    }
    return { protocolFee, referrerFee, net }
  }

  /**
   * Allocate fees over contributions that may carry different referrers.
   * Protocol fee is floored on the aggregate; each referrer's fee is floored
   * on that referrer's own contribution.
   */
  allocate(lotFees: LotFees, contributions: readonly FeeContribution[], decimals: number): FeeAllocation {
    let gross = 0n
    const byReferrer = new Map<Address, bigint>()
    for (const c of contributions) {
      gross += c.amount
      if (hasReferrer(c.referrer)) {
        byReferrer.set(c.referrer, (byReferrer.get(c.referrer) ?? 0n) + c.amount)
      }
    }

    const { protocolFee } = this.computeSplit(gross, lotFees.protocolFee, 0, null, decimals)

    const referrerFees = new Map<Address, bigint>()
    let totalReferrerFees = 0n
    for (const [referrer, amount] of byReferrer) {
      const fee = percentOf(amount, lotFees.referrerFee, decimals, "floor")
      if (fee > 0n) {
        referrerFees.set(referrer, fee)
        totalReferrerFees += fee
      }
    }

    const sellerNet = gross - protocolFee - totalReferrerFees
    if (sellerNet < 0n) {
      throw new AuctionError("Fee allocation produced negative seller net", "INVARIANT_VIOLATION", {
        gross: gross.toString(),
      })
    }
    return { protocolFee, referrerFees, totalReferrerFees, sellerNet }
  }
}
