// src/auction/funding.ts — Per-lot escrow tracking
//
// funding is the base-token balance the house holds for a lot and has not yet
// disbursed. It rises only when capacity or a curator reserve is collected,
// falls on every disbursement, and must never go below zero. An underflow is
// an accounting bug and aborts the whole call.

import { AuctionError, invariantViolation } from "./errors.js"
import type { AuctionStore } from "./store.js"

export class FundingTracker {
  constructor(private readonly store: AuctionStore) {}

  get(lotId: number): bigint {
    return this.store.getLot(lotId).funding
  }

  /** Record base collected for the lot (prefunding, curator reserve, lazy settlement). */
  collect(lotId: number, amount: bigint): bigint {
    if (amount < 0n) {
      throw new AuctionError("Funding increase must not be negative", "INVALID_PARAMS", {
        lotId,
        amount: amount.toString(),
      })
    }
    const lot = this.store.getLot(lotId)
    lot.funding += amount
    return lot.funding
  }

  /**
   * Decrease funding by a disbursement.
   * @throws AuctionError INVARIANT_VIOLATION if funding would go negative
   */
  disburse(lotId: number, amount: bigint, reason: string): bigint {
    const lot = this.store.getLot(lotId)
    if (amount < 0n || amount > lot.funding) {
      throw invariantViolation(`disbursement exceeds funding (${reason})`, {
        lotId,
        funding: lot.funding.toString(),
        amount: amount.toString(),
        reason,
      })
    }
    lot.funding -= amount
    return lot.funding
  }

  /** Disburse everything that is left. */
  drain(lotId: number, reason: string): bigint {
    const remaining = this.get(lotId)
    this.disburse(lotId, remaining, reason)
    return remaining
  }
}
