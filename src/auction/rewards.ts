// src/auction/rewards.ts — Pull-based fee rewards ledger
//
// Protocol and referrer fees accrue here per (recipient, token) and leave
// only through claim(). Curator fees never land here.

import type { Address } from "viem"
import type { AuctionStore } from "./store.js"

export class RewardsLedger {
  constructor(private readonly store: AuctionStore) {}

  accrue(recipient: Address, token: Address, amount: bigint): void {
    if (amount === 0n) return
    this.store.putReward(recipient, token, this.store.getReward(recipient, token) + amount)
  }

  balanceOf(recipient: Address, token: Address): bigint {
    return this.store.getReward(recipient, token)
  }

  /** Zero the balance and return what was owed. The caller moves the tokens. */
  take(recipient: Address, token: Address): bigint {
    const amount = this.store.getReward(recipient, token)
    this.store.putReward(recipient, token, 0n)
    return amount
  }
}
