// src/auction/custody.ts — Moving tokens in and out of the house
//
// Pulls credit what actually arrived (balance delta), never the nominal
// amount. Sources and recipients honour the lot's callback custody flags.

import type { Address } from "viem"
import type { AuctionCallbacks } from "./callbacks.js"
import { AuctionError, invariantViolation } from "./errors.js"
import type { TokenMover } from "./token.js"
import type { Lot } from "./types.js"

export class Custody {
  constructor(
    private readonly tokens: TokenMover,
    readonly house: Address,
  ) {}

  /** Pull amount into the house. @returns the amount actually received */
  pull(token: Address, from: Address, amount: bigint): bigint {
    if (amount === 0n) return 0n
    const before = this.tokens.balanceOf(token, this.house)
    this.tokens.transfer(token, from, this.house, amount)
    const after = this.tokens.balanceOf(token, this.house)
    if (after < before) {
      throw invariantViolation("house balance fell during a pull", {
        token,
        before: before.toString(),
        after: after.toString(),
      })
    }
    return after - before
  }

  /**
   * Pull exactly amount. Escrow must cover obligations in full, so a
   * fee-on-transfer shortfall is rejected.
   */
  pullExact(token: Address, from: Address, amount: bigint, field: string): void {
    const received = this.pull(token, from, amount)
    if (received !== amount) {
      throw new AuctionError(`${field}: received ${received} of ${amount}, fee-on-transfer tokens cannot be escrowed`, "INVALID_PARAMS", {
        field,
        token,
        requested: amount.toString(),
        received: received.toString(),
      })
    }
  }

  push(token: Address, to: Address, amount: bigint): void {
    if (amount === 0n) return
    this.tokens.transfer(token, this.house, to, amount)
  }

  permit(...args: Parameters<TokenMover["permit"]>): void {
    this.tokens.permit(...args)
  }

  /** Where base tokens come from, and where unused base goes back to. */
  baseAccount(lot: Lot, callbacks: AuctionCallbacks | undefined): Address {
    return callbacks?.permissions.sendBaseTokens ? callbacks.address : lot.seller
  }

  /** Where the seller's quote proceeds go. */
  quoteRecipient(lot: Lot, callbacks: AuctionCallbacks | undefined): Address {
    return callbacks?.permissions.receiveQuoteTokens ? callbacks.address : lot.seller
  }
}
