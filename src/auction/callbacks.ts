// src/auction/callbacks.ts — Optional per-lot callback hooks
//
// A lot may name a callbacks contract. Its permission flags decide which hooks
// the house invokes and whether the callback, rather than the seller, provides
// base tokens (sendBaseTokens) or receives quote proceeds (receiveQuoteTokens).
// A hook that throws aborts the triggering operation.

import type { Address } from "viem"
import { AuctionError } from "./errors.js"

export interface CallbackPermissions {
  onCreate: boolean
  onCancel: boolean
  onCurate: boolean
  onPurchase: boolean
  onBid: boolean
  onClaimProceeds: boolean
  sendBaseTokens: boolean
  receiveQuoteTokens: boolean
}

export interface CreateContext {
  lotId: number
  seller: Address
  baseToken: Address
  quoteToken: Address
  capacity: bigint
  prefund: boolean
}

export interface AuctionCallbacks {
  /** Custody address used for sendBaseTokens / receiveQuoteTokens */
  readonly address: Address
  readonly permissions: CallbackPermissions
  onCreate?(ctx: CreateContext): void
  onCancel?(lotId: number, refund: bigint, prefunded: boolean): void
  onCurate?(lotId: number, curatorFee: number, reserve: bigint): void
  onPurchase?(lotId: number, buyer: Address, amount: bigint, payout: bigint, prefunded: boolean): void
  onBid?(lotId: number, bidId: number, bidder: Address, amount: bigint): void
  onClaimProceeds?(lotId: number, proceeds: bigint, refund: bigint): void
}

type HookName = "onCreate" | "onCancel" | "onCurate" | "onPurchase" | "onBid" | "onClaimProceeds"

const HOOKS: readonly HookName[] = ["onCreate", "onCancel", "onCurate", "onPurchase", "onBid", "onClaimProceeds"]

export const NO_PERMISSIONS: CallbackPermissions = {
  onCreate: false,
  onCancel: false,
  onCurate: false,
  onPurchase: false,
  onBid: false,
  onClaimProceeds: false,
  sendBaseTokens: false,
  receiveQuoteTokens: false,
}

/** Every enabled hook must be implemented. */
export function validateCallbacks(callbacks: AuctionCallbacks): void {
  for (const hook of HOOKS) {
    if (callbacks.permissions[hook] && typeof callbacks[hook] !== "function") {
      throw new AuctionError(`Callback permission ${hook} is set but the hook is missing`, "INVALID_PARAMS", {
        hook,
        callbacks: callbacks.address,
      })
    }
  }
}

/** Whether the hook should run for these callbacks. */
export function enabled(callbacks: AuctionCallbacks | undefined, hook: HookName): callbacks is AuctionCallbacks {
  return callbacks !== undefined && callbacks.permissions[hook]
}
