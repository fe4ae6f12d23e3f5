// src/auction/token.ts — Token movement interface and in-memory ledger
//
// The house only ever asks "move value from A to B, possibly failing".
// InMemoryTokenLedger implements that with allowances, permit-style approvals,
// optional fee-on-transfer and a per-token transfer hook, and journals every
// balance it changes so a failed call leaves no trace. Accounts are keyed by checksum
// address, whatever case they arrive in.

import { getAddress, type Address, type Hex } from "viem"
import { AuctionError } from "./errors.js"
import { assertAmount, assertDecimals, assertPercent, percentOf } from "./fixed-point.js"
import { Journal, type Transactional } from "./transaction.js"

// ── Interface ────────────────────────────────────────────────

export interface PermitApproval {
  /** Unix seconds after which the approval is void */
  deadline: number
  nonce: bigint
  signature: Hex
}

export interface TokenTransfer {
  token: Address
  from: Address
  to: Address
  amount: bigint
}

export interface TokenMover extends Transactional {
  decimals(token: Address): number
  balanceOf(token: Address, holder: Address): bigint
  /** Move amount from → to. Throws on failure. */
  transfer(token: Address, from: Address, to: Address, amount: bigint): void
  /** Signed approval letting spender pull amount from owner. */
  permit(token: Address, owner: Address, spender: Address, amount: bigint, approval: PermitApproval): void
}

// ── In-memory Ledger ─────────────────────────────────────────

export type TransferHook = (transfer: TokenTransfer) => void

export interface TokenOptions {
  /** Parts per 100,000 withheld from every transfer (fee-on-transfer tokens) */
  transferFeePercent?: number
  /** Invoked after balances move; may throw or re-enter the caller */
  onTransfer?: TransferHook
}

interface TokenInfo {
  decimals: number
  transferFeePercent: number
  onTransfer?: TransferHook
}

export class InMemoryTokenLedger implements TokenMover {
  private readonly tokens = new Map<string, TokenInfo>()
  private readonly balances = new Map<string, bigint>()
  private readonly allowances = new Map<string, bigint>()
  private readonly usedNonces = new Set<string>()
  private readonly journal = new Journal()

  /**
   * @param operator — address allowed to move anyone's tokens within their allowance (the house)
   * @param clock — unix seconds, for permit deadlines
   */
  constructor(
    private readonly operator: Address,
    private readonly clock: () => number = () => Math.floor(Date.now() / 1000),
  ) {}

  begin(): () => void {
    return this.journal.begin()
  }

  commit(): void {
    this.journal.commit()
  }

  createToken(token: Address, decimals: number, options: TokenOptions = {}): void {
    if (this.tokens.has(key(token))) {
      throw new AuctionError(`Token ${token} already exists`, "INVALID_PARAMS", { token })
    }
    this.tokens.set(key(token), {
      decimals: assertDecimals(decimals),
      transferFeePercent: assertPercent(options.transferFeePercent ?? 0, "transferFeePercent"),
      onTransfer: options.onTransfer,
    })
  }

  /** Replace the transfer hook of an existing token. */
  setTransferHook(token: Address, hook: TransferHook | undefined): void {
    this.info(token).onTransfer = hook
  }

  decimals(token: Address): number {
    return this.info(token).decimals
  }

  balanceOf(token: Address, holder: Address): bigint {
    this.info(token)
    return this.balances.get(key(token, holder)) ?? 0n
  }

  allowance(token: Address, owner: Address, spender: Address): bigint {
    return this.allowances.get(key(token, owner, spender)) ?? 0n
  }

  mint(token: Address, to: Address, amount: bigint): void {
    assertAmount(amount, "amount")
    this.credit(token, to, amount)
  }

  approve(token: Address, owner: Address, spender: Address, amount: bigint): void {
    this.info(token)
    this.setAllowance(key(token, owner, spender), amount)
  }

  permit(token: Address, owner: Address, spender: Address, amount: bigint, approval: PermitApproval): void {
    this.info(token)
    if (approval.deadline < this.clock()) {
      throw new AuctionError("Permit expired", "INVALID_PARAMS", { token, owner, deadline: approval.deadline })
    }
    const nonceKey = `${key(token, owner)}:${approval.nonce}`
    if (this.usedNonces.has(nonceKey)) {
      throw new AuctionError("Permit nonce already used", "INVALID_PARAMS", {
        token,
        owner,
        nonce: approval.nonce.toString(),
      })
    }
    if (approval.signature.length <= 2) {
      throw new AuctionError("Permit signature missing", "INVALID_PARAMS", { token, owner })
    }
    this.journal.record(`nonce:${nonceKey}`, () => () => {
      this.usedNonces.delete(nonceKey)
    })
    this.usedNonces.add(nonceKey)
    this.approve(token, owner, spender, amount)
  }

  transfer(token: Address, from: Address, to: Address, amount: bigint): void {
    const info = this.info(token)
    assertAmount(amount, "amount")

    if (key(from) !== key(this.operator)) {
      const allowed = this.allowance(token, from, this.operator)
      if (allowed < amount) {
        throw new AuctionError(`Insufficient allowance for ${token}`, "INVALID_PARAMS", {
          token,
          owner: from,
          allowance: allowed.toString(),
          amount: amount.toString(),
        })
      }
      this.setAllowance(key(token, from, this.operator), allowed - amount)
    }

    const balance = this.balanceOf(token, from)
    if (balance < amount) {
      throw new AuctionError(`Insufficient ${token} balance`, "INVALID_PARAMS", {
        token,
        holder: from,
        balance: balance.toString(),
        amount: amount.toString(),
      })
    }

    const withheld = percentOf(amount, info.transferFeePercent, info.decimals, "floor")
    this.setBalance(key(token, from), balance - amount)
    this.credit(token, to, amount - withheld)

    info.onTransfer?.({ token, from, to, amount })
  }

  private credit(token: Address, to: Address, amount: bigint): void {
    this.info(token)
    const balanceKey = key(token, to)
    this.setBalance(balanceKey, (this.balances.get(balanceKey) ?? 0n) + amount)
  }

  private setBalance(balanceKey: string, amount: bigint): void {
    this.journal.entry("balance", this.balances, balanceKey)
    this.balances.set(balanceKey, amount)
  }

  private setAllowance(allowanceKey: string, amount: bigint): void {
    this.journal.entry("allowance", this.allowances, allowanceKey)
    this.allowances.set(allowanceKey, amount)
  }

  private info(token: Address): TokenInfo {
    const info = this.tokens.get(key(token))
    if (!info) {
      throw new AuctionError(`Unknown token ${token}`, "INVALID_PARAMS", { token })
    }
    return info
  }
}

function key(...addresses: Address[]): string {
  return addresses.map((address) => getAddress(address)).join(":")
}
