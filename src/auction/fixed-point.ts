// src/auction/fixed-point.ts — Checked fixed-point arithmetic and decimal scaling
//
// Converts between a token's native decimals and the internal 18-decimal
// accounting scale. Rounding is always explicit:
//   floor — fee deductions (protocol never over-charges)
//   ceil  — obligations (seller never under-escrows)
// Results beyond the amount ceilings raise OVERFLOW; nothing truncates silently.

import { AuctionError } from "./errors.js"
import {
  INTERNAL_DECIMALS,
  MAX_AMOUNT,
  MAX_INTERNAL_AMOUNT,
  MAX_TOKEN_DECIMALS,
  MIN_TOKEN_DECIMALS,
  ONE_HUNDRED_PERCENT,
} from "./types.js"

export type Rounding = "floor" | "ceil"

// ── Bounds ───────────────────────────────────────────────────

/** Validate a native token amount: non-negative and within uint96. */
export function assertAmount(value: bigint, field: string): bigint {
  if (value < 0n) {
    throw new AuctionError(`${field} must not be negative`, "INVALID_PARAMS", { field, value: value.toString() })
  }
  if (value > MAX_AMOUNT) {
    throw new AuctionError(`${field} exceeds the 96-bit amount ceiling`, "OVERFLOW", { field, value: value.toString() })
  }
  return value
}

export function assertDecimals(decimals: number, field = "decimals"): number {
  if (!Number.isInteger(decimals) || decimals < MIN_TOKEN_DECIMALS || decimals > MAX_TOKEN_DECIMALS) {
    throw new AuctionError(
      `${field} must be an integer in [${MIN_TOKEN_DECIMALS}, ${MAX_TOKEN_DECIMALS}]`,
      "INVALID_PARAMS",
      { field, decimals },
    )
  }
  return decimals
}

function assertInternal(value: bigint, field: string): bigint {
  if (value > MAX_INTERNAL_AMOUNT) {
    throw new AuctionError(`${field} exceeds the internal amount ceiling`, "OVERFLOW", { field, value: value.toString() })
  }
  return value
}

// ── Division ─────────────────────────────────────────────────

/** Ceiling division for non-negative bigint: ceil(a / b) */
export function ceilDiv(a: bigint, b: bigint): bigint {
  if (b === 0n) throw new AuctionError("Division by zero", "INVALID_PARAMS")
  if (a === 0n) return 0n
  return (a + b - 1n) / b
}

/** a * b / denominator with explicit rounding. Operands must be non-negative. */
export function mulDiv(a: bigint, b: bigint, denominator: bigint, rounding: Rounding = "floor"): bigint {
  if (a < 0n || b < 0n) {
    throw new AuctionError("mulDiv operands must not be negative", "INVALID_PARAMS", {
      a: a.toString(),
      b: b.toString(),
    })
  }
  const product = a * b
  return rounding === "ceil" ? ceilDiv(product, denominator) : product / denominator
}

// ── Scaling ──────────────────────────────────────────────────

function scaleFactor(decimals: number): bigint {
  assertDecimals(decimals)
  return 10n ** BigInt(INTERNAL_DECIMALS - decimals)
}

/** Native → 18 decimals. Exact: up-scaling never rounds. */
export function scaleToInternal(amount: bigint, decimals: number): bigint {
  assertAmount(amount, "amount")
  return assertInternal(amount * scaleFactor(decimals), "scaled amount")
}

/** 18 decimals → native, rounding as requested. */
export function scaleFromInternal(amount18: bigint, decimals: number, rounding: Rounding = "floor"): bigint {
  if (amount18 < 0n) {
    throw new AuctionError("internal amount must not be negative", "INVALID_PARAMS", { value: amount18.toString() })
  }
  assertInternal(amount18, "internal amount")
  const factor = scaleFactor(decimals)
  const scaled = rounding === "ceil" ? ceilDiv(amount18, factor) : amount18 / factor
  return assertAmount(scaled, "scaled amount")
}

// ── Percentages ──────────────────────────────────────────────

export function assertPercent(percent: number, field = "percent"): number {
  if (!Number.isInteger(percent) || percent < 0 || percent > ONE_HUNDRED_PERCENT) {
    throw new AuctionError(
      `${field} must be an integer in [0, ${ONE_HUNDRED_PERCENT}]`,
      "INVALID_FEE",
      { field, percent },
    )
  }
  return percent
}

/**
 * amount × percent / 100_000, computed on the internal scale and brought back
 * to native decimals with the given rounding.
 */
export function percentOf(amount: bigint, percent: number, decimals: number, rounding: Rounding = "floor"): bigint {
  assertPercent(percent)
  if (amount === 0n || percent === 0) return 0n
  const amount18 = scaleToInternal(amount, decimals)
  const fee18 = mulDiv(amount18, BigInt(percent), BigInt(ONE_HUNDRED_PERCENT), rounding)
  return scaleFromInternal(fee18, decimals, rounding)
}
