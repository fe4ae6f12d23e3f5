// src/config.ts — Configuration loader from environment variables

import { getAddress, isAddress, type Address } from "viem"
import type { SellerPayoutMode } from "./auction/settlement.js"

export interface AuctionServiceConfig {
  // Gateway
  port: number
  host: string

  // Principals
  houseAddress: Address
  governanceAddress: Address
  protocolAddress: Address

  // Settlement
  sellerPayoutMode: SellerPayoutMode
  settlementGracePeriodSeconds: number

  // Ledger
  tokens: TokenConfig[]
}

export interface TokenConfig {
  address: Address
  decimals: number
}

type Env = Record<string, string | undefined>

const VALID_PAYOUT_MODES = ["push", "claim"] as const

function parsePayoutMode(value: string | undefined): SellerPayoutMode {
  const v = (value ?? "push").trim().toLowerCase()
  for (const mode of VALID_PAYOUT_MODES) {
    if (v === mode) return mode
  }
  throw new Error(`SELLER_PAYOUT_MODE must be one of ${VALID_PAYOUT_MODES.join(", ")} (got "${value}")`)
}

/** Parse a non-negative integer, failing fast on anything else. */
function parseIntEnv(env: Env, envKey: string, fallback: string): number {
  const raw = env[envKey] ?? fallback
  const value = /^\d+$/.test(raw.trim()) ? parseInt(raw, 10) : NaN
  if (isNaN(value)) {
    throw new Error(`${envKey} must be a valid integer (got "${raw}")`)
  }
  return value
}

function requireAddress(env: Env, envKey: string): Address {
  const raw = env[envKey]
  if (!raw) {
    throw new Error(`${envKey} is required`)
  }
  if (!isAddress(raw, { strict: false })) {
    throw new Error(`${envKey} must be a 20-byte hex address (got "${raw}")`)
  }
  return getAddress(raw)
}

/** TOKENS="0xabc…:18,0xdef…:6" registers tokens in the in-memory ledger at boot. */
function parseTokens(value: string | undefined): TokenConfig[] {
  if (!value || value.trim() === "") return []
  return value.split(",").map((entry) => {
    const [address, decimals, ...rest] = entry.trim().split(":")
    if (rest.length > 0 || !address || !decimals || !/^\d+$/.test(decimals)) {
      throw new Error(`TOKENS entries must be <address>:<decimals> (got "${entry.trim()}")`)
    }
    if (!isAddress(address, { strict: false })) {
      throw new Error(`TOKENS entry has an invalid address (got "${address}")`)
    }
    return { address: getAddress(address), decimals: parseInt(decimals, 10) }
  })
}

export function loadConfig(env: Env = process.env): AuctionServiceConfig {
  return {
    port: parseIntEnv(env, "PORT", "3000"),
    host: env.HOST ?? "0.0.0.0",

    houseAddress: requireAddress(env, "AUCTION_HOUSE_ADDRESS"),
    governanceAddress: requireAddress(env, "GOVERNANCE_ADDRESS"),
    protocolAddress: requireAddress(env, "PROTOCOL_ADDRESS"),

    sellerPayoutMode: parsePayoutMode(env.SELLER_PAYOUT_MODE),
    settlementGracePeriodSeconds: parseIntEnv(env, "SETTLEMENT_GRACE_PERIOD_SECONDS", "21600"),

    tokens: parseTokens(env.TOKENS),
  }
}
