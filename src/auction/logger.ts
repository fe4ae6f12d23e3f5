// src/auction/logger.ts — Structured operation logger
//
// One JSON line per state-mutating call, success or failure.

import { isAuctionError } from "./errors.js"

export type AuctionOperation =
  | "auction"
  | "cancel"
  | "curate"
  | "bid"
  | "purchase"
  | "refund_bid"
  | "settle"
  | "abort"
  | "claim_proceeds"
  | "claim_bids"
  | "claim_rewards"
  | "set_fee"
  | "set_curator_fee"
  | "set_protocol"

export interface AuctionLogEntry {
  timestamp: string
  operation: AuctionOperation
  lot_id: number | null
  [key: string]: unknown
}

export interface AuctionLogger {
  log(operation: AuctionOperation, lotId: number | null, metadata?: Record<string, unknown>): void
  logError(operation: AuctionOperation, lotId: number | null, error: unknown, metadata?: Record<string, unknown>): void
}

/** Bigints become decimal strings so entries survive JSON.stringify. */
function serialize(metadata: Record<string, unknown> | undefined): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(metadata ?? {})) {
    out[key] = typeof value === "bigint" ? value.toString() : value
  }
  return out
}

class JsonLineAuctionLogger implements AuctionLogger {
  constructor(
    private readonly write: (line: string) => void,
    private readonly now: () => Date,
  ) {}

  log(operation: AuctionOperation, lotId: number | null, metadata?: Record<string, unknown>): void {
    const entry: AuctionLogEntry = {
      timestamp: this.now().toISOString(),
      operation,
      lot_id: lotId,
      ...serialize(metadata),
    }
    this.write(JSON.stringify(entry))
  }

  logError(operation: AuctionOperation, lotId: number | null, error: unknown, metadata?: Record<string, unknown>): void {
    const entry: AuctionLogEntry = {
      timestamp: this.now().toISOString(),
      operation,
      lot_id: lotId,
      error: error instanceof Error ? error.message : String(error),
      ...(isAuctionError(error) ? { error_code: error.code } : {}),
      ...serialize(metadata),
    }
    this.write(JSON.stringify(entry))
  }
}

/**
 * Create an AuctionLogger. Default sink is console.log.
 */
export function createAuctionLogger(
  write: (line: string) => void = (line) => console.log(line),
  now: () => Date = () => new Date(),
): AuctionLogger {
  return new JsonLineAuctionLogger(write, now)
}
