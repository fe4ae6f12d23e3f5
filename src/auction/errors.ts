// src/auction/errors.ts — Structured error taxonomy for the auction house
//
// Every failure surfaces as an AuctionError carrying a machine-readable code
// and the offending values. Callers distinguish "doesn't exist" from
// "wrong state" from "not your bid" by code, never by message.

export type AuctionErrorCode =
  | "INVALID_LOT_ID"
  | "INVALID_BID_ID"
  | "MARKET_NOT_ACTIVE"
  | "INVALID_STATE"
  | "NOT_PERMITTED"
  | "NOT_BIDDER"
  | "INVALID_FEE"
  | "INVALID_PARAMS"
  | "NOT_IMPLEMENTED"
  | "OVERFLOW"
  | "INVARIANT_VIOLATION"

export type ErrorDetails = Record<string, string | number | boolean>

export class AuctionError extends Error {
  constructor(
    message: string,
    public readonly code: AuctionErrorCode,
    public readonly details: ErrorDetails = {},
  ) {
    super(message)
    this.name = "AuctionError"
  }
}

export function invalidLotId(lotId: number): AuctionError {
  return new AuctionError(`Lot ${lotId} does not exist`, "INVALID_LOT_ID", { lotId })
}

export function invalidBidId(lotId: number, bidId: number, reason = "does not exist"): AuctionError {
  return new AuctionError(`Bid ${bidId} on lot ${lotId} ${reason}`, "INVALID_BID_ID", { lotId, bidId })
}

/** Fatal accounting failure. Always a bug, never a user error. */
export function invariantViolation(message: string, details: ErrorDetails = {}): AuctionError {
  return new AuctionError(`Invariant violated: ${message}`, "INVARIANT_VIOLATION", details)
}

export function isAuctionError(err: unknown): err is AuctionError {
  return err instanceof AuctionError
}
