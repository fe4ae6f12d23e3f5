// src/auction/address.ts — Address normalization
//
// Addresses are compared and used as map keys, so every one is stored in
// checksum form. Lowercase and checksum spellings of the same address are
// the same account.

import { getAddress, isAddress, zeroAddress, type Address } from "viem"
import { AuctionError } from "./errors.js"

/**
 * Checksum form of value.
 * @throws AuctionError INVALID_PARAMS if value is not a 20-byte hex address
 */
export function toAddress(value: string, field: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new AuctionError(`Invalid ${field}`, "INVALID_PARAMS", { field, value })
  }
  return getAddress(value)
}

/** Like toAddress, but the zero address is rejected too. */
export function toNonZeroAddress(value: string, field: string): Address {
  const address = toAddress(value, field)
  if (address === zeroAddress) {
    throw new AuctionError(`Invalid ${field}`, "INVALID_PARAMS", { field, value })
  }
  return address
}
