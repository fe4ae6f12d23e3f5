// src/auction/http.ts — Shared request/response helpers for the auction routes
//
// Bigints travel as decimal strings both ways. The caller is the x-principal
// header. Every failure becomes { error, code, details } with a status
// derived from its code.

import type { Context, Hono } from "hono"
import type { ContentfulStatusCode } from "hono/utils/http-status"
import { Type, type Static, type TSchema } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { isAddress, type Address } from "viem"
import { toAddress } from "./address.js"
import { AuctionError, type AuctionErrorCode, isAuctionError } from "./errors.js"

// ── Schemas ──────────────────────────────────────────────────

/** A non-negative integer written as a decimal string. */
export const AmountString = Type.String({ pattern: "^[0-9]{1,40}$" })

export const AddressString = Type.String({ pattern: "^0x[0-9a-fA-F]{40}$" })

// ── Errors ───────────────────────────────────────────────────

export class UnauthenticatedError extends Error {
  constructor() {
    super("Missing or invalid x-principal header")
    this.name = "UnauthenticatedError"
  }
}

const STATUS_BY_CODE: Record<AuctionErrorCode, ContentfulStatusCode> = {
  INVALID_LOT_ID: 404,
  INVALID_BID_ID: 404,
  NOT_PERMITTED: 403,
  NOT_BIDDER: 403,
  MARKET_NOT_ACTIVE: 409,
  INVALID_STATE: 409,
  INVALID_FEE: 400,
  INVALID_PARAMS: 400,
  OVERFLOW: 400,
  NOT_IMPLEMENTED: 501,
  INVARIANT_VIOLATION: 500,
}

/** Install the shared error mapping on a route group. */
export function mapErrors(app: Hono): Hono {
  app.onError((err, c) => {
    if (err instanceof UnauthenticatedError) {
      return send(c, { error: err.message }, 401)
    }
    if (isAuctionError(err)) {
      return send(c, { error: err.message, code: err.code, details: err.details }, STATUS_BY_CODE[err.code])
    }
    return send(c, { error: "Internal error" }, 500)
  })
  return app
}

// ── Requests ─────────────────────────────────────────────────

export function parseId(raw: string, field: string): number {
  const id = /^\d+$/.test(raw) ? Number(raw) : Number.NaN
  if (!Number.isSafeInteger(id)) {
    throw new AuctionError(`Invalid ${field}`, "INVALID_PARAMS", { field, value: raw })
  }
  return id
}

/** @throws UnauthenticatedError when the header is absent or not an address */
export function principal(c: Context): Address {
  const header = c.req.header("x-principal")
  if (!header || !isAddress(header, { strict: false })) {
    throw new UnauthenticatedError()
  }
  return toAddress(header, "x-principal")
}

/**
 * Parse and validate the JSON body.
 * @throws AuctionError INVALID_PARAMS with usage when it does not match schema
 */
export async function readBody<T extends TSchema>(c: Context, schema: T, usage: string): Promise<Static<T>> {
  const body = await c.req.json<unknown>().catch(() => null)
  if (!Value.Check(schema, body)) {
    throw new AuctionError(`Body must be ${usage}`, "INVALID_PARAMS", { body: "invalid" })
  }
  return body
}

// ── Responses ────────────────────────────────────────────────

/** JSON with bigints as decimal strings. */
export function send(c: Context, body: unknown, status: ContentfulStatusCode = 200): Response {
  c.header("Content-Type", "application/json")
  return c.body(
    JSON.stringify(body, (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value)),
    status,
  )
}
