// src/auction/routes.ts — Auction house HTTP endpoints
//
// GET  /lots/:id                    — routing, data, status and proceeds
// GET  /lots/:id/fees               — locked fee percents and curation
// GET  /lots/:id/bids/:bidId        — bid record and claim status
// GET  /lots/:id/settlement         — settlement record
// GET  /fees/:auctionType           — current fee configuration
// GET  /rewards/:recipient/:token   — accrued rewards
// POST /lots                        — seller creates a lot
// POST /lots/:id/bids               — bid on a batch lot { amount, referrer? }
// POST /lots/:id/purchase           — buy from an atomic lot { amount, minAmountOut, referrer? }
// POST /lots/:id/cancel             — seller cancels before conclusion
// POST /lots/:id/curate             — designated curator approves
// POST /lots/:id/settle             — settle a concluded batch lot
// POST /lots/:id/abort              — abort after the grace period
// POST /lots/:id/claim-proceeds     — seller claims proceeds
// POST /lots/:id/claim-bids         — bidder claims bids { bidIds }
// POST /lots/:id/bids/:bidId/refund — bidder withdraws a bid
// POST /rewards/claim               — claim rewards { token }
// POST /fees                        — governance sets a fee { auctionType, kind, percent }
// POST /curator-fees                — curator registers a fee { auctionType, percent }
// POST /protocol                    — governance moves the protocol recipient { protocol }
//
// The caller is the x-principal header. Bigints travel as decimal strings.

import { Hono } from "hono"
import { Type } from "@sinclair/typebox"
import { isHex, type Address } from "viem"
import { toAddress } from "./address.js"
import { AuctionError } from "./errors.js"
import type { AuctionHouse } from "./house.js"
import { AddressString, AmountString, mapErrors, parseId, principal, readBody, send } from "./http.js"
import type { PermitApproval } from "./token.js"

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const OptionalAddress = Type.Optional(Type.Union([AddressString, Type.Null()]))

const Permit = Type.Object({
  deadline: Type.Integer({ minimum: 0 }),
  nonce: AmountString,
  signature: Type.String({ pattern: "^0x[0-9a-fA-F]*$" }),
})

const CreateLotBody = Type.Object({
  auctionType: Type.String({ minLength: 1 }),
  baseToken: AddressString,
  quoteToken: AddressString,
  capacity: AmountString,
  start: Type.Optional(Type.Integer({ minimum: 0 })),
  duration: Type.Integer({ minimum: 1 }),
  prefunded: Type.Boolean(),
  curator: OptionalAddress,
  implParams: Type.Record(Type.String(), Type.Union([Type.String(), Type.Number(), Type.Boolean()])),
})

const BidBody = Type.Object({
  amount: AmountString,
  referrer: OptionalAddress,
  permit: Type.Optional(Permit),
})

const PurchaseBody = Type.Object({
  amount: AmountString,
  minAmountOut: AmountString,
  referrer: OptionalAddress,
  permit: Type.Optional(Permit),
})

const ClaimBidsBody = Type.Object({
  bidIds: Type.Array(Type.Integer({ minimum: 0 }), { minItems: 1 }),
})

const ClaimRewardsBody = Type.Object({
  token: AddressString,
})

const FeeBody = Type.Object({
  auctionType: Type.String({ minLength: 1 }),
  kind: Type.Union([Type.Literal("protocol"), Type.Literal("referrer"), Type.Literal("maxCurator")]),
  percent: Type.Integer({ minimum: 0 }),
})

const CuratorFeeBody = Type.Object({
  auctionType: Type.String({ minLength: 1 }),
  percent: Type.Integer({ minimum: 0 }),
})

const ProtocolBody = Type.Object({
  protocol: AddressString,
})

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

/** Module parameters: decimal strings become bigints, everything else passes through. */
function decodeImplParams(raw: Record<string, string | number | boolean>): Record<string, bigint | number | boolean | string> {
  const decoded: Record<string, bigint | number | boolean | string> = {}
  for (const [key, value] of Object.entries(raw)) {
    decoded[key] = typeof value === "string" && /^[0-9]+$/.test(value) ? BigInt(value) : value
  }
  return decoded
}

function decodePermit(raw: { deadline: number; nonce: string; signature: string } | undefined): PermitApproval | undefined {
  if (!raw) return undefined
  if (!isHex(raw.signature)) {
    throw new AuctionError("Invalid permit signature", "INVALID_PARAMS", { field: "permit.signature" })
  }
  return { deadline: raw.deadline, nonce: BigInt(raw.nonce), signature: raw.signature }
}

function decodeReferrer(raw: string | null | undefined): Address | null {
  return raw ? toAddress(raw, "referrer") : null
}

// ---------------------------------------------------------------------------
// Route Factory
// ---------------------------------------------------------------------------

export function auctionRoutes(house: AuctionHouse): Hono {
  const app = mapErrors(new Hono())

  // ── Views ──────────────────────────────────────────────────

  app.get("/lots/:id", (c) => {
    const lotId = parseId(c.req.param("id"), "lotId")
    return send(c, {
      id: lotId,
      status: house.getLotStatus(lotId),
      routing: house.getLotRouting(lotId),
      data: house.getLotData(lotId),
      proceeds: house.getLotProceeds(lotId),
    })
  })

  app.get("/lots/:id/fees", (c) => {
    const lotId = parseId(c.req.param("id"), "lotId")
    return send(c, { ...house.getLotFees(lotId), curation: house.getCurationState(lotId) })
  })

  app.get("/lots/:id/bids/:bidId", (c) => {
    const lotId = parseId(c.req.param("id"), "lotId")
    const bidId = parseId(c.req.param("bidId"), "bidId")
    return send(c, house.getBid(lotId, bidId))
  })

  app.get("/lots/:id/settlement", (c) => {
    const lotId = parseId(c.req.param("id"), "lotId")
    const record = house.getSettlement(lotId)
    if (!record) {
      return send(c, { error: `Lot ${lotId} is not settled` }, 404)
    }
    return send(c, record)
  })

  app.get("/fees/:auctionType", (c) => {
    const auctionType = c.req.param("auctionType")
    return send(c, { auctionType, ...house.getFees(auctionType) })
  })

  app.get("/rewards/:recipient/:token", (c) => {
    const recipient = toAddress(c.req.param("recipient"), "recipient")
    const token = toAddress(c.req.param("token"), "token")
    return send(c, { recipient, token, amount: house.rewardsOf(recipient, token) })
  })

  // ── Lots and Trading (caller-bound) ────────────────────────

  app.post("/lots", async (c) => {
    const caller = principal(c)
    const body = await readBody(c, CreateLotBody, "{ auctionType, baseToken, quoteToken, capacity, duration, prefunded, implParams }")
    const lotId = house.auction(caller, {
      auctionType: body.auctionType,
      baseToken: toAddress(body.baseToken, "baseToken"),
      quoteToken: toAddress(body.quoteToken, "quoteToken"),
      capacity: BigInt(body.capacity),
      start: body.start,
      duration: body.duration,
      prefunded: body.prefunded,
      curator: body.curator ? toAddress(body.curator, "curator") : null,
      implParams: decodeImplParams(body.implParams),
    })
    return send(c, { lotId, status: house.getLotStatus(lotId) }, 201)
  })

  app.post("/lots/:id/bids", async (c) => {
    const caller = principal(c)
    const lotId = parseId(c.req.param("id"), "lotId")
    const body = await readBody(c, BidBody, "{ amount: string, referrer?: string }")
    const bidId = house.bid(caller, {
      lotId,
      amount: BigInt(body.amount),
      referrer: decodeReferrer(body.referrer),
      permit: decodePermit(body.permit),
    })
    return send(c, house.getBid(lotId, bidId), 201)
  })

  app.post("/lots/:id/purchase", async (c) => {
    const caller = principal(c)
    const lotId = parseId(c.req.param("id"), "lotId")
    const body = await readBody(c, PurchaseBody, "{ amount: string, minAmountOut: string, referrer?: string }")
    const result = house.purchase(caller, {
      lotId,
      amount: BigInt(body.amount),
      minAmountOut: BigInt(body.minAmountOut),
      referrer: decodeReferrer(body.referrer),
      permit: decodePermit(body.permit),
    })
    return send(c, { lotId, ...result })
  })

  app.post("/lots/:id/cancel", (c) => {
    const caller = principal(c)
    const lotId = parseId(c.req.param("id"), "lotId")
    return send(c, { lotId, refund: house.cancel(lotId, caller) })
  })

  app.post("/lots/:id/curate", (c) => {
    const caller = principal(c)
    const lotId = parseId(c.req.param("id"), "lotId")
    return send(c, { lotId, ...house.curate(lotId, caller) })
  })

  // ── Settlement ─────────────────────────────────────────────

  app.post("/lots/:id/settle", (c) => {
    const lotId = parseId(c.req.param("id"), "lotId")
    return send(c, house.settle(lotId))
  })

  app.post("/lots/:id/abort", (c) => {
    const lotId = parseId(c.req.param("id"), "lotId")
    return send(c, house.abort(lotId))
  })

  // ── Claims (caller-bound) ──────────────────────────────────

  app.post("/lots/:id/claim-proceeds", (c) => {
    const caller = principal(c)
    const lotId = parseId(c.req.param("id"), "lotId")
    return send(c, house.claimProceeds(lotId, caller))
  })

  app.post("/lots/:id/claim-bids", async (c) => {
    const caller = principal(c)
    const lotId = parseId(c.req.param("id"), "lotId")
    const body = await readBody(c, ClaimBidsBody, "{ bidIds: number[] } with at least one id")
    return send(c, { lotId, claims: house.claimBids(lotId, body.bidIds, caller) })
  })

  app.post("/lots/:id/bids/:bidId/refund", (c) => {
    const caller = principal(c)
    const lotId = parseId(c.req.param("id"), "lotId")
    const bidId = parseId(c.req.param("bidId"), "bidId")
    return send(c, { lotId, bidId, refund: house.refundBid(lotId, bidId, caller) })
  })

  app.post("/rewards/claim", async (c) => {
    const caller = principal(c)
    const body = await readBody(c, ClaimRewardsBody, "{ token: string }")
    const token = toAddress(body.token, "token")
    return send(c, { recipient: caller, token, amount: house.claimRewards(caller, token) })
  })

  // ── Fees and Governance (caller-bound) ─────────────────────

  app.post("/fees", async (c) => {
    const caller = principal(c)
    const body = await readBody(c, FeeBody, "{ auctionType, kind: protocol | referrer | maxCurator, percent }")
    return send(c, { auctionType: body.auctionType, ...house.setFee(caller, body.auctionType, body.kind, body.percent) })
  })

  app.post("/curator-fees", async (c) => {
    const caller = principal(c)
    const body = await readBody(c, CuratorFeeBody, "{ auctionType, percent }")
    house.setCuratorFee(caller, body.auctionType, body.percent)
    return send(c, { curator: caller, auctionType: body.auctionType, percent: body.percent })
  })

  app.post("/protocol", async (c) => {
    const caller = principal(c)
    const body = await readBody(c, ProtocolBody, "{ protocol: string }")
    house.setProtocol(caller, toAddress(body.protocol, "protocol"))
    return send(c, house.protocol)
  })

  return app
}
