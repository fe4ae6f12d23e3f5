// src/auction/ledger-routes.ts — HTTP access to the in-memory token ledger
//
// GET  /tokens/:token/balances/:holder — balance and allowance to the house
// POST /tokens                         — governance registers a token { address, decimals, transferFeePercent? }
// POST /tokens/:token/mint             — governance mints { to, amount }
// POST /tokens/:token/approve          — caller lets the house pull { amount }
//
// The service keeps balances in memory, so this is how accounts get funded.

import { Hono } from "hono"
import { Type } from "@sinclair/typebox"
import type { Address } from "viem"
import { toAddress } from "./address.js"
import { AuctionError } from "./errors.js"
import { AddressString, AmountString, mapErrors, principal, readBody, send } from "./http.js"
import type { InMemoryTokenLedger } from "./token.js"

const RegisterTokenBody = Type.Object({
  address: AddressString,
  decimals: Type.Integer({ minimum: 0 }),
  transferFeePercent: Type.Optional(Type.Integer({ minimum: 0 })),
})

const MintBody = Type.Object({
  to: AddressString,
  amount: AmountString,
})

const ApproveBody = Type.Object({
  amount: AmountString,
})

export interface LedgerRoutesDeps {
  ledger: InMemoryTokenLedger
  /** Only governance registers tokens and mints */
  governance: Address
  /** The house address approvals are granted to */
  house: Address
}

export function ledgerRoutes({ ledger, governance, house }: LedgerRoutesDeps): Hono {
  const app = mapErrors(new Hono())

  const requireGovernance = (caller: Address) => {
    if (caller !== governance) {
      throw new AuctionError("Only governance may manage tokens", "NOT_PERMITTED", { caller })
    }
  }

  app.get("/tokens/:token/balances/:holder", (c) => {
    const token = toAddress(c.req.param("token"), "token")
    const holder = toAddress(c.req.param("holder"), "holder")
    return send(c, {
      token,
      holder,
      balance: ledger.balanceOf(token, holder),
      allowance: ledger.allowance(token, holder, house),
    })
  })

  app.post("/tokens", async (c) => {
    const caller = principal(c)
    requireGovernance(caller)
    const body = await readBody(c, RegisterTokenBody, "{ address, decimals, transferFeePercent? }")
    const token = toAddress(body.address, "address")
    ledger.createToken(token, body.decimals, { transferFeePercent: body.transferFeePercent })
    return send(c, { token, decimals: ledger.decimals(token) }, 201)
  })

  app.post("/tokens/:token/mint", async (c) => {
    const caller = principal(c)
    requireGovernance(caller)
    const token = toAddress(c.req.param("token"), "token")
    const body = await readBody(c, MintBody, "{ to: string, amount: string }")
    const to = toAddress(body.to, "to")
    ledger.mint(token, to, BigInt(body.amount))
    return send(c, { token, holder: to, balance: ledger.balanceOf(token, to) })
  })

  app.post("/tokens/:token/approve", async (c) => {
    const caller = principal(c)
    const token = toAddress(c.req.param("token"), "token")
    const body = await readBody(c, ApproveBody, "{ amount: string }")
    ledger.approve(token, caller, house, BigInt(body.amount))
    return send(c, { token, owner: caller, spender: house, allowance: ledger.allowance(token, caller, house) })
  })

  return app
}
