// tests/auction/harness.ts — Shared setup for auction house tests

import type { Address } from "viem"
import { isAuctionError } from "../../src/auction/errors.js"
import { AuctionHouse } from "../../src/auction/house.js"
import type { CreateLotParams } from "../../src/auction/house.js"
import { createAuctionLogger } from "../../src/auction/logger.js"
import { FixedPriceBatchModule } from "../../src/auction/modules/fixed-price-batch.js"
import { FixedPriceSaleModule } from "../../src/auction/modules/fixed-price-sale.js"
import { ModuleRegistry } from "../../src/auction/modules/registry.js"
import type { AuctionModule } from "../../src/auction/modules/types.js"
import type { SellerPayoutMode } from "../../src/auction/settlement.js"
import { InMemoryTokenLedger } from "../../src/auction/token.js"
import { MAX_AMOUNT, type Lot, type LotFees } from "../../src/auction/types.js"

/** Digit-only addresses are their own checksum form. */
export function addr(n: number): Address {
  return `0x${n.toString().padStart(40, "0")}`
}

export const HOUSE = addr(1)
export const GOVERNANCE = addr(2)
export const PROTOCOL = addr(3)
export const SELLER = addr(10)
export const CURATOR = addr(11)
export const REFERRER = addr(12)
export const REFERRER_2 = addr(13)
export const ALICE = addr(20)
export const BOB = addr(21)
export const CAROL = addr(22)
export const BASE = addr(50)
export const QUOTE = addr(51)
export const CALLBACK = addr(60)

export const E18 = 10n ** 18n
export const START = 1_700_000_000
export const DURATION = 3600
export const GRACE = 600
export const SELLER_BASE = 1_000n * E18

export interface HarnessOptions {
  sellerPayoutMode?: SellerPayoutMode
  baseDecimals?: number
  quoteDecimals?: number
  baseTransferFee?: number
  quoteTransferFee?: number
  /** Extra modules registered beside FPB and FPS */
  modules?: Record<string, AuctionModule>
}

export interface Harness {
  house: AuctionHouse
  tokens: InMemoryTokenLedger
  batch: FixedPriceBatchModule
  sale: FixedPriceSaleModule
  logs: string[]
  now(): number
  advance(seconds: number): void
}

export function createHarness(options: HarnessOptions = {}): Harness {
  let now = START
  const clock = () => now
  const logs: string[] = []

  const tokens = new InMemoryTokenLedger(HOUSE, clock)
  tokens.createToken(BASE, options.baseDecimals ?? 18, { transferFeePercent: options.baseTransferFee })
  tokens.createToken(QUOTE, options.quoteDecimals ?? 18, { transferFeePercent: options.quoteTransferFee })

  const batch = new FixedPriceBatchModule()
  const sale = new FixedPriceSaleModule()
  const registry = new ModuleRegistry().register("FPB", batch).register("FPS", sale)
  for (const [auctionType, module] of Object.entries(options.modules ?? {})) {
    registry.register(auctionType, module)
  }

  const house = new AuctionHouse({
    registry,
    tokens,
    address: HOUSE,
    protocol: { governance: GOVERNANCE, protocol: PROTOCOL },
    config: { sellerPayoutMode: options.sellerPayoutMode ?? "push", settlementGracePeriod: GRACE },
    clock,
    logger: createAuctionLogger((line) => logs.push(line), () => new Date(now * 1000)),
  })

  fund(tokens, BASE, SELLER, SELLER_BASE)

  return {
    house,
    tokens,
    batch,
    sale,
    logs,
    now: () => now,
    advance: (seconds) => {
      now += seconds
    },
  }
}

/** Mint to holder and let the house pull freely. */
export function fund(tokens: InMemoryTokenLedger, token: Address, holder: Address, amount: bigint): void {
  tokens.mint(token, holder, amount)
  tokens.approve(token, holder, HOUSE, MAX_AMOUNT)
}

export interface BatchLotOptions {
  auctionType?: string
  capacity?: bigint
  price?: bigint
  minFillPercent?: number
  prefunded?: boolean
  curator?: Address
  callbacks?: CreateLotParams["callbacks"]
}

export function createBatchLot(h: Harness, options: BatchLotOptions = {}): number {
  return h.house.auction(SELLER, {
    auctionType: options.auctionType ?? "FPB",
    baseToken: BASE,
    quoteToken: QUOTE,
    capacity: options.capacity ?? 10n * E18,
    duration: DURATION,
    prefunded: options.prefunded ?? true,
    curator: options.curator ?? null,
    callbacks: options.callbacks,
    implParams: { price: options.price ?? 2n * E18, minFillPercent: options.minFillPercent ?? 0 },
  })
}

export interface SaleLotOptions {
  capacity?: bigint
  price?: bigint
  maxPayoutPercent?: number
  prefunded?: boolean
  curator?: Address
}

export function createSaleLot(h: Harness, options: SaleLotOptions = {}): number {
  return h.house.auction(SELLER, {
    auctionType: "FPS",
    baseToken: BASE,
    quoteToken: QUOTE,
    capacity: options.capacity ?? 10n * E18,
    duration: DURATION,
    prefunded: options.prefunded ?? true,
    curator: options.curator ?? null,
    implParams: { price: options.price ?? 2n * E18, maxPayoutPercent: options.maxPayoutPercent ?? 100_000 },
  })
}

/** Fund the bidder and place a bid. */
export function placeBid(h: Harness, bidder: Address, amount: bigint, lotId = 0, referrer: Address | null = null): number {
  fund(h.tokens, QUOTE, bidder, amount)
  return h.house.bid(bidder, { lotId, amount, referrer })
}

export function concludeLot(h: Harness): void {
  h.advance(DURATION)
}

/** Capture the AuctionError code thrown by fn. */
export function errorCode(fn: () => unknown): string | undefined {
  try {
    fn()
  } catch (err) {
    if (isAuctionError(err)) return err.code
    throw err
  }
  return undefined
}

/** A bare ACTIVE lot record for component tests that bypass the house. */
export function lotRecord(overrides: Partial<Lot> = {}): Lot {
  return {
    id: 0,
    seller: SELLER,
    baseToken: BASE,
    quoteToken: QUOTE,
    baseDecimals: 18,
    quoteDecimals: 18,
    auctionType: "FPB",
    kind: "batch",
    capacity: 10n * E18,
    start: START,
    conclusion: START + DURATION,
    prefunded: true,
    callbacks: null,
    funding: 0n,
    sold: 0n,
    purchased: 0n,
    proceeds: { quote: 0n, base: 0n },
    status: "ACTIVE",
    ...overrides,
  }
}

export function lotFeesRecord(overrides: Partial<LotFees> = {}): LotFees {
  return {
    curator: null,
    curated: false,
    curatorFee: 0,
    protocolFee: 0,
    referrerFee: 0,
    locked: false,
    ...overrides,
  }
}
