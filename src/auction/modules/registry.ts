// src/auction/modules/registry.ts — Auction-type key → module
//
// Explicit registration map. A lot resolves its module once, at creation, and
// keeps that reference for life.

import { AuctionError } from "../errors.js"
import type { AuctionModule } from "./types.js"

export class ModuleRegistry {
  private readonly modules = new Map<string, AuctionModule>()

  register(auctionType: string, module: AuctionModule): this {
    if (auctionType.length === 0) {
      throw new AuctionError("Auction type key must not be empty", "INVALID_PARAMS")
    }
    if (this.modules.has(auctionType)) {
      throw new AuctionError(`Auction type ${auctionType} is already registered`, "INVALID_PARAMS", { auctionType })
    }
    this.modules.set(auctionType, module)
    return this
  }

  /** @throws AuctionError INVALID_PARAMS for an unknown auction type */
  resolve(auctionType: string): AuctionModule {
    const module = this.modules.get(auctionType)
    if (!module) {
      throw new AuctionError(`Unknown auction type ${auctionType}`, "INVALID_PARAMS", { auctionType })
    }
    return module
  }

  get types(): string[] {
    return [...this.modules.keys()]
  }
}
