// src/auction/lifecycle.ts — Lot lifecycle derivation
//
// Persisted status only records terminal-ish transitions. Whether an active
// lot is CREATED, STARTED or CONCLUDED follows from the clock and the module.

import type { AuctionCallbacks } from "./callbacks.js"
import { invalidLotId } from "./errors.js"
import type { AuctionModule } from "./modules/types.js"
import { Journal, type Transactional } from "./transaction.js"
import type { Lot } from "./types.js"
import { LotStatus } from "./types.js"

/** Per-lot references fixed at creation. */
export interface LotRuntime {
  module(lotId: number): AuctionModule
  callbacks(lotId: number): AuctionCallbacks | undefined
}

/** Live module and callback references per lot, rolled back with the store. */
export class LotBindings implements LotRuntime, Transactional {
  private readonly modules = new Map<number, AuctionModule>()
  private readonly hooks = new Map<number, AuctionCallbacks>()
  private readonly journal = new Journal()

  begin(): () => void {
    return this.journal.begin()
  }

  commit(): void {
    this.journal.commit()
  }

  bind(lotId: number, module: AuctionModule, callbacks: AuctionCallbacks | undefined): void {
    this.journal.entry("modules", this.modules, lotId)
    this.modules.set(lotId, module)
    if (callbacks) {
      this.journal.entry("hooks", this.hooks, lotId)
      this.hooks.set(lotId, callbacks)
    }
  }

  /** @throws AuctionError INVALID_LOT_ID */
  module(lotId: number): AuctionModule {
    const module = this.modules.get(lotId)
    if (!module) throw invalidLotId(lotId)
    return module
  }

  callbacks(lotId: number): AuctionCallbacks | undefined {
    return this.hooks.get(lotId)
  }
}

export function isConcluded(lot: Lot, module: AuctionModule, now: number): boolean {
  return now >= lot.conclusion || module.lotStatus(lot.id) === "soldOut"
}

export function deriveStatus(lot: Lot, module: AuctionModule, now: number): LotStatus {
  switch (lot.status) {
    case "CANCELLED":
      return LotStatus.CANCELLED
    case "SETTLED":
      return LotStatus.SETTLED
    case "CLAIMED":
      return LotStatus.CLAIMED
    case "ACTIVE":
      if (now < lot.start) return LotStatus.CREATED
      return isConcluded(lot, module, now) ? LotStatus.CONCLUDED : LotStatus.STARTED
  }
}
