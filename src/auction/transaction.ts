// src/auction/transaction.ts — All-or-nothing execution and per-lot reentrancy guard
//
// Every participant opens a transaction on begin() and hands back a rollback.
// A thrown error restores all participants in reverse order and rethrows,
// so no partial state is ever observable. On success each participant that
// keeps a journal is told to commit.

import { AuctionError } from "./errors.js"

export interface Transactional {
  /** Open a transaction; the returned function restores the state it began from. */
  begin(): () => void
  /** The transaction opened by the latest begin() finished without error. */
  commit?(): void
}

export function atomically<T>(participants: readonly Transactional[], fn: () => T): T {
  const rollbacks = participants.map((p) => p.begin())
  let result: T
  try {
    result = fn()
  } catch (err) {
    for (const rollback of rollbacks.reverse()) {
      rollback()
    }
    throw err
  }
  for (const participant of [...participants].reverse()) {
    participant.commit?.()
  }
  return result
}

// ── Undo Journal ─────────────────────────────────────────────

interface Frame {
  undo: (() => void)[]
  /** Keys already captured in this frame */
  captured: Set<string>
}

/**
 * Per-transaction undo log. Owners record each key before its first change
 * inside a transaction, so a rollback costs what the transaction touched,
 * not the size of the state. Nested transactions merge into their parent on
 * commit. Outside any transaction nothing is recorded.
 */
export class Journal implements Transactional {
  private readonly frames: Frame[] = []

  begin(): () => void {
    const frame: Frame = { undo: [], captured: new Set() }
    this.frames.push(frame)
    return () => {
      for (const undo of frame.undo.reverse()) {
        undo()
      }
      this.close(frame)
    }
  }

  commit(): void {
    const frame = this.frames.pop()
    const parent = this.frames[this.frames.length - 1]
    if (!frame || !parent) return
    parent.undo.push(...frame.undo)
    for (const key of frame.captured) parent.captured.add(key)
  }

  /** Before key first changes in the open transaction, capture() returns its undo. */
  record(key: string, capture: () => () => void): void {
    const frame = this.frames[this.frames.length - 1]
    if (!frame || frame.captured.has(key)) return
    frame.captured.add(key)
    frame.undo.push(capture())
  }

  /** Capture a map entry's presence and value. */
  entry<K, V>(tag: string, map: Map<K, V>, key: K): void {
    this.record(`${tag}:${String(key)}`, () => {
      const previous = map.get(key)
      return () => {
        if (previous === undefined) {
          map.delete(key)
        } else {
          map.set(key, previous)
        }
      }
    })
  }

  /** Capture an object's fields; rollback writes them back in place. */
  fields<T extends object>(tag: string, target: T): void {
    this.record(tag, () => {
      const saved = structuredClone(target)
      return () => {
        Object.assign(target, saved)
      }
    })
  }

  private close(frame: Frame): void {
    const index = this.frames.lastIndexOf(frame)
    if (index >= 0) this.frames.splice(index, 1)
  }
}

// ── Reentrancy Guard ─────────────────────────────────────────

export class LotGuard {
  private readonly held = new Set<string>()

  /** Run fn while holding the lock for key. A nested entry is rejected. */
  run<T>(key: string, fn: () => T): T {
    if (this.held.has(key)) {
      throw new AuctionError(`Reentrant call rejected on ${key}`, "INVALID_STATE", { key, reentrant: true })
    }
    this.held.add(key)
    try {
      return fn()
    } finally {
      this.held.delete(key)
    }
  }

  isHeld(key: string): boolean {
    return this.held.has(key)
  }
}
