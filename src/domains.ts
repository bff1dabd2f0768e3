/**
 * Domain Store
 *
 * Stateful candidate-word sets, one per slot. Owned by a single solve;
 * consistency enforcement and search only ever remove words from it.
 */

import type { Puzzle, Slot } from './types'
import { slotKey } from './types'
import { NotFoundError } from './errors'

export type DomainStore = {
  get(slot: Slot): ReadonlySet<string>
  size(slot: Slot): number
  set(slot: Slot, words: Iterable<string>): void
  remove(slot: Slot, words: Iterable<string>): number
  clone(): DomainStore
  entries(): Iterable<[Slot, ReadonlySet<string>]>
}

export function createDomainStore(puzzle: Puzzle): DomainStore {
  const initial = new Map<string, { slot: Slot; words: Set<string> }>()
  for (const slot of puzzle.slots) {
    initial.set(slotKey(slot), { slot, words: new Set(puzzle.words) })
  }
  return fromEntries(initial)
}

function fromEntries(domains: Map<string, { slot: Slot; words: Set<string> }>): DomainStore {
  function entry(slot: Slot): { slot: Slot; words: Set<string> } {
    const found = domains.get(slotKey(slot))
    if (!found) {
      throw new NotFoundError(`No domain for slot '${slotKey(slot)}'`)
    }
    return found
  }

  // ========== Reads ==========

  function get(slot: Slot): ReadonlySet<string> {
    return entry(slot).words
  }

  function size(slot: Slot): number {
    return entry(slot).words.size
  }

  function* entries(): Iterable<[Slot, ReadonlySet<string>]> {
    for (const { slot, words } of domains.values()) {
      yield [slot, words]
    }
  }

  // ========== Operations ==========

  function set(slot: Slot, words: Iterable<string>): void {
    entry(slot).words = new Set(words)
  }

  /** Returns how many of `words` were actually present. */
  function remove(slot: Slot, words: Iterable<string>): number {
    const target = entry(slot).words
    let removed = 0
    for (const word of words) {
      if (target.delete(word)) removed++
    }
    return removed
  }

  function clone(): DomainStore {
    const copy = new Map<string, { slot: Slot; words: Set<string> }>()
    for (const [key, { slot, words }] of domains) {
      copy.set(key, { slot, words: new Set(words) })
    }
    return fromEntries(copy)
  }

  return {
    get,
    size,
    set,
    remove,
    clone,
    entries,
  }
}
