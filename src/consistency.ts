/**
 * Consistency Engine
 *
 * Node consistency (word length) and arc consistency (overlap letters)
 * over a solver state's domain store. Arc consistency is AC-3 with a
 * FIFO work queue that tolerates duplicate arcs.
 */

import type { Puzzle, Slot } from './types'
import { letterAt, slotEquals, wordLength } from './types'
import type { SolverState } from './state'

// ============================================================================
// Types
// ============================================================================

/** Directed arc (x, y): x's domain is revised against y's. */
export type Arc = readonly [Slot, Slot]

// ============================================================================
// Node Consistency
// ============================================================================

export function enforceNodeConsistency(state: SolverState): void {
  const { puzzle, domains } = state
  for (const slot of puzzle.slots) {
    const toRemove: string[] = []
    for (const word of domains.get(slot)) {
      if (wordLength(word) !== slot.length) toRemove.push(word)
    }
    domains.remove(slot, toRemove)
  }
}

// ============================================================================
// Arc Consistency (AC-3)
// ============================================================================

/**
 * Remove from x's domain every word with no support in y's domain.
 * Returns true if x's domain shrank.
 */
export function revise(state: SolverState, x: Slot, y: Slot): boolean {
  const overlap = state.puzzle.overlap(x, y)
  if (overlap === null) return false

  const [i, j] = overlap
  const yDomain = state.domains.get(y)

  // Letters available at y's overlap index; support is a set lookup
  const supportLetters = new Set<string>()
  for (const yWord of yDomain) {
    supportLetters.add(letterAt(yWord, j))
  }

  const toRemove: string[] = []
  for (const xWord of state.domains.get(x)) {
    if (!supportLetters.has(letterAt(xWord, i))) toRemove.push(xWord)
  }

  if (toRemove.length === 0) return false
  state.domains.remove(x, toRemove)
  return true
}

export function allArcs(puzzle: Puzzle): Arc[] {
  const arcs: Arc[] = []
  for (const x of puzzle.slots) {
    for (const y of puzzle.neighbors(x)) {
      arcs.push([x, y])
    }
  }
  return arcs
}

/**
 * Enforce arc consistency. Seeds the queue with `arcs` when given,
 * otherwise with every arc of the constraint graph.
 * Returns false as soon as any domain becomes empty.
 */
export function ac3(state: SolverState, arcs?: Iterable<Arc>): boolean {
  const queue: Arc[] = arcs !== undefined ? [...arcs] : allArcs(state.puzzle)

  // Head index instead of shift() keeps dequeue O(1)
  let head = 0
  while (head < queue.length) {
    const [x, y] = queue[head++]!
    if (!revise(state, x, y)) continue

    if (state.domains.size(x) === 0) return false

    for (const z of state.puzzle.neighbors(x)) {
      if (!slotEquals(z, y)) queue.push([z, x])
    }
  }
  return true
}
