/**
 * Search Engine
 *
 * Backtracking over partial assignments with MRV + degree variable ordering
 * and least-constraining-value ordering. Each extension copies the parent
 * assignment, so a failed branch is simply dropped.
 */

import type { Assignment, Slot } from './types'
import { letterAt, slotKey, wordLength } from './types'
import type { SolverState } from './state'
import { ac3, type Arc } from './consistency'

// ============================================================================
// Types
// ============================================================================

export type SearchBudget = {
  /** Maximum number of search steps (recursive calls). */
  maxSteps?: number
  /** Wall-clock limit in milliseconds, checked every 1024 steps. */
  maxMs?: number
}

export type SearchCounter = {
  steps: number
  bailed: boolean
  maxSteps?: number
  deadline?: number
}

export type SearchOptions = {
  /** Re-run AC-3 on a cloned domain store after every extension. */
  inference?: boolean
  counter?: SearchCounter
}

export function createSearchCounter(budget?: SearchBudget): SearchCounter {
  const counter: SearchCounter = { steps: 0, bailed: false }
  if (budget?.maxSteps !== undefined) counter.maxSteps = budget.maxSteps
  if (budget?.maxMs !== undefined) counter.deadline = Date.now() + budget.maxMs
  return counter
}

// ============================================================================
// Internal Helpers
// ============================================================================

function assignedKeys(assignment: Assignment): Set<string> {
  const keys = new Set<string>()
  for (const slot of assignment.keys()) keys.add(slotKey(slot))
  return keys
}

function exhausted(counter: SearchCounter): boolean {
  if (counter.bailed) return true
  counter.steps++
  if (counter.maxSteps !== undefined && counter.steps > counter.maxSteps) {
    counter.bailed = true
    return true
  }
  // Check wall-clock every 1024 steps to avoid Date.now() overhead
  if (counter.deadline !== undefined && (counter.steps & 0x3FF) === 0) {
    if (Date.now() > counter.deadline) {
      counter.bailed = true
      return true
    }
  }
  return false
}

// ============================================================================
// Assignment Checks
// ============================================================================

export function assignmentComplete(state: SolverState, assignment: Assignment): boolean {
  return assignment.size === state.puzzle.slots.length
}

/**
 * Lengths match, no word is used twice, and every pair of assigned
 * neighbors agrees on its shared letter. Unassigned slots are ignored.
 */
export function consistent(state: SolverState, assignment: Assignment): boolean {
  const { puzzle } = state
  const wordByKey = new Map<string, string>()

  for (const [slot, word] of assignment) {
    if (wordLength(word) !== slot.length) return false
    wordByKey.set(slotKey(slot), word)
  }

  if (new Set(assignment.values()).size !== assignment.size) return false

  for (const [slot, word] of assignment) {
    for (const neighbor of puzzle.neighbors(slot)) {
      const other = wordByKey.get(slotKey(neighbor))
      if (other === undefined) continue
      const overlap = puzzle.overlap(slot, neighbor)
      if (overlap === null) continue
      const [i, j] = overlap
      if (letterAt(word, i) !== letterAt(other, j)) return false
    }
  }

  return true
}

// ============================================================================
// Ordering Heuristics
// ============================================================================

/**
 * MRV: fewest remaining candidates. Ties go to the slot with the most
 * neighbors, then to the earlier slot in puzzle order.
 */
export function selectUnassignedSlot(state: SolverState, assignment: Assignment): Slot | null {
  const { puzzle, domains } = state
  const assigned = assignedKeys(assignment)

  let best: Slot | null = null
  let bestSize = Infinity
  let bestDegree = -1

  for (const slot of puzzle.slots) {
    if (assigned.has(slotKey(slot))) continue
    const size = domains.size(slot)
    const degree = puzzle.neighbors(slot).size
    if (size < bestSize || (size === bestSize && degree > bestDegree)) {
      best = slot
      bestSize = size
      bestDegree = degree
    }
  }

  return best
}

/**
 * LCV: a candidate's score is the number of words it would rule out across
 * the domains of unassigned neighbors. Ascending score, domain order on ties.
 */
export function orderDomainValues(state: SolverState, slot: Slot, assignment: Assignment): string[] {
  const { puzzle, domains } = state
  const assigned = assignedKeys(assignment)

  // Per unassigned neighbor: letter counts at its overlap index
  const constraints: { index: number; total: number; letters: Map<string, number> }[] = []
  for (const neighbor of puzzle.neighbors(slot)) {
    if (assigned.has(slotKey(neighbor))) continue
    const overlap = puzzle.overlap(slot, neighbor)
    if (overlap === null) continue
    const [i, j] = overlap
    const letters = new Map<string, number>()
    const neighborDomain = domains.get(neighbor)
    for (const word of neighborDomain) {
      const letter = letterAt(word, j)
      letters.set(letter, (letters.get(letter) ?? 0) + 1)
    }
    constraints.push({ index: i, total: neighborDomain.size, letters })
  }

  const scored = [...domains.get(slot)].map(word => {
    let score = 0
    for (const { index, total, letters } of constraints) {
      score += total - (letters.get(letterAt(word, index)) ?? 0)
    }
    return { word, score }
  })

  return scored.sort((a, b) => a.score - b.score).map(s => s.word)
}

// ============================================================================
// Backtracking
// ============================================================================

/**
 * Extend `assignment` to a complete consistent assignment.
 * Returns the first solution found, or null when every branch fails
 * (or the counter's budget runs out, in which case `counter.bailed` is set).
 */
export function backtrack(
  state: SolverState,
  assignment: Assignment,
  options: SearchOptions = {}
): Assignment | null {
  const counter = options.counter ?? createSearchCounter()
  return search(state, assignment, options.inference ?? false, counter)
}

function search(
  state: SolverState,
  assignment: Assignment,
  inference: boolean,
  counter: SearchCounter
): Assignment | null {
  if (exhausted(counter)) return null

  if (assignmentComplete(state, assignment)) return assignment

  const slot = selectUnassignedSlot(state, assignment)
  if (slot === null) return null

  for (const value of orderDomainValues(state, slot, assignment)) {
    const extended: Assignment = new Map(assignment)
    extended.set(slot, value)

    if (!consistent(state, extended)) continue

    let next = state
    if (inference) {
      const domains = state.domains.clone()
      domains.set(slot, [value])
      next = { puzzle: state.puzzle, domains }
      const arcs: Arc[] = [...state.puzzle.neighbors(slot)].map(z => [z, slot] as const)
      if (!ac3(next, arcs)) continue
    }

    const result = search(next, extended, inference, counter)
    if (result) return result

    // Don't let the loop keep trying values once the budget is spent
    if (counter.bailed) return null
  }

  return null
}
