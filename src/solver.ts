/**
 * Solver
 *
 * Full pipeline: node consistency, AC-3 over every arc, then backtracking
 * from the empty assignment. `null` means the puzzle is unsatisfiable
 * (or, with a budget, that the search gave up; see `counter.bailed`).
 */

import type { Assignment, Puzzle } from './types'
import { createSolverState, type SolverState } from './state'
import { enforceNodeConsistency, ac3 } from './consistency'
import { backtrack, type SearchOptions } from './search'

export type SolveOptions = SearchOptions & {
  /** Receives the state once propagation has finished. */
  onPropagated?: (state: SolverState, consistent: boolean) => void
}

export function solve(puzzle: Puzzle, options: SolveOptions = {}): Assignment | null {
  const state = createSolverState(puzzle)

  enforceNodeConsistency(state)

  // A slot with no word of its length may have no arc that AC-3 would revise
  const lengthsCovered = puzzle.slots.every(slot => state.domains.size(slot) > 0)
  const arcConsistent = lengthsCovered && ac3(state)
  options.onPropagated?.(state, arcConsistent)

  // An empty domain means no assignment can exist
  if (!arcConsistent) return null

  return backtrack(state, new Map(), options)
}
