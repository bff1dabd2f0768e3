/**
 * Solver State
 *
 * Explicit bundle passed through the consistency and search phases:
 * the shared read-only puzzle and the solve's own domain store.
 */

import type { Puzzle } from './types'
import { createDomainStore, type DomainStore } from './domains'

export type SolverState = {
  readonly puzzle: Puzzle
  readonly domains: DomainStore
}

export function createSolverState(puzzle: Puzzle): SolverState {
  return { puzzle, domains: createDomainStore(puzzle) }
}
