/**
 * crossword-csp
 *
 * Public API exports
 */

// Error system
export {
  CrosswordError, CrosswordErrorCode,
  ValidationError, NotFoundError,
} from './errors'
export type { CrosswordErrorCode as CrosswordErrorCodeType } from './errors'

// Data model
export type { Direction, Slot, Overlap, Cell, Puzzle, Assignment } from './types'
export { slotKey, slotEquals, compareSlots, wordLength, letterAt } from './types'

// Puzzle construction
export type { PuzzleInput } from './puzzle'
export { createPuzzle, slotCells } from './puzzle'

// Domain store + solver state
export type { DomainStore } from './domains'
export { createDomainStore } from './domains'
export type { SolverState } from './state'
export { createSolverState } from './state'

// Consistency engine
export type { Arc } from './consistency'
export { enforceNodeConsistency, revise, ac3, allArcs } from './consistency'

// Search engine
export type { SearchBudget, SearchCounter, SearchOptions } from './search'
export {
  createSearchCounter,
  assignmentComplete, consistent,
  selectUnassignedSlot, orderDomainValues,
  backtrack,
} from './search'

// Top-level solve
export type { SolveOptions } from './solver'
export { solve } from './solver'

// Rendering
export { letterGrid, renderGrid, BLOCKED_GLYPH } from './render'

// Public API
export type {
  CrosswordSolverConfig, CrosswordSolver,
  SolveResult, SolveStats,
  SolverEventMap, SolverEventName, SolverEventHandler,
} from './public-api'
export { createCrosswordSolver } from './public-api'
