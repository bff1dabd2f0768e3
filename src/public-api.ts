/**
 * Public API Module
 *
 * Consumer-facing solver: validates configuration, runs one independent
 * solve per call, reports lifecycle events and renders results.
 */

import type { Assignment, Puzzle } from './types'
import { ValidationError } from './errors'
import { solve as solvePuzzle } from './solver'
import { createSearchCounter, type SearchBudget } from './search'
import { renderGrid } from './render'

// ============================================================================
// Types
// ============================================================================

export type CrosswordSolverConfig = {
  puzzle: Puzzle
  /** Maintain arc consistency during search. Off by default. */
  inference?: boolean
  /** Bound the search; unbounded when omitted. */
  budget?: SearchBudget
}

export type SolveStats = {
  steps: number
  elapsedMs: number
}

export type SolveResult =
  | { status: 'solved'; assignment: Assignment; stats: SolveStats }
  | { status: 'unsatisfiable'; stats: SolveStats }
  | { status: 'aborted'; stats: SolveStats }

export type SolverEventMap = {
  propagated: { consistent: boolean }
  solved: { assignment: Assignment; stats: SolveStats }
  unsatisfiable: { stats: SolveStats }
  aborted: { stats: SolveStats }
}

export type SolverEventName = keyof SolverEventMap

export type SolverEventHandler<E extends SolverEventName> = (payload: SolverEventMap[E]) => void

type EventHandlers = { [E in SolverEventName]: SolverEventHandler<E>[] }

export type CrosswordSolver = {
  readonly puzzle: Puzzle
  solve(): SolveResult
  render(assignment: Assignment): string
  on<E extends SolverEventName>(event: E, handler: SolverEventHandler<E>): void
}

// ============================================================================
// Validation
// ============================================================================

function validateLimit(name: string, value: number | undefined): void {
  if (value === undefined) return
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`Budget ${name} must be a positive integer, got ${value}`)
  }
}

function validateConfig(config: CrosswordSolverConfig): void {
  if (!config || typeof config !== 'object') {
    throw new ValidationError('Config is required')
  }
  if (!config.puzzle || typeof config.puzzle !== 'object') {
    throw new ValidationError('Puzzle is required')
  }
  if (config.inference !== undefined && typeof config.inference !== 'boolean') {
    throw new ValidationError('inference must be a boolean')
  }
  if (config.budget !== undefined) {
    validateLimit('maxSteps', config.budget.maxSteps)
    validateLimit('maxMs', config.budget.maxMs)
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createCrosswordSolver(config: CrosswordSolverConfig): CrosswordSolver {
  validateConfig(config)

  const { puzzle } = config
  const inference = config.inference ?? false
  const budget = config.budget

  // Event handlers
  const eventHandlers: EventHandlers = {
    propagated: [],
    solved: [],
    unsatisfiable: [],
    aborted: [],
  }

  function emit<E extends SolverEventName>(event: E, payload: SolverEventMap[E]): boolean {
    const handlers: SolverEventHandler<E>[] = eventHandlers[event]
    let hadErrors = false
    for (const handler of handlers) {
      try { handler(payload) } catch (e) { hadErrors = true; console.error(`Event handler error on '${event}':`, e) }
    }
    return !hadErrors
  }

  function on<E extends SolverEventName>(event: E, handler: SolverEventHandler<E>): void {
    const handlers: SolverEventHandler<E>[] = eventHandlers[event]
    handlers.push(handler)
  }

  function solve(): SolveResult {
    const started = Date.now()
    const counter = createSearchCounter(budget)

    const assignment = solvePuzzle(puzzle, {
      inference,
      counter,
      onPropagated: (_state, consistent) => { emit('propagated', { consistent }) },
    })

    const stats: SolveStats = { steps: counter.steps, elapsedMs: Date.now() - started }

    if (assignment) {
      emit('solved', { assignment, stats })
      return { status: 'solved', assignment, stats }
    }
    if (counter.bailed) {
      emit('aborted', { stats })
      return { status: 'aborted', stats }
    }
    emit('unsatisfiable', { stats })
    return { status: 'unsatisfiable', stats }
  }

  function render(assignment: Assignment): string {
    return renderGrid(puzzle, assignment)
  }

  return {
    puzzle,
    solve,
    render,
    on,
  }
}
