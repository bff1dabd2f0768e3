/**
 * Puzzle Model
 *
 * Builds the immutable crossword geometry from a structure grid and a word
 * list: slot discovery, the overlap relation and the neighbor relation.
 */

import type { Cell, Overlap, Puzzle, Slot } from './types'
import { slotKey } from './types'
import { NotFoundError, ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type PuzzleInput = {
  /** `true` marks a fillable cell. */
  structure: boolean[][]
  words: Iterable<string>
}

// ============================================================================
// Validation
// ============================================================================

function validateStructure(structure: unknown): asserts structure is boolean[][] {
  if (!Array.isArray(structure) || structure.length === 0) {
    throw new ValidationError('Structure must be a non-empty array of rows')
  }
  let width: number | null = null
  for (const [i, row] of structure.entries()) {
    if (!Array.isArray(row) || row.length === 0) {
      throw new ValidationError(`Structure row ${i} must be a non-empty array`)
    }
    if (width !== null && row.length !== width) {
      throw new ValidationError(`Structure row ${i} has width ${row.length}, expected ${width}`)
    }
    width = row.length
    for (const cell of row) {
      if (typeof cell !== 'boolean') {
        throw new ValidationError(`Structure row ${i} contains a non-boolean cell`)
      }
    }
  }
}

function collectWords(words: Iterable<string>): Set<string> {
  const result = new Set<string>()
  for (const word of words) {
    if (typeof word !== 'string' || word.length === 0) {
      throw new ValidationError('Words must be non-empty strings')
    }
    result.add(word)
  }
  return result
}

// ============================================================================
// Geometry
// ============================================================================

export function slotCells(slot: Slot): Cell[] {
  const cells: Cell[] = []
  for (let k = 0; k < slot.length; k++) {
    cells.push(slot.direction === 'down'
      ? [slot.row + k, slot.col]
      : [slot.row, slot.col + k])
  }
  return cells
}

function runLength(structure: boolean[][], row: number, col: number, dRow: number, dCol: number): number {
  let length = 0
  let r = row
  let c = col
  while (structure[r]?.[c] === true) {
    length++
    r += dRow
    c += dCol
  }
  return length
}

function findSlots(structure: boolean[][]): Slot[] {
  const slots: Slot[] = []
  for (let row = 0; row < structure.length; row++) {
    const cells = structure[row] ?? []
    for (let col = 0; col < cells.length; col++) {
      if (!cells[col]) continue

      // Across: starts at the left edge or after a blocked cell
      if (col === 0 || !cells[col - 1]) {
        const length = runLength(structure, row, col, 0, 1)
        if (length > 1) slots.push({ row, col, length, direction: 'across' })
      }

      // Down: starts at the top edge or below a blocked cell
      if (row === 0 || !structure[row - 1]?.[col]) {
        const length = runLength(structure, row, col, 1, 0)
        if (length > 1) slots.push({ row, col, length, direction: 'down' })
      }
    }
  }
  return slots
}

function computeOverlap(x: Slot, y: Slot): Overlap {
  const indexByCell = new Map<string, number>()
  slotCells(x).forEach(([r, c], i) => indexByCell.set(`${r},${c}`, i))
  const yCells = slotCells(y)
  for (let j = 0; j < yCells.length; j++) {
    const [r, c] = yCells[j]!
    const i = indexByCell.get(`${r},${c}`)
    if (i !== undefined) return [i, j]
  }
  return null
}

// ============================================================================
// Construction
// ============================================================================

export function createPuzzle(input: PuzzleInput): Puzzle {
  if (!input || typeof input !== 'object') {
    throw new ValidationError('Puzzle input is required')
  }
  validateStructure(input.structure)
  if (typeof input.words === 'string') {
    throw new ValidationError('Words must be a collection of strings, not a single string')
  }
  if (input.words == null || typeof input.words[Symbol.iterator] !== 'function') {
    throw new ValidationError('Words must be iterable')
  }

  const structure = input.structure.map(row => [...row])
  const words = collectWords(input.words)
  const slots = findSlots(structure)

  const byKey = new Map<string, Slot>()
  for (const slot of slots) byKey.set(slotKey(slot), slot)

  // Overlap table keyed by "xKey|yKey"; absent entries mean no overlap
  const overlaps = new Map<string, readonly [number, number]>()
  const neighborSets = new Map<string, Set<Slot>>()
  for (const slot of slots) neighborSets.set(slotKey(slot), new Set())

  for (const x of slots) {
    for (const y of slots) {
      if (x === y) continue
      const overlap = computeOverlap(x, y)
      if (overlap === null) continue
      overlaps.set(`${slotKey(x)}|${slotKey(y)}`, overlap)
      neighborSets.get(slotKey(x))!.add(y)
    }
  }

  function requireKey(slot: Slot): string {
    const key = slotKey(slot)
    if (!byKey.has(key)) {
      throw new NotFoundError(`Slot '${key}' is not part of this puzzle`)
    }
    return key
  }

  return {
    height: structure.length,
    width: structure[0]?.length ?? 0,
    structure,
    slots,
    words,
    overlap(x: Slot, y: Slot): Overlap {
      const xKey = requireKey(x)
      const yKey = requireKey(y)
      return overlaps.get(`${xKey}|${yKey}`) ?? null
    },
    neighbors(x: Slot): ReadonlySet<Slot> {
      return neighborSets.get(requireKey(x))!
    },
  }
}
