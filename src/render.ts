/**
 * Render
 *
 * Text output for an assignment. Reads the assignment, never mutates it.
 */

import type { Assignment, Puzzle } from './types'
import { letterAt } from './types'
import { slotCells } from './puzzle'

export const BLOCKED_GLYPH = '█'

export function letterGrid(puzzle: Puzzle, assignment: Assignment): (string | null)[][] {
  const letters: (string | null)[][] = Array.from(
    { length: puzzle.height },
    () => Array.from({ length: puzzle.width }, () => null)
  )
  for (const [slot, word] of assignment) {
    slotCells(slot).forEach(([row, col], k) => {
      const line = letters[row]
      if (line && col < line.length) line[col] = letterAt(word, k)
    })
  }
  return letters
}

export function renderGrid(puzzle: Puzzle, assignment: Assignment): string {
  const letters = letterGrid(puzzle, assignment)
  return puzzle.structure
    .map((row, i) => row
      .map((fillable, j) => fillable ? (letters[i]?.[j] ?? ' ') : BLOCKED_GLYPH)
      .join(''))
    .join('\n')
}
