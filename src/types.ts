/**
 * Shared Types
 *
 * The crossword data model: slots, overlaps, assignments and the
 * read-only puzzle view consumed by the solver.
 */

// ============================================================================
// Slots
// ============================================================================

export type Direction = 'across' | 'down'

export type Slot = {
  readonly row: number
  readonly col: number
  readonly length: number
  readonly direction: Direction
}

/** `[i, j]`: letter i of x's word must equal letter j of y's word. */
export type Overlap = readonly [number, number] | null

export type Cell = readonly [number, number]

// ============================================================================
// Puzzle Model
// ============================================================================

export type Puzzle = {
  readonly height: number
  readonly width: number
  readonly structure: ReadonlyArray<ReadonlyArray<boolean>>
  readonly slots: ReadonlyArray<Slot>
  readonly words: ReadonlySet<string>
  overlap(x: Slot, y: Slot): Overlap
  neighbors(x: Slot): ReadonlySet<Slot>
}

// ============================================================================
// Assignment
// ============================================================================

export type Assignment = Map<Slot, string>

// ============================================================================
// Slot Identity
// ============================================================================

export function slotKey(slot: Slot): string {
  return `${slot.row},${slot.col},${slot.direction},${slot.length}`
}

export function slotEquals(a: Slot, b: Slot): boolean {
  return a.row === b.row
    && a.col === b.col
    && a.length === b.length
    && a.direction === b.direction
}

export function compareSlots(a: Slot, b: Slot): number {
  if (a.row !== b.row) return a.row - b.row
  if (a.col !== b.col) return a.col - b.col
  if (a.direction !== b.direction) return a.direction === 'across' ? -1 : 1
  return a.length - b.length
}

// ============================================================================
// Word Letters
// ============================================================================

// Letters are code points, so a word outside the BMP fills one cell per character

export function wordLength(word: string): number {
  return [...word].length
}

export function letterAt(word: string, index: number): string {
  return [...word][index] ?? ''
}
