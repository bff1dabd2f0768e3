/**
 * Shared solution assertions for every test that checks a solve result.
 */
import { expect } from 'vitest'
import type { Assignment, Puzzle } from '../../src/types'
import { letterAt, slotKey, wordLength } from '../../src/types'

/**
 * Asserts that an assignment is a full solution:
 * 1. Every slot is assigned exactly once
 * 2. Word lengths match slot lengths and every word is in the dictionary
 * 3. No word is used twice
 * 4. Every pair of neighbors agrees on its shared letter
 */
export function assertValidSolution(puzzle: Puzzle, assignment: Assignment): void {
  expect(assignment.size).toBe(puzzle.slots.length)

  const byKey = new Map<string, string>()
  for (const [slot, word] of assignment) byKey.set(slotKey(slot), word)

  for (const slot of puzzle.slots) {
    const word = byKey.get(slotKey(slot))
    expect(word).toBeDefined()
    expect(wordLength(word!)).toBe(slot.length)
    expect(puzzle.words.has(word!)).toBe(true)
  }

  expect(new Set(assignment.values()).size).toBe(assignment.size)

  for (const x of puzzle.slots) {
    for (const y of puzzle.neighbors(x)) {
      const overlap = puzzle.overlap(x, y)
      expect(overlap).not.toBeNull()
      const [i, j] = overlap!
      expect(letterAt(byKey.get(slotKey(x))!, i)).toBe(letterAt(byKey.get(slotKey(y))!, j))
    }
  }
}

/** Assignment as a plain `slotKey -> word` record, for equality checks. */
export function toRecord(assignment: Assignment): Record<string, string> {
  const record: Record<string, string> = {}
  for (const [slot, word] of assignment) record[slotKey(slot)] = word
  return record
}
