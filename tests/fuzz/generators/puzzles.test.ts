/**
 * Tests for puzzle generators.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { structureGen, wordGen, wordListGen, puzzleInputGen } from './puzzles'
import { createPuzzle } from '../../../src/puzzle'

describe('puzzle generators', () => {
  describe('structureGen', () => {
    it('generates non-empty rectangular grids within bounds', () => {
      fc.assert(
        fc.property(structureGen({ maxHeight: 4, maxWidth: 2 }), (structure) => {
          expect(structure.length).toBeGreaterThanOrEqual(1)
          expect(structure.length).toBeLessThanOrEqual(4)
          const width = structure[0]!.length
          expect(width).toBeGreaterThanOrEqual(1)
          expect(width).toBeLessThanOrEqual(2)
          for (const row of structure) expect(row.length).toBe(width)
        })
      )
    })
  })

  describe('wordGen', () => {
    it('generates words over the alphabet', () => {
      fc.assert(
        fc.property(wordGen({ maxLength: 4, alphabet: ['x', 'y'] }), (word) => {
          expect(word).toMatch(/^[xy]{1,4}$/)
        })
      )
    })
  })

  describe('wordListGen', () => {
    it('respects the maximum word count', () => {
      fc.assert(
        fc.property(wordListGen({ maxWords: 5 }), (words) => {
          expect(words.length).toBeLessThanOrEqual(5)
        })
      )
    })
  })

  describe('puzzleInputGen', () => {
    it('always produces a valid puzzle', () => {
      fc.assert(
        fc.property(puzzleInputGen(), (input) => {
          const puzzle = createPuzzle(input)
          for (const slot of puzzle.slots) expect(slot.length).toBeGreaterThan(1)
        })
      )
    })
  })
})
