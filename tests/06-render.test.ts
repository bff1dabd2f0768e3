/**
 * Segment 06: Render Tests
 *
 * Text output of an assignment: letters in fillable cells, a filler glyph
 * in blocked cells, spaces where nothing is assigned yet.
 */
import { describe, it, expect } from 'vitest'
import { letterGrid, renderGrid, BLOCKED_GLYPH } from '../src/render'
import { solve } from '../src/solver'
import type { Assignment } from '../src/types'
import { puzzleFrom, slotAt, CROSS, CORNER, ZIGZAG } from './helpers/grids'

describe('Segment 06: Render', () => {
  it('uses a full block for blocked cells', () => {
    expect(BLOCKED_GLYPH).toBe('█')
  })

  it('renders a solved grid', () => {
    const puzzle = puzzleFrom(CORNER, ['cat', 'tea', 'dog'])
    const assignment = solve(puzzle)!

    expect(renderGrid(puzzle, assignment)).toBe('c██\na██\ntea')
  })

  it('places an astral letter in a single cell', () => {
    const puzzle = puzzleFrom(CROSS, ['x😀y', 'p😀q'])
    const assignment = solve(puzzle)!

    expect(renderGrid(puzzle, assignment)).toBe('█x█\np😀q\n█y█')
  })

  it('renders a solved chain', () => {
    const puzzle = puzzleFrom(ZIGZAG, ['eab', 'bbb', 'cde', 'abc'])
    const assignment = solve(puzzle)!

    expect(renderGrid(puzzle, assignment).split('\n')).toEqual([
      'c██',
      'd██',
      'eab',
      '██b',
      '██b',
    ])
  })

  it('leaves unassigned fillable cells blank', () => {
    const puzzle = puzzleFrom(CORNER, ['cat'])
    const partial: Assignment = new Map([[slotAt(puzzle, 0, 0, 'down'), 'cat']])

    expect(letterGrid(puzzle, partial)).toEqual([
      ['c', null, null],
      ['a', null, null],
      ['t', null, null],
    ])
    expect(renderGrid(puzzle, partial)).toBe('c██\na██\nt  ')
  })

  it('renders the bare grid for an empty assignment', () => {
    const puzzle = puzzleFrom(CROSS, [])
    expect(renderGrid(puzzle, new Map())).toBe('█ █\n   \n█ █')
  })

  it('does not modify the assignment', () => {
    const puzzle = puzzleFrom(CROSS, ['cat', 'car'])
    const assignment = solve(puzzle)!
    const before = [...assignment.entries()]

    renderGrid(puzzle, assignment)

    expect([...assignment.entries()]).toEqual(before)
  })
})
