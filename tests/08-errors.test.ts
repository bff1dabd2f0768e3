/**
 * Segment 08: Error System Tests
 *
 * CrosswordError base class, error codes and the subclasses thrown by
 * puzzle construction, configuration and lookups.
 */
import { describe, it, expect } from 'vitest'
import {
  CrosswordError,
  CrosswordErrorCode,
  ValidationError,
  NotFoundError,
} from '../src/errors'

describe('Segment 08: Error System', () => {
  describe('CrosswordError base class', () => {
    it('constructor sets code and message', () => {
      const err = new CrosswordError(CrosswordErrorCode.NOT_FOUND, 'test message')
      expect(err.code).toBe('NOT_FOUND')
      expect(err.message).toBe('test message')
    })

    it('is instanceof Error', () => {
      const err = new CrosswordError(CrosswordErrorCode.VALIDATION, 'x')
      expect(err).toBeInstanceOf(Error)
      expect(err).toBeInstanceOf(CrosswordError)
    })

    it('name property is CrosswordError', () => {
      expect(new CrosswordError(CrosswordErrorCode.VALIDATION, 'x').name).toBe('CrosswordError')
    })
  })

  describe('Error codes', () => {
    it('lists every code', () => {
      expect(Object.values(CrosswordErrorCode)).toEqual(['VALIDATION', 'NOT_FOUND'])
    })
  })

  describe('Subclasses', () => {
    it('ValidationError carries the VALIDATION code', () => {
      const err = new ValidationError('bad input')
      expect(err).toBeInstanceOf(CrosswordError)
      expect(err.code).toBe(CrosswordErrorCode.VALIDATION)
      expect(err.name).toBe('ValidationError')
      expect(err.message).toBe('bad input')
    })

    it('NotFoundError carries the NOT_FOUND code', () => {
      const err = new NotFoundError('missing')
      expect(err).toBeInstanceOf(CrosswordError)
      expect(err.code).toBe(CrosswordErrorCode.NOT_FOUND)
      expect(err.name).toBe('NotFoundError')
    })
  })
})
