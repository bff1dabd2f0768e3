/**
 * Consolidated error system for crossword-csp.
 *
 * All error classes extend CrosswordError, which carries a typed error code.
 * An unsatisfiable puzzle is a result, not an error, and never appears here.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const CrosswordErrorCode = {
  // Puzzle construction and configuration
  VALIDATION: 'VALIDATION',

  // Core lookups
  NOT_FOUND: 'NOT_FOUND',
} as const

export type CrosswordErrorCode = (typeof CrosswordErrorCode)[keyof typeof CrosswordErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class CrosswordError extends Error {
  readonly code: CrosswordErrorCode

  constructor(code: CrosswordErrorCode, message: string) {
    super(message)
    this.name = 'CrosswordError'
    this.code = code
  }
}

// ============================================================================
// Subclasses
// ============================================================================

export class ValidationError extends CrosswordError {
  constructor(message: string) {
    super(CrosswordErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

export class NotFoundError extends CrosswordError {
  constructor(message: string) {
    super(CrosswordErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}
