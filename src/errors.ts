/**
 * Consolidated error system for slotplanner.
 *
 * All error classes extend SlotplannerError, which carries a typed error code.
 * Caller-input problems are raised before any scheduling work starts;
 * a task falling short of its duration is a result, never an error.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const SlotplannerErrorCode = {
  // Input validation
  VALIDATION: 'VALIDATION',
  PARSE_ERROR: 'PARSE_ERROR',
  INVALID_RANGE: 'INVALID_RANGE',
  EMPTY_HORIZON: 'EMPTY_HORIZON',

  // Engine
  INVARIANT_VIOLATION: 'INVARIANT_VIOLATION',
} as const

export type SlotplannerErrorCode = (typeof SlotplannerErrorCode)[keyof typeof SlotplannerErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class SlotplannerError extends Error {
  readonly code: SlotplannerErrorCode

  constructor(code: SlotplannerErrorCode, message: string) {
    super(message)
    this.name = 'SlotplannerError'
    this.code = code
  }
}

// ============================================================================
// Input Errors
// ============================================================================

export class ValidationError extends SlotplannerError {
  constructor(message: string) {
    super(SlotplannerErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

export class ParseError extends SlotplannerError {
  constructor(message: string) {
    super(SlotplannerErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

export class InvalidRangeError extends SlotplannerError {
  constructor(message: string) {
    super(SlotplannerErrorCode.INVALID_RANGE, message)
    this.name = 'InvalidRangeError'
  }
}

export class EmptyHorizonError extends SlotplannerError {
  constructor(message: string) {
    super(SlotplannerErrorCode.EMPTY_HORIZON, message)
    this.name = 'EmptyHorizonError'
  }
}

// ============================================================================
// Engine Errors
// ============================================================================

/** An allocation invariant broke. Always a bug in the engine, never recovered from. */
export class InvariantViolationError extends SlotplannerError {
  constructor(message: string) {
    super(SlotplannerErrorCode.INVARIANT_VIOLATION, message)
    this.name = 'InvariantViolationError'
  }
}
