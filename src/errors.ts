/**
 * Consolidated error system for slotwise.
 *
 * All error classes extend SlotwiseError, which carries a typed error code.
 * None of these are thrown from the packing core: it degrades to a smaller
 * schedule instead. They surface from parsing (wrapped in a Result), from
 * collaborators, and from misconfiguration at construction time.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const SlotwiseErrorCode = {
  // Time & date, JSON extraction
  PARSE_ERROR: 'PARSE_ERROR',

  // Inputs and construction
  VALIDATION: 'VALIDATION',
  CONFIGURATION: 'CONFIGURATION',

  // Profile store
  NOT_FOUND: 'NOT_FOUND',
  INVALID_DATA: 'INVALID_DATA',

  // Reorder collaborator
  REORDER_FAILED: 'REORDER_FAILED',
} as const

export type SlotwiseErrorCode = (typeof SlotwiseErrorCode)[keyof typeof SlotwiseErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class SlotwiseError extends Error {
  readonly code: SlotwiseErrorCode

  constructor(code: SlotwiseErrorCode, message: string) {
    super(message)
    this.name = 'SlotwiseError'
    this.code = code
  }
}

// ============================================================================
// Parsing & Validation
// ============================================================================

export class ParseError extends SlotwiseError {
  constructor(message: string) {
    super(SlotwiseErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

export class ValidationError extends SlotwiseError {
  constructor(message: string) {
    super(SlotwiseErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

export class ConfigurationError extends SlotwiseError {
  constructor(message: string) {
    super(SlotwiseErrorCode.CONFIGURATION, message)
    this.name = 'ConfigurationError'
  }
}

// ============================================================================
// Profile Store Errors
// ============================================================================

export class NotFoundError extends SlotwiseError {
  constructor(message: string) {
    super(SlotwiseErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class InvalidDataError extends SlotwiseError {
  constructor(message: string) {
    super(SlotwiseErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

// ============================================================================
// Reorder Errors
// ============================================================================

export class ReorderError extends SlotwiseError {
  constructor(message: string) {
    super(SlotwiseErrorCode.REORDER_FAILED, message)
    this.name = 'ReorderError'
  }
}
