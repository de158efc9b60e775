/**
 * Consolidated error system for the temporal game tooling.
 *
 * All error classes extend TemporalGameError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import them from
 * the module they use.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const TemporalGameErrorCode = {
  // Constraint language
  MALFORMED_CONSTRAINT: 'MALFORMED_CONSTRAINT',
  INVALID_CONSTRAINT: 'INVALID_CONSTRAINT',

  // Game files
  MALFORMED_GAME_LINE: 'MALFORMED_GAME_LINE',

  // Game model & validation
  DUPLICATE_NODE: 'DUPLICATE_NODE',
  INVALID_NODE: 'INVALID_NODE',
  DANGLING_EDGE_REFERENCE: 'DANGLING_EDGE_REFERENCE',
  EMPTY_GAME: 'EMPTY_GAME',
  INVALID_OWNER: 'INVALID_OWNER',

  // Synthesis & configuration
  INVALID_SHAPE: 'INVALID_SHAPE',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const

export type TemporalGameErrorCode = (typeof TemporalGameErrorCode)[keyof typeof TemporalGameErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class TemporalGameError extends Error {
  readonly code: TemporalGameErrorCode

  constructor(code: TemporalGameErrorCode, message: string) {
    super(message)
    this.name = 'TemporalGameError'
    this.code = code
  }
}

// ============================================================================
// Constraint Errors
// ============================================================================

/** Polish text that matches no production of the constraint grammar. */
export class MalformedConstraintError extends TemporalGameError {
  readonly input: string

  constructor(input: string, message: string) {
    super(TemporalGameErrorCode.MALFORMED_CONSTRAINT, message)
    this.name = 'MalformedConstraintError'
    this.input = input
  }
}

/** A constructor was handed values outside a constraint's invariants. */
export class InvalidConstraintError extends TemporalGameError {
  constructor(message: string) {
    super(TemporalGameErrorCode.INVALID_CONSTRAINT, message)
    this.name = 'InvalidConstraintError'
  }
}

// ============================================================================
// Game File Errors
// ============================================================================

export class MalformedGameLineError extends TemporalGameError {
  readonly line: number
  readonly text: string

  constructor(line: number, text: string, message: string) {
    super(TemporalGameErrorCode.MALFORMED_GAME_LINE, message)
    this.name = 'MalformedGameLineError'
    this.line = line
    this.text = text
  }
}

// ============================================================================
// Game Model Errors
// ============================================================================

export class DuplicateNodeError extends TemporalGameError {
  constructor(message: string) {
    super(TemporalGameErrorCode.DUPLICATE_NODE, message)
    this.name = 'DuplicateNodeError'
  }
}

/** An id or label that the game file formats cannot carry. */
export class InvalidNodeError extends TemporalGameError {
  constructor(message: string) {
    super(TemporalGameErrorCode.INVALID_NODE, message)
    this.name = 'InvalidNodeError'
  }
}

// ============================================================================
// Synthesis & Configuration Errors
// ============================================================================

export class InvalidShapeError extends TemporalGameError {
  constructor(message: string) {
    super(TemporalGameErrorCode.INVALID_SHAPE, message)
    this.name = 'InvalidShapeError'
  }
}

export class InvalidConfigError extends TemporalGameError {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(TemporalGameErrorCode.INVALID_CONFIG, message)
    this.name = 'InvalidConfigError'
    this.issues = issues
  }
}
