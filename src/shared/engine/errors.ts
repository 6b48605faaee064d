/**
 * Engine Domain Errors - Structured error types for the solver engine layer
 *
 * The search itself cannot fail: a board with no legal jump is a normal dead
 * end. These errors cover the inputs handed to the engine (starting holes,
 * peg masks, text boards) and arena lookups.
 *
 * Error Categories:
 * - **BoardConstraintViolation**: positions or text boards that do not fit the triangle
 * - **InvalidState**: peg masks or board indices the engine cannot work with
 *
 * Usage:
 * ```typescript
 * import { BoardConstraintViolation, EngineErrorCode } from './errors';
 *
 * throw new BoardConstraintViolation(
 *   EngineErrorCode.BOARD_INVALID_POSITION,
 *   'Position is outside the triangle',
 *   { row: 6, position: 1 }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - BOARD_*: Board geometry and notation issues
 * - STATE_*: Peg masks and search tree lookups
 * - INTERNAL_*: Bugs
 */
export enum EngineErrorCode {
  /** Triangle position outside rows 1..5 or positions 1..row */
  BOARD_INVALID_POSITION = 'BOARD_INVALID_POSITION',
  /** Text board that does not describe the five triangle rows */
  BOARD_INVALID_NOTATION = 'BOARD_INVALID_NOTATION',

  /** Value that is not a 15-bit peg mask */
  STATE_INVALID_PEG_MASK = 'STATE_INVALID_PEG_MASK',
  /** Board index not present in the search tree */
  STATE_BOARD_NOT_FOUND = 'STATE_BOARD_NOT_FOUND',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error codes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  BOARD_: 'Board geometry/notation constraint violation',
  STATE_: 'Invalid board state or search tree lookup',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'Notation', 'SearchTree') */
  readonly domain: string;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Error for positions and text boards that do not fit the triangle.
 *
 * Examples:
 * - Starting hole at row 6
 * - Text board with four tokens on row 3
 */
export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

/**
 * Error for values the engine cannot treat as a board.
 *
 * Examples:
 * - Negative or fractional peg mask
 * - Arena index past the last board
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}
