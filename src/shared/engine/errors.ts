/**
 * Engine Domain Errors - Structured error types for the rules engine layer
 *
 * This module provides consistent error types for engine-level errors that occur
 * during position construction, move validation and snapshot restoration.
 *
 * Error Categories:
 * - **RulesViolation**: Moves that are not legal in the current position
 * - **InvalidState**: Malformed or self-contradictory board state
 * - **BoardConstraintViolation**: Coordinates outside the 9×9 geometry
 *
 * Usage:
 * ```typescript
 * import { OutOfRangePosition, isMoveError } from './errors';
 *
 * // Thrown at construction time, never at apply time
 * throw new OutOfRangePosition('index', 81, { min: 0, max: 80 });
 *
 * // Returned (not thrown) by UltimateBoard.applyMove
 * const result = board.applyMove(position);
 * if (!result.ok && isInvalidMove(result.error)) {
 *   console.log(result.error.reason);
 * }
 * ```
 *
 * @module EngineErrors
 */

import type { GameStatus, Position } from '../types/game';

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - RULES_*: Move legality violations
 * - STATE_*: Board state corruption/inconsistency
 * - BOARD_*: Board geometry issues
 * - INTERNAL_*: Engine bugs
 */
export enum EngineErrorCode {
  // Rules Violations
  /** Position is well-formed but not currently a legal move */
  RULES_INVALID_MOVE = 'RULES_INVALID_MOVE',
  /** A move was attempted after the meta-board reached a terminal outcome */
  RULES_GAME_ALREADY_OVER = 'RULES_GAME_ALREADY_OVER',
  /** A self-play step was requested while the opponent is to move */
  RULES_NOT_AGENT_TURN = 'RULES_NOT_AGENT_TURN',

  // State Errors
  /** Snapshot failed schema validation */
  STATE_MALFORMED_SNAPSHOT = 'STATE_MALFORMED_SNAPSHOT',
  /** Snapshot is well-typed but cannot arise from legal play */
  STATE_INCONSISTENT_SNAPSHOT = 'STATE_INCONSISTENT_SNAPSHOT',
  /** A policy was asked for a move with no legal moves available */
  STATE_NO_LEGAL_MOVES = 'STATE_NO_LEGAL_MOVES',

  // Board Constraint Violations
  /** Index or coordinate outside its valid range */
  BOARD_POSITION_OUT_OF_RANGE = 'BOARD_POSITION_OUT_OF_RANGE',

  // Internal Errors
  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error code prefixes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  RULES_: 'Game rule violation',
  STATE_: 'Corrupted or unexpected board state',
  BOARD_: 'Board geometry constraint violation',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 *
 * Provides:
 * - Structured error code for programmatic handling
 * - Context for debugging
 * - Domain indicator for error routing
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'PositionCodec', 'MoveValidator') */
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

  /** Serialize to a JSON-safe object for logging/debugging */
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
// CATEGORY CLASSES
// =============================================================================

/**
 * Error for moves that break the rules in the current position.
 */
export class RulesViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Rules'
  ) {
    super(code, message, context, domain);
    this.name = 'RulesViolation';
    Object.setPrototypeOf(this, RulesViolation.prototype);
  }
}

/**
 * Error for malformed or self-contradictory board state.
 *
 * Thrown when restoring a snapshot that fails validation, or when a caller
 * asks for something the current state cannot provide.
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

/**
 * Error for board geometry violations.
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

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * An index or coordinate outside its valid range. Raised when a Position is
 * built, so a constructed Position is always well-formed.
 */
export class OutOfRangePosition extends BoardConstraintViolation {
  readonly field: string;
  /** The rejected number, or the rejected text for unreadable notation. */
  readonly value: number | string;

  constructor(field: string, value: number | string, range: { min: number; max: number }) {
    super(
      EngineErrorCode.BOARD_POSITION_OUT_OF_RANGE,
      typeof value === 'string'
        ? `${field} must be a1-i9 or an index in [${range.min}, ${range.max}], got "${value}"`
        : `${field} must be an integer in [${range.min}, ${range.max}], got ${value}`,
      { field, value, ...range },
      'PositionCodec'
    );
    this.name = 'OutOfRangePosition';
    this.field = field;
    this.value = value;
    Object.setPrototypeOf(this, OutOfRangePosition.prototype);
  }
}

export type InvalidMoveReason = 'cell_occupied' | 'sub_board_closed' | 'wrong_sub_board';

/**
 * A well-formed position that is not in the current legal-move set.
 */
export class InvalidMove extends RulesViolation {
  readonly position: Position;
  readonly reason: InvalidMoveReason;

  constructor(position: Position, reason: InvalidMoveReason, context: Record<string, unknown> = {}) {
    super(
      EngineErrorCode.RULES_INVALID_MOVE,
      `Invalid move at index ${position.index} (sub-board ${position.subBoard}, cell ${position.cell}): ${reason}`,
      { index: position.index, subBoard: position.subBoard, cell: position.cell, reason, ...context },
      'MoveValidator'
    );
    this.name = 'InvalidMove';
    this.position = position;
    this.reason = reason;
    Object.setPrototypeOf(this, InvalidMove.prototype);
  }
}

/**
 * Any move attempted once the meta-board outcome is terminal.
 */
export class GameAlreadyOver extends RulesViolation {
  readonly status: GameStatus;

  constructor(status: GameStatus) {
    super(
      EngineErrorCode.RULES_GAME_ALREADY_OVER,
      'Cannot make move: game is already over',
      { status },
      'MoveValidator'
    );
    this.name = 'GameAlreadyOver';
    this.status = status;
    Object.setPrototypeOf(this, GameAlreadyOver.prototype);
  }
}

/** The two errors apply-move can report. */
export type MoveError = InvalidMove | GameAlreadyOver;

// =============================================================================
// TYPE GUARDS
// =============================================================================

/**
 * Check if an error is an EngineError.
 */
export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isRulesViolation(error: unknown): error is RulesViolation {
  return error instanceof RulesViolation;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}

export function isOutOfRangePosition(error: unknown): error is OutOfRangePosition {
  return error instanceof OutOfRangePosition;
}

export function isInvalidMove(error: unknown): error is InvalidMove {
  return error instanceof InvalidMove;
}

export function isGameAlreadyOver(error: unknown): error is GameAlreadyOver {
  return error instanceof GameAlreadyOver;
}

export function isMoveError(error: unknown): error is MoveError {
  return isInvalidMove(error) || isGameAlreadyOver(error);
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
