import type {
  Cell,
  ForcingPointer,
  GameStatus,
  GlobalIndex,
  Outcome,
  Player,
  Position,
} from '../types/game';
import type { MoveError } from './errors';

// Re-export types used in the engine interface
export type { Cell, ForcingPointer, GameStatus, Outcome, Player, Position };

/**
 * The BoardState interface for the engine's validators and mutators.
 * Every field is readonly: mutators return a new state and never write into
 * the arrays of the state they were given.
 */
export interface BoardState {
  /** 81 cells indexed by global index. */
  readonly cells: ReadonlyArray<Cell>;
  /** Nine sub-board outcomes indexed by sub-board id. */
  readonly subBoardOutcomes: ReadonlyArray<Outcome>;
  readonly metaOutcome: Outcome;
  readonly currentPlayer: Player;
  readonly forcing: ForcingPointer;
  readonly lastMove: GlobalIndex | null;
  readonly moveCount: number;
}

/**
 * Result of checking a move without applying it.
 */
export type ValidationResult = { valid: true } | { valid: false; error: MoveError };

/**
 * Result of applying a move. Move errors are returned rather than thrown so
 * callers decide whether to retry, end the episode or surface the error.
 */
export type MoveResult =
  | { readonly ok: true; readonly status: GameStatus }
  | { readonly ok: false; readonly error: MoveError };

/**
 * Plain in-memory snapshot of a board. Outcomes and the forcing pointer are
 * derived on restore, so only the primary facts are stored.
 */
export interface BoardSnapshot {
  /** 81 cells indexed by global index. */
  cells: Cell[];
  currentPlayer: Player;
  lastMove: GlobalIndex | null;
}
