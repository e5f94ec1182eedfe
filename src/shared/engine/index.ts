// =============================================================================
// RULES ENGINE - PUBLIC API
// =============================================================================
// This is the stable public API for the Ultimate Tic-Tac-Toe rules engine.
// Collaborators (environment wrapper, agents, match runner, CLI) should only
// import from this file.
//
// The free functions at the bottom are the narrow surface collaborators use:
// a board is created, queried and advanced only through them (or the
// equivalent UltimateBoard methods).
// =============================================================================

import type { Cell, GameStatus, Player, Position } from '../types/game';
import { UltimateBoard } from './UltimateBoard';
import type { MoveResult } from './types';

// =============================================================================
// CORE TYPES (from src/shared/types/game.ts)
// =============================================================================

export type {
  Cell,
  CellId,
  ForcingPointer,
  GameStatus,
  GlobalIndex,
  Outcome,
  Player,
  Position,
  StructuredPosition,
  SubBoardId,
  TerminalOutcome,
} from '../types/game';

export {
  BOARD_SIZE,
  CELL_COUNT,
  SUB_BOARD_COUNT,
  PLAYERS,
  otherPlayer,
  isTerminalOutcome,
  outcomeForWinner,
  outcomeWinner,
  outcomeToStatus,
} from '../types/game';

export type { BoardState, BoardSnapshot, MoveResult, ValidationResult } from './types';

// =============================================================================
// POSITION CODEC
// =============================================================================

export {
  globalToStructured,
  structuredToGlobal,
  positionFromIndex,
  positionFromParts,
  positionFromGrid,
  positionsEqual,
  subBoardIndices,
} from './positionCodec';

// =============================================================================
// OUTCOME DETECTION
// =============================================================================

export {
  WIN_PATTERNS,
  CELL_READER,
  OUTCOME_READER,
  detectOutcome,
  detectCellOutcome,
  detectMetaOutcome,
  findWinningLine,
} from './outcomeDetection';
export type { SlotReader } from './outcomeDetection';

// =============================================================================
// BOARD ENGINE
// =============================================================================

export { UltimateBoard } from './UltimateBoard';
export { createInitialBoardState } from './initialState';
export { enumerateLegalMoves, playableSubBoards, isLegalMove, resolveForcing } from './moveGeneration';
export { validateMove } from './validators/MoveValidator';
export { mutateMove } from './mutators/MoveMutator';
export {
  ZodBoardSnapshotSchema,
  validateSnapshot,
  serializeBoardState,
  deserializeBoardState,
} from './contracts/snapshot';

// =============================================================================
// ERRORS
// =============================================================================

export {
  EngineError,
  EngineErrorCode,
  RulesViolation,
  InvalidState,
  BoardConstraintViolation,
  OutOfRangePosition,
  InvalidMove,
  GameAlreadyOver,
  isEngineError,
  isRulesViolation,
  isInvalidState,
  isBoardConstraintViolation,
  isOutOfRangePosition,
  isInvalidMove,
  isGameAlreadyOver,
  isMoveError,
  wrapEngineError,
} from './errors';
export type { MoveError, InvalidMoveReason, EngineErrorJSON } from './errors';

// =============================================================================
// NOTATION
// =============================================================================

export { formatPosition, parsePosition, formatBoard, formatStatus, formatMoveList } from './notation';

// =============================================================================
// COLLABORATOR SURFACE
// =============================================================================

export function newBoard(): UltimateBoard {
  return new UltimateBoard();
}

export function legalMoves(board: UltimateBoard): Position[] {
  return board.legalMoves();
}

export function applyMove(board: UltimateBoard, position: Position): MoveResult {
  return board.applyMove(position);
}

export function status(board: UltimateBoard): GameStatus {
  return board.status();
}

export function renderMatrix(board: UltimateBoard): Cell[][] {
  return board.renderMatrix();
}

export function currentPlayer(board: UltimateBoard): Player {
  return board.currentPlayer();
}

export function copyBoard(board: UltimateBoard): UltimateBoard {
  return board.copy();
}
