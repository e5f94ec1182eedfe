import {
  isTerminalOutcome,
  outcomeToStatus,
  type Cell,
  type ForcingPointer,
  type GameStatus,
  type GlobalIndex,
  type Outcome,
  type Player,
  type Position,
  type SubBoardId,
  BOARD_SIZE,
  SUB_BOARD_COUNT,
} from '../types/game';
import { debugLog, isEngineDebugEnabled } from '../utils/envFlags';
import { deserializeBoardState, serializeBoardState } from './contracts/snapshot';
import { EngineErrorCode, InvalidState } from './errors';
import { createInitialBoardState } from './initialState';
import { enumerateLegalMoves } from './moveGeneration';
import { mutateMove } from './mutators/MoveMutator';
import { positionFromIndex } from './positionCodec';
import { validateMove } from './validators/MoveValidator';
import type { BoardSnapshot, BoardState, MoveResult, ValidationResult } from './types';

/**
 * An Ultimate Tic-Tac-Toe board: the 81 cells, nine sub-board outcomes, the
 * meta outcome, the player to move and the forcing pointer.
 *
 * The board exclusively owns its state. The only mutation is `applyMove`;
 * every read returns either immutable values or fresh arrays, and `copy`
 * yields an independent board. Instances are not safe to share between
 * concurrent callers; give each game its own board.
 */
export class UltimateBoard {
  private state: BoardState;

  constructor(initialState: BoardState = createInitialBoardState()) {
    this.state = initialState;
  }

  /**
   * Restore a board from an in-memory snapshot. Outcomes and the forcing
   * pointer are recomputed from the cells; throws InvalidState on malformed
   * or inconsistent data.
   */
  static fromSnapshot(snapshot: unknown): UltimateBoard {
    return new UltimateBoard(deserializeBoardState(snapshot));
  }

  public toSnapshot(): BoardSnapshot {
    return serializeBoardState(this.state);
  }

  /**
   * Legal moves for the player to move, ordered by ascending global index.
   */
  public legalMoves(): Position[] {
    return enumerateLegalMoves(this.state);
  }

  public validateMove(position: Position): ValidationResult {
    return validateMove(this.state, position);
  }

  /**
   * Apply a move for the player to move. Move errors are returned, never
   * thrown; on failure the board is left unchanged.
   */
  public applyMove(position: Position): MoveResult {
    const validation = validateMove(this.state, position);
    if (!validation.valid) {
      return { ok: false, error: validation.error };
    }

    this.state = mutateMove(this.state, position);

    debugLog(isEngineDebugEnabled(), '[UltimateBoard.applyMove]', {
      index: position.index,
      subBoard: position.subBoard,
      subBoardOutcome: this.state.subBoardOutcomes[position.subBoard],
      metaOutcome: this.state.metaOutcome,
      forcing: this.state.forcing,
    });

    return { ok: true, status: this.status() };
  }

  public status(): GameStatus {
    return outcomeToStatus(this.state.metaOutcome);
  }

  public isTerminal(): boolean {
    return isTerminalOutcome(this.state.metaOutcome);
  }

  public currentPlayer(): Player {
    return this.state.currentPlayer;
  }

  public forcing(): ForcingPointer {
    return this.state.forcing;
  }

  /**
   * The sub-board the mover is constrained to, or null when there is no
   * constraint (opening move, or the target sub-board is terminal).
   */
  public forcedSubBoard(): SubBoardId | null {
    return this.state.forcing.kind === 'forced' ? this.state.forcing.subBoard : null;
  }

  public lastMove(): Position | null {
    return this.state.lastMove === null ? null : positionFromIndex(this.state.lastMove);
  }

  public moveCount(): number {
    return this.state.moveCount;
  }

  public cellAt(position: Position): Cell {
    return this.state.cells[position.index];
  }

  public subBoardOutcome(subBoard: SubBoardId): Outcome {
    const outcome = this.state.subBoardOutcomes[subBoard];
    if (outcome === undefined) {
      throw new InvalidState(
        EngineErrorCode.INTERNAL_ASSERTION_FAILED,
        `No sub-board with id ${subBoard}`,
        { subBoard, count: SUB_BOARD_COUNT },
        'UltimateBoard'
      );
    }
    return outcome;
  }

  /** Fresh array of the nine sub-board outcomes, indexed by sub-board id. */
  public subBoardOutcomes(): Outcome[] {
    return [...this.state.subBoardOutcomes];
  }

  public metaOutcome(): Outcome {
    return this.state.metaOutcome;
  }

  /**
   * Snapshot view of the grid as nine rows of nine cells. Each call builds
   * new arrays; writing to them never affects the board.
   */
  public renderMatrix(): Cell[][] {
    return Array.from({ length: BOARD_SIZE }, (_, row) =>
      this.state.cells.slice(row * BOARD_SIZE, (row + 1) * BOARD_SIZE)
    );
  }

  /** Occupied cells as (index, player) pairs in ascending index order. */
  public occupiedCells(): Array<{ index: GlobalIndex; player: Player }> {
    const occupied: Array<{ index: GlobalIndex; player: Player }> = [];
    this.state.cells.forEach((cell, index) => {
      if (cell !== null) occupied.push({ index, player: cell });
    });
    return occupied;
  }

  public copy(): UltimateBoard {
    return new UltimateBoard({
      ...this.state,
      cells: [...this.state.cells],
      subBoardOutcomes: [...this.state.subBoardOutcomes],
    });
  }
}
