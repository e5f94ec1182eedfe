import {
  CELL_COUNT,
  SUB_BOARD_COUNT,
  type ForcingPointer,
  type Outcome,
  type Position,
  type SubBoardId,
} from '../types/game';
import { positionFromIndex } from './positionCodec';
import type { BoardState } from './types';

/**
 * Pointer the next mover is bound by after a move into local cell `target`:
 * `forced` when that sub-board is still open, `free` when it is terminal.
 */
export function resolveForcing(
  target: SubBoardId,
  subBoardOutcomes: ReadonlyArray<Outcome>
): ForcingPointer {
  return subBoardOutcomes[target] === 'in_progress'
    ? { kind: 'forced', subBoard: target }
    : { kind: 'free', target };
}

/**
 * Sub-boards the current mover may place into, ascending. Empty once the
 * meta-board is terminal.
 */
export function playableSubBoards(state: BoardState): SubBoardId[] {
  if (state.metaOutcome !== 'in_progress') {
    return [];
  }

  if (state.forcing.kind === 'forced') {
    return [state.forcing.subBoard];
  }

  const open: SubBoardId[] = [];
  for (let id = 0; id < SUB_BOARD_COUNT; id++) {
    if (state.subBoardOutcomes[id] === 'in_progress') {
      open.push(id);
    }
  }
  return open;
}

/**
 * Enumerate every legal move for the current mover, ordered by ascending
 * global index.
 *
 * - No move played yet: all 81 cells.
 * - Forced: the empty cells of the forced sub-board.
 * - Free (the target sub-board is terminal): the empty cells of every
 *   in-progress sub-board.
 * - Terminal game: nothing.
 */
export function enumerateLegalMoves(state: BoardState): Position[] {
  const playable = new Set(playableSubBoards(state));
  if (playable.size === 0) {
    return [];
  }

  const moves: Position[] = [];
  for (let index = 0; index < CELL_COUNT; index++) {
    if (state.cells[index] !== null) continue;
    const position = positionFromIndex(index);
    if (playable.has(position.subBoard)) {
      moves.push(position);
    }
  }
  return moves;
}

/**
 * Cheap membership test equivalent to
 * `enumerateLegalMoves(state).some(p => p.index === position.index)`.
 */
export function isLegalMove(state: BoardState, position: Position): boolean {
  return (
    state.cells[position.index] === null && playableSubBoards(state).includes(position.subBoard)
  );
}
