import { CELL_COUNT, SUB_BOARD_COUNT, type Cell, type Outcome } from '../types/game';
import type { BoardState } from './types';

/**
 * Creates a pristine initial BoardState: all cells empty, every outcome in
 * progress, no forcing constraint and X to move.
 */
export function createInitialBoardState(): BoardState {
  return {
    cells: new Array<Cell>(CELL_COUNT).fill(null),
    subBoardOutcomes: new Array<Outcome>(SUB_BOARD_COUNT).fill('in_progress'),
    metaOutcome: 'in_progress',
    currentPlayer: 'X',
    forcing: { kind: 'unset' },
    lastMove: null,
    moveCount: 0,
  };
}
