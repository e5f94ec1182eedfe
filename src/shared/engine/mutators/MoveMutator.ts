import { otherPlayer, type Position } from '../../types/game';
import { detectCellOutcome, detectMetaOutcome } from '../outcomeDetection';
import { resolveForcing } from '../moveGeneration';
import { subBoardIndices } from '../positionCodec';
import type { BoardState } from '../types';

/**
 * Apply an already-validated move and return the next state.
 *
 * Exactly one cell goes from empty to occupied. Only the sub-board that was
 * played into is re-evaluated, so every other sub-board outcome is carried
 * over untouched; the meta outcome is then re-derived from the nine
 * sub-board outcomes. The input state is never written to.
 */
export function mutateMove(state: BoardState, position: Position): BoardState {
  const cells = [...state.cells];
  cells[position.index] = state.currentPlayer;

  const subBoardOutcomes = [...state.subBoardOutcomes];
  const subBoardCells = subBoardIndices(position.subBoard).map((index) => cells[index]);
  subBoardOutcomes[position.subBoard] = detectCellOutcome(subBoardCells);

  return {
    cells,
    subBoardOutcomes,
    metaOutcome: detectMetaOutcome(subBoardOutcomes),
    currentPlayer: otherPlayer(state.currentPlayer),
    // The local cell just played names the sub-board the opponent is sent to.
    forcing: resolveForcing(position.cell, subBoardOutcomes),
    lastMove: position.index,
    moveCount: state.moveCount + 1,
  };
}
