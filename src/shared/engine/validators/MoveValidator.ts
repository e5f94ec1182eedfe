import { outcomeToStatus, type Position } from '../../types/game';
import { GameAlreadyOver, InvalidMove } from '../errors';
import { isLegalMove } from '../moveGeneration';
import type { BoardState, ValidationResult } from '../types';

/**
 * Validate a prospective move against the current state without mutating it.
 *
 * A terminal game is reported first, so a move into an occupied cell after
 * the game ended yields GameAlreadyOver rather than InvalidMove. For an
 * illegal move the reason is diagnostic only: the legal-move set is the
 * single authority on legality.
 */
export function validateMove(state: BoardState, position: Position): ValidationResult {
  if (state.metaOutcome !== 'in_progress') {
    return { valid: false, error: new GameAlreadyOver(outcomeToStatus(state.metaOutcome)) };
  }

  if (isLegalMove(state, position)) {
    return { valid: true };
  }

  if (state.cells[position.index] !== null) {
    return { valid: false, error: new InvalidMove(position, 'cell_occupied') };
  }

  if (state.subBoardOutcomes[position.subBoard] !== 'in_progress') {
    return {
      valid: false,
      error: new InvalidMove(position, 'sub_board_closed', {
        outcome: state.subBoardOutcomes[position.subBoard],
      }),
    };
  }

  return {
    valid: false,
    error: new InvalidMove(position, 'wrong_sub_board', {
      forcedSubBoard: state.forcing.kind === 'forced' ? state.forcing.subBoard : null,
    }),
  };
}
