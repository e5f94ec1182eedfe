import { PLAYERS, outcomeForWinner, type Cell, type Outcome, type Player } from '../types/game';

/**
 * The eight three-in-a-row index triples of a 3×3 board: rows, columns,
 * then the two diagonals.
 */
export const WIN_PATTERNS: ReadonlyArray<readonly [number, number, number]> = [
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],
  [0, 4, 8],
  [2, 4, 6],
];

/**
 * How to read a slot for three-in-a-row purposes. A slot can be filled
 * without being owned (a drawn sub-board on the meta-board).
 */
export interface SlotReader<T> {
  owner(slot: T): Player | null;
  isFilled(slot: T): boolean;
}

export const CELL_READER: SlotReader<Cell> = {
  owner: (cell) => cell,
  isFilled: (cell) => cell !== null,
};

export const OUTCOME_READER: SlotReader<Outcome> = {
  owner: (outcome) => (outcome === 'won_x' ? 'X' : outcome === 'won_o' ? 'O' : null),
  isFilled: (outcome) => outcome !== 'in_progress',
};

/**
 * First triple (in WIN_PATTERNS order) whose three slots are all owned by
 * `player`, or null.
 */
export function findWinningLine<T>(
  slots: readonly T[],
  player: Player,
  reader: SlotReader<T>
): readonly [number, number, number] | null {
  for (const pattern of WIN_PATTERNS) {
    if (pattern.every((i) => reader.owner(slots[i]) === player)) {
      return pattern;
    }
  }
  return null;
}

/**
 * Evaluate nine slots as a tic-tac-toe board.
 *
 * X is checked before O. Both lines cannot coexist under one-move-at-a-time
 * play; on a directly constructed board that carries both, the result is
 * 'won_x' as a fixed tie-break policy.
 */
export function detectOutcome<T>(slots: readonly T[], reader: SlotReader<T>): Outcome {
  // PLAYERS lists X first, so X wins when both players hold a line.
  for (const player of PLAYERS) {
    if (findWinningLine(slots, player, reader)) return outcomeForWinner(player);
  }
  if (slots.every((slot) => reader.isFilled(slot))) return 'drawn';
  return 'in_progress';
}

export function detectCellOutcome(cells: readonly Cell[]): Outcome {
  return detectOutcome(cells, CELL_READER);
}

export function detectMetaOutcome(subBoardOutcomes: readonly Outcome[]): Outcome {
  return detectOutcome(subBoardOutcomes, OUTCOME_READER);
}
