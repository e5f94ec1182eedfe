import { BOARD_SIZE, type GameStatus, type Position } from '../types/game';
import { OutOfRangePosition } from './errors';
import { positionFromIndex } from './positionCodec';
import type { UltimateBoard } from './UltimateBoard';

/**
 * Shared position/board notation helpers.
 *
 * These utilities provide a lightweight, human-readable notation for
 * debugging, logging and console display. Positions use chess-like
 * coordinates over the full 9×9 grid: file a–i is the global column and
 * rank 1–9 is the global row + 1, so index 0 is a1 and index 80 is i9.
 */

const FILES = 'abcdefghi';

export function formatPosition(pos: Position): string {
  return `${FILES[pos.col]}${pos.row + 1}`;
}

/**
 * Parse a position typed by a human: algebraic form ("e5", case-insensitive)
 * or a bare global index ("40"). Throws OutOfRangePosition for anything
 * that does not name one of the 81 cells.
 */
export function parsePosition(text: string): Position {
  const trimmed = text.trim().toLowerCase();

  if (/^\d+$/.test(trimmed)) {
    return positionFromIndex(Number(trimmed));
  }

  const match = /^([a-i])([1-9])$/.exec(trimmed);
  if (!match) {
    throw new OutOfRangePosition('notation', text, { min: 0, max: BOARD_SIZE * BOARD_SIZE - 1 });
  }

  const col = FILES.indexOf(match[1]);
  const row = Number(match[2]) - 1;
  return positionFromIndex(row * BOARD_SIZE + col);
}

/**
 * Render the board as text: '.' for empty cells, single spaces inside a
 * sub-board, " | " between sub-boards and a 23-dash rule between
 * sub-board rows.
 *
 * ```
 * X . . | . . . | . . .
 * . . . | . O . | . . .
 * ...
 * -----------------------
 * ```
 */
export function formatBoard(board: UltimateBoard): string {
  const lines: string[] = [];
  const matrix = board.renderMatrix();

  matrix.forEach((row, rowIndex) => {
    const groups: string[] = [];
    for (let start = 0; start < BOARD_SIZE; start += 3) {
      groups.push(
        row
          .slice(start, start + 3)
          .map((cell) => cell ?? '.')
          .join(' ')
      );
    }
    lines.push(groups.join(' | '));
    if (rowIndex % 3 === 2 && rowIndex < BOARD_SIZE - 1) {
      lines.push('-'.repeat(23));
    }
  });

  return lines.join('\n');
}

export function formatStatus(status: GameStatus): string {
  switch (status.kind) {
    case 'in_progress':
      return 'in progress';
    case 'drawn':
      return 'draw';
    case 'won':
      return `${status.winner} wins`;
  }
}

/**
 * Format a list of global indices as a compact move list, e.g. "e5 a1 c3".
 */
export function formatMoveList(indices: readonly number[]): string {
  return indices.map((index) => formatPosition(positionFromIndex(index))).join(' ');
}
