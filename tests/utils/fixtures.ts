/**
 * Test Fixtures and Utilities
 * Common positions, snapshots and helpers for engine and environment tests.
 */

import {
  CELL_COUNT,
  UltimateBoard,
  positionFromParts,
  structuredToGlobal,
  type BoardSnapshot,
  type Cell,
  type GlobalIndex,
  type Player,
  type Position,
} from '../../src/shared/engine';

/**
 * Position helper - sub-board id and local cell id, both 0–8.
 */
export function pos(subBoard: number, cell: number): Position {
  return positionFromParts(subBoard, cell);
}

/**
 * Global index helper - sub-board id and local cell id, both 0–8.
 */
export function g(subBoard: number, cell: number): GlobalIndex {
  return structuredToGlobal(subBoard, cell);
}

export interface SnapshotLayout {
  x: GlobalIndex[];
  o: GlobalIndex[];
  currentPlayer: Player;
  lastMove: GlobalIndex | null;
}

/**
 * Build a snapshot from lists of occupied global indices.
 */
export function snapshotFrom(layout: SnapshotLayout): BoardSnapshot {
  const cells = new Array<Cell>(CELL_COUNT).fill(null);
  for (const index of layout.x) cells[index] = 'X';
  for (const index of layout.o) cells[index] = 'O';
  return { cells, currentPlayer: layout.currentPlayer, lastMove: layout.lastMove };
}

export function boardFrom(layout: SnapshotLayout): UltimateBoard {
  return UltimateBoard.fromSnapshot(snapshotFrom(layout));
}

/**
 * Apply a sequence of moves, failing the test on the first rejected one.
 */
export function playMoves(board: UltimateBoard, moves: Position[]): UltimateBoard {
  for (const move of moves) {
    const result = board.applyMove(move);
    if (!result.ok) {
      throw new Error(`Fixture move ${move.index} rejected: ${result.error.message}`);
    }
  }
  return board;
}

// ═══════════════════════════════════════════════════════════════════════════
// Named positions
// ═══════════════════════════════════════════════════════════════════════════

/**
 * X holds the top row of sub-board 0 (indices 0, 1, 2), O holds 9 and 10.
 * O to move, sent to sub-board 2 by X's last move at index 2.
 */
export const SUB_BOARD_0_WON_BY_X: SnapshotLayout = {
  x: [0, 1, 2],
  o: [9, 10],
  currentPlayer: 'O',
  lastMove: 2,
};

/**
 * Legal move sequence ending with X completing the top row of sub-board 0.
 * Afterwards O is forced into sub-board 2.
 */
export const X_WINS_SUB_BOARD_0_LINE: Position[] = [
  pos(4, 3),
  pos(3, 0),
  pos(0, 0),
  pos(0, 3),
  pos(3, 1),
  pos(1, 0),
  pos(0, 1),
  pos(1, 4),
  pos(4, 2),
  pos(2, 0),
  pos(0, 2),
];

/**
 * Sub-board 0 filled without a line:
 *
 *   X O X
 *   X O O
 *   O X X
 *
 * O to move; X's last move at local cell 0 points at the drawn sub-board,
 * so O may play anywhere else.
 */
export const SUB_BOARD_0_DRAWN: SnapshotLayout = {
  x: [g(0, 0), g(0, 2), g(0, 3), g(0, 7), g(0, 8)],
  o: [g(0, 1), g(0, 4), g(0, 5), g(0, 6)],
  currentPlayer: 'O',
  lastMove: g(0, 0),
};

/**
 * X has won sub-boards 0, 1 and 2 (the top meta row) with each sub-board's
 * top row. O has nine scattered stones in sub-boards 3–7. X to move.
 */
export const META_WON_BY_X: SnapshotLayout = {
  x: [0, 1, 2].flatMap((sub) => [g(sub, 0), g(sub, 1), g(sub, 2)]),
  o: [g(3, 0), g(3, 1), g(4, 0), g(4, 1), g(5, 0), g(5, 1), g(6, 0), g(6, 1), g(7, 0)],
  currentPlayer: 'X',
  lastMove: g(7, 0),
};

/**
 * Sub-board 0 contains both X's top row and O's middle row. X to move,
 * sent to sub-board 5 by O's last move.
 */
export const BOTH_LINES_IN_SUB_BOARD_0: SnapshotLayout = {
  x: [g(0, 0), g(0, 1), g(0, 2)],
  o: [g(0, 3), g(0, 4), g(0, 5)],
  currentPlayer: 'X',
  lastMove: g(0, 5),
};

/**
 * X holds sub-boards 0 and 1 and two cells of sub-board 2, and is sent to
 * sub-board 2. Playing its local cell 2 (index 8) wins the game.
 */
export const X_WINS_META_IN_ONE: SnapshotLayout = {
  x: [g(0, 0), g(0, 1), g(0, 2), g(1, 0), g(1, 1), g(1, 2), g(2, 0), g(2, 1)],
  o: [g(3, 0), g(3, 1), g(4, 0), g(4, 1), g(5, 0), g(5, 1), g(6, 0), g(6, 2)],
  currentPlayer: 'X',
  lastMove: g(6, 2),
};

/**
 * O holds sub-boards 3 and 4 and cells 0 and 1 of sub-board 5. X is sent to
 * sub-board 1; an X move at its local cell 5 sends O to sub-board 5, where
 * O's lowest legal move (index 35) wins the game.
 */
export const O_WINS_META_AFTER_X: SnapshotLayout = {
  x: [g(0, 0), g(0, 1), g(1, 0), g(1, 1), g(2, 0), g(2, 1), g(6, 0), g(7, 0)],
  o: [g(3, 0), g(3, 1), g(3, 2), g(4, 0), g(4, 1), g(4, 2), g(5, 0), g(5, 1)],
  currentPlayer: 'X',
  lastMove: g(5, 1),
};

/**
 * Eight sub-boards closed by their top rows, owned in the meta pattern
 *
 *   X O X
 *   X O O
 *   O X .
 *
 * Sub-board 8 holds X at cells 0, 1 and O at cells 3, 8; X is sent there.
 * Playing its local cell 2 (index 62) closes the last sub-board for X
 * without completing a meta line, so the game is drawn.
 */
export const X_DRAWS_META_IN_ONE: SnapshotLayout = {
  x: [
    ...[0, 2, 3, 7].flatMap((sub) => [g(sub, 0), g(sub, 1), g(sub, 2)]),
    g(8, 0),
    g(8, 1),
  ],
  o: [...[1, 4, 5, 6].flatMap((sub) => [g(sub, 0), g(sub, 1), g(sub, 2)]), g(8, 3), g(8, 8)],
  currentPlayer: 'X',
  lastMove: g(8, 8),
};
