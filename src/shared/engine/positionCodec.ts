import {
  BOARD_SIZE,
  CELL_COUNT,
  SUB_BOARD_COUNT,
  type CellId,
  type GlobalIndex,
  type Position,
  type StructuredPosition,
  type SubBoardId,
} from '../types/game';
import { OutOfRangePosition } from './errors';

/**
 * Position codec: the fixed mapping between a flat global index (0–80,
 * row-major over the 9×9 grid) and its structured form.
 *
 *   row   = ⌊subBoard / 3⌋ · 3 + ⌊cell / 3⌋
 *   col   = (subBoard mod 3) · 3 + (cell mod 3)
 *   index = row · 9 + col
 *
 * Every other component addresses cells through this mapping, so it must not
 * change. All functions here are pure.
 */

function assertInRange(field: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new OutOfRangePosition(field, value, { min: 0, max });
  }
}

export function globalToStructured(index: GlobalIndex): StructuredPosition {
  assertInRange('index', index, CELL_COUNT - 1);

  const row = Math.floor(index / BOARD_SIZE);
  const col = index % BOARD_SIZE;
  const subBoardRow = Math.floor(row / 3);
  const subBoardCol = Math.floor(col / 3);
  const cellRow = row % 3;
  const cellCol = col % 3;

  return {
    subBoard: subBoardRow * 3 + subBoardCol,
    cell: cellRow * 3 + cellCol,
    row,
    col,
    subBoardRow,
    subBoardCol,
    cellRow,
    cellCol,
  };
}

export function structuredToGlobal(subBoard: SubBoardId, cell: CellId): GlobalIndex {
  assertInRange('subBoard', subBoard, SUB_BOARD_COUNT - 1);
  assertInRange('cell', cell, SUB_BOARD_COUNT - 1);

  const row = Math.floor(subBoard / 3) * 3 + Math.floor(cell / 3);
  const col = (subBoard % 3) * 3 + (cell % 3);
  return row * BOARD_SIZE + col;
}

// Positions are immutable values, so one frozen instance per index is shared.
const POSITIONS: readonly Position[] = Array.from({ length: CELL_COUNT }, (_, index) =>
  Object.freeze({ index, ...globalToStructured(index) })
);

export function positionFromIndex(index: GlobalIndex): Position {
  assertInRange('index', index, CELL_COUNT - 1);
  return POSITIONS[index];
}

export function positionFromParts(subBoard: SubBoardId, cell: CellId): Position {
  return POSITIONS[structuredToGlobal(subBoard, cell)];
}

/**
 * Build a position from sub-board and cell grid coordinates, x being the
 * column and y the row, each 0–2.
 */
export function positionFromGrid(gridX: number, gridY: number, cellX: number, cellY: number): Position {
  assertInRange('gridX', gridX, 2);
  assertInRange('gridY', gridY, 2);
  assertInRange('cellX', cellX, 2);
  assertInRange('cellY', cellY, 2);
  return positionFromParts(gridY * 3 + gridX, cellY * 3 + cellX);
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.index === b.index;
}

/** Global indices of the nine cells of a sub-board, in local cell order. */
export function subBoardIndices(subBoard: SubBoardId): GlobalIndex[] {
  assertInRange('subBoard', subBoard, SUB_BOARD_COUNT - 1);
  return Array.from({ length: SUB_BOARD_COUNT }, (_, cell) => structuredToGlobal(subBoard, cell));
}
