/**
 * ═══════════════════════════════════════════════════════════════════════════
 * Board Snapshot Contract
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Zod-based runtime validation and conversion for in-memory board snapshots.
 * A snapshot stores only the primary facts (cells, player to move, last
 * move); sub-board outcomes, the meta outcome and the forcing pointer are
 * re-derived on restore so they cannot disagree with the cells.
 */

import { z } from 'zod';
import { CELL_COUNT, SUB_BOARD_COUNT, otherPlayer, type Cell } from '../../types/game';
import { EngineErrorCode, InvalidState } from '../errors';
import { resolveForcing } from '../moveGeneration';
import { detectCellOutcome, detectMetaOutcome } from '../outcomeDetection';
import { positionFromIndex, subBoardIndices } from '../positionCodec';
import type { BoardSnapshot, BoardState } from '../types';

// ═══════════════════════════════════════════════════════════════════════════
// Schemas
// ═══════════════════════════════════════════════════════════════════════════

export const ZodPlayerSchema = z.enum(['X', 'O']);

export const ZodCellSchema = ZodPlayerSchema.nullable();

export const ZodBoardSnapshotSchema = z.object({
  cells: z.array(ZodCellSchema).length(CELL_COUNT),
  currentPlayer: ZodPlayerSchema,
  lastMove: z.number().int().min(0).max(CELL_COUNT - 1).nullable(),
});

export type ZodBoardSnapshot = z.infer<typeof ZodBoardSnapshotSchema>;

function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'root'}: ${issue.message}`)
    .join('; ');
}

export function validateSnapshot(
  data: unknown
): { success: true; data: BoardSnapshot } | { success: false; error: string } {
  const result = ZodBoardSnapshotSchema.safeParse(data);
  if (!result.success) {
    return { success: false, error: formatZodError(result.error) };
  }
  return { success: true, data: result.data };
}

// ═══════════════════════════════════════════════════════════════════════════
// Conversion
// ═══════════════════════════════════════════════════════════════════════════

export function serializeBoardState(state: BoardState): BoardSnapshot {
  return {
    cells: [...state.cells],
    currentPlayer: state.currentPlayer,
    lastMove: state.lastMove,
  };
}

function inconsistent(message: string, context: Record<string, unknown>): InvalidState {
  return new InvalidState(
    EngineErrorCode.STATE_INCONSISTENT_SNAPSHOT,
    message,
    context,
    'Snapshot'
  );
}

/**
 * Rebuild a BoardState from untrusted snapshot data.
 *
 * Throws InvalidState when the data fails the schema
 * (STATE_MALFORMED_SNAPSHOT) or describes a position that alternate play
 * from the empty board cannot reach in the stored facts
 * (STATE_INCONSISTENT_SNAPSHOT):
 * - lastMove is null only on an empty board;
 * - the lastMove cell holds the player who is not to move;
 * - X to move ⇒ #X = #O, O to move ⇒ #X = #O + 1.
 */
export function deserializeBoardState(data: unknown): BoardState {
  const validation = validateSnapshot(data);
  if (!validation.success) {
    throw new InvalidState(
      EngineErrorCode.STATE_MALFORMED_SNAPSHOT,
      `Malformed board snapshot: ${validation.error}`,
      { issues: validation.error },
      'Snapshot'
    );
  }
  const { cells, currentPlayer, lastMove } = validation.data;

  const xCount = cells.filter((cell) => cell === 'X').length;
  const oCount = cells.filter((cell) => cell === 'O').length;
  const expectedX = currentPlayer === 'X' ? oCount : oCount + 1;
  if (xCount !== expectedX) {
    throw inconsistent(`Piece counts X=${xCount}, O=${oCount} do not fit ${currentPlayer} to move`, {
      xCount,
      oCount,
      currentPlayer,
    });
  }

  if (lastMove === null) {
    if (xCount + oCount > 0) {
      throw inconsistent('lastMove is required once any cell is occupied', { xCount, oCount });
    }
  } else if (cells[lastMove] !== otherPlayer(currentPlayer)) {
    throw inconsistent(`lastMove cell ${lastMove} must hold ${otherPlayer(currentPlayer)}`, {
      lastMove,
      found: cells[lastMove],
    });
  }

  const ownedCells: Cell[] = [...cells];
  const subBoardOutcomes = Array.from({ length: SUB_BOARD_COUNT }, (_, id) =>
    detectCellOutcome(subBoardIndices(id).map((index) => ownedCells[index]))
  );

  return {
    cells: ownedCells,
    subBoardOutcomes,
    metaOutcome: detectMetaOutcome(subBoardOutcomes),
    currentPlayer,
    forcing:
      lastMove === null
        ? { kind: 'unset' }
        : resolveForcing(positionFromIndex(lastMove).cell, subBoardOutcomes),
    lastMove,
    moveCount: xCount + oCount,
  };
}
