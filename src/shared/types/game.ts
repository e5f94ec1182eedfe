/**
 * Core game vocabulary shared by the rules engine, the environment wrapper
 * and the command-line host.
 */

/** 'X' is player A and always moves first; 'O' is player B. */
export type Player = 'X' | 'O';

/** A single cell of the 9×9 grid. `null` means empty. */
export type Cell = Player | null;

/**
 * Outcome of a 3×3 board. Used both for each sub-board (derived from its
 * cells) and for the meta-board (derived from the nine sub-board outcomes).
 *
 * Transitions are one-way: 'in_progress' → one of the three terminal values.
 */
export type Outcome = 'in_progress' | 'won_x' | 'won_o' | 'drawn';

export type TerminalOutcome = Exclude<Outcome, 'in_progress'>;

/**
 * Whole-game status as reported to callers.
 */
export type GameStatus =
  | { readonly kind: 'in_progress' }
  | { readonly kind: 'won'; readonly winner: Player }
  | { readonly kind: 'drawn' };

/** Sub-board id, 0–8, numbered row-major across the meta-board. */
export type SubBoardId = number;

/** Local cell id within a sub-board, 0–8, row-major. */
export type CellId = number;

/** Flat index into the 9×9 grid, 0–80, row-major (row × 9 + col). */
export type GlobalIndex = number;

/**
 * Structured form of a global index. All coordinates are derived from the
 * index and from each other; none can be set independently.
 */
export interface StructuredPosition {
  readonly subBoard: SubBoardId;
  readonly cell: CellId;
  /** Global row 0–8. */
  readonly row: number;
  /** Global column 0–8. */
  readonly col: number;
  readonly subBoardRow: number;
  readonly subBoardCol: number;
  readonly cellRow: number;
  readonly cellCol: number;
}

/**
 * A well-formed board position. Values are frozen; two positions are equal
 * iff their `index` fields are equal.
 */
export interface Position extends StructuredPosition {
  readonly index: GlobalIndex;
}

/**
 * The forcing pointer. `unset` only before the first move; `forced` always
 * names an in-progress sub-board; `free` records a target sub-board that was
 * already terminal, so the mover may choose any in-progress sub-board.
 */
export type ForcingPointer =
  | { readonly kind: 'unset' }
  | { readonly kind: 'forced'; readonly subBoard: SubBoardId }
  | { readonly kind: 'free'; readonly target: SubBoardId };

export const PLAYERS: readonly Player[] = ['X', 'O'];

export const BOARD_SIZE = 9;
export const CELL_COUNT = 81;
export const SUB_BOARD_COUNT = 9;

export function otherPlayer(player: Player): Player {
  return player === 'X' ? 'O' : 'X';
}

export function isTerminalOutcome(outcome: Outcome): outcome is TerminalOutcome {
  return outcome !== 'in_progress';
}

export function outcomeForWinner(player: Player): TerminalOutcome {
  return player === 'X' ? 'won_x' : 'won_o';
}

/**
 * The player who owns a won board, or `null` for in-progress and drawn boards.
 */
export function outcomeWinner(outcome: Outcome): Player | null {
  switch (outcome) {
    case 'won_x':
      return 'X';
    case 'won_o':
      return 'O';
    default:
      return null;
  }
}

export function outcomeToStatus(outcome: Outcome): GameStatus {
  switch (outcome) {
    case 'in_progress':
      return { kind: 'in_progress' };
    case 'drawn':
      return { kind: 'drawn' };
    case 'won_x':
      return { kind: 'won', winner: 'X' };
    case 'won_o':
      return { kind: 'won', winner: 'O' };
  }
}
