/**
 * Random baseline agent - uniform choice over the legal-move set
 *
 * The agent only ever reads `legalMoves()`; it never inspects or touches
 * board internals. It serves as the reference opponent for the self-play
 * wrapper and as both sides of random-vs-random series.
 *
 * Usage:
 * ```typescript
 * const agent = new RandomAgent(42);
 * const position = agent.selectMove(board);
 * board.applyMove(position);
 * ```
 *
 * @module RandomAgent
 */

import { CELL_COUNT, type Position } from '../types/game';
import { EngineErrorCode, InvalidState } from '../engine/errors';
import type { UltimateBoard } from '../engine/UltimateBoard';
import { SeededRNG, generateGameSeed } from '../utils/rng';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A move-selection policy. Must return a member of `board.legalMoves()`.
 */
export type MovePolicy = (board: UltimateBoard, rng: SeededRNG) => Position;

/**
 * Anything that can pick a move for the player to move.
 */
export interface Agent {
  readonly name: string;
  selectMove(board: UltimateBoard): Position;
}

// ═══════════════════════════════════════════════════════════════════════════
// POLICY
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Uniformly random legal move. Throws InvalidState when there is none
 * (the game is over), rather than inventing a move.
 */
export const randomPolicy: MovePolicy = (board, rng) => {
  const move = rng.pick(board.legalMoves());
  if (!move) {
    throw new InvalidState(
      EngineErrorCode.STATE_NO_LEGAL_MOVES,
      'No legal moves available',
      { status: board.status() },
      'RandomAgent'
    );
  }
  return move;
};

// ═══════════════════════════════════════════════════════════════════════════
// AGENT
// ═══════════════════════════════════════════════════════════════════════════

export class RandomAgent implements Agent {
  readonly name: string;
  private readonly rng: SeededRNG;

  constructor(seed: number = generateGameSeed(), name: string = 'random') {
    this.rng = new SeededRNG(seed);
    this.name = name;
  }

  selectMove(board: UltimateBoard): Position {
    return randomPolicy(board, this.rng);
  }

  /** Global index of a random legal move, for action-based callers. */
  selectAction(board: UltimateBoard): number {
    return this.selectMove(board).index;
  }

  /**
   * Probability of each of the 81 actions: uniform over legal moves,
   * zero elsewhere. All zeros once the game is over.
   */
  actionProbabilities(board: UltimateBoard): number[] {
    const probabilities = new Array<number>(CELL_COUNT).fill(0);
    const moves = board.legalMoves();
    for (const move of moves) {
      probabilities[move.index] = 1 / moves.length;
    }
    return probabilities;
  }
}
