/**
 * UltimateTicTacToeEnv - step/reset environment over the rules engine
 *
 * Exposes a board as a reinforcement-learning style environment: actions are
 * global indices 0–80, observations are a 9×9 numeric grid plus an 81-entry
 * legal-action mask, and rewards are from the perspective of the player who
 * just moved.
 *
 * Illegal or out-of-range actions never throw; they leave the board
 * unchanged and come back with `invalidActionReward` and the engine error
 * in `info.error`.
 *
 * @module UltimateTicTacToeEnv
 */

import {
  CELL_COUNT,
  EngineError,
  GameAlreadyOver,
  UltimateBoard,
  isOutOfRangePosition,
  outcomeWinner,
  positionFromIndex,
  type Cell,
  type GlobalIndex,
  type Outcome,
  type Player,
  type Position,
} from '../../shared/engine';
import { SeededRNG, generateGameSeed } from '../../shared/utils/rng';
import { config } from '../config';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/** 0 = empty, 1 = X, 2 = O. */
export type CellCode = 0 | 1 | 2;

export interface Observation {
  board: CellCode[][];
  actionMask: Array<0 | 1>;
}

export interface StepInfo {
  metaBoard: Outcome[][];
  currentPlayer: Player;
  legalMoves: GlobalIndex[];
  gameOver: boolean;
  winner: Player | null;
  lastMove: GlobalIndex | null;
  /** Present only when the action was rejected. */
  error?: EngineError;
}

export interface ResetResult {
  observation: Observation;
  info: StepInfo;
}

export interface StepResult {
  observation: Observation;
  reward: number;
  terminated: boolean;
  truncated: boolean;
  info: StepInfo;
}

export interface EnvOptions {
  /** Reward for a rejected action. Defaults to UTTT_INVALID_ACTION_REWARD. */
  invalidActionReward?: number;
  /** Seed used by `reset()` when none is passed. */
  seed?: number;
}

export interface ResetOptions {
  seed?: number;
  /** Start from a saved position instead of the empty board. */
  snapshot?: unknown;
}

const WIN_REWARD = 1;
const NEUTRAL_REWARD = 0;

export function encodeCell(cell: Cell): CellCode {
  if (cell === 'X') return 1;
  if (cell === 'O') return 2;
  return 0;
}

// ═══════════════════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════════════════

export class UltimateTicTacToeEnv {
  readonly actionCount = CELL_COUNT;
  readonly invalidActionReward: number;

  private _board: UltimateBoard = new UltimateBoard();
  private _rng: SeededRNG;
  private readonly defaultSeed: number | undefined;

  constructor(options: EnvOptions = {}) {
    this.invalidActionReward = options.invalidActionReward ?? config.simulation.invalidActionReward;
    this.defaultSeed = options.seed ?? config.simulation.seed;
    this._rng = new SeededRNG(this.defaultSeed ?? generateGameSeed());
  }

  /**
   * The live board, read-only by contract: only `step` and `reset` change
   * it. Hand `board.copy()` to code that may apply moves.
   */
  get board(): UltimateBoard {
    return this._board;
  }

  /** Random stream for opponents and agents sharing this environment. */
  get rng(): SeededRNG {
    return this._rng;
  }

  reset(options: ResetOptions = {}): ResetResult {
    this._board = options.snapshot === undefined ? new UltimateBoard() : UltimateBoard.fromSnapshot(options.snapshot);
    this._rng = new SeededRNG(options.seed ?? this.defaultSeed ?? generateGameSeed());
    return { observation: this.observation(), info: this.info() };
  }

  step(action: number): StepResult {
    if (this._board.isTerminal()) {
      return this.result(NEUTRAL_REWARD, new GameAlreadyOver(this._board.status()));
    }

    let position: Position;
    try {
      position = positionFromIndex(action);
    } catch (err) {
      if (isOutOfRangePosition(err)) {
        return this.result(this.invalidActionReward, err);
      }
      throw err;
    }

    const mover = this._board.currentPlayer();
    const outcome = this._board.applyMove(position);
    if (!outcome.ok) {
      return this.result(this.invalidActionReward, outcome.error);
    }

    const reward = outcome.status.kind === 'won' && outcome.status.winner === mover ? WIN_REWARD : NEUTRAL_REWARD;
    return this.result(reward);
  }

  /** 1 for each legal action, 0 elsewhere. */
  actionMask(): Array<0 | 1> {
    const mask = new Array<0 | 1>(CELL_COUNT).fill(0);
    for (const move of this._board.legalMoves()) {
      mask[move.index] = 1;
    }
    return mask;
  }

  observation(): Observation {
    return {
      board: this._board.renderMatrix().map((row) => row.map(encodeCell)),
      actionMask: this.actionMask(),
    };
  }

  info(): StepInfo {
    const outcomes = this._board.subBoardOutcomes();
    const lastMove = this._board.lastMove();
    return {
      metaBoard: [outcomes.slice(0, 3), outcomes.slice(3, 6), outcomes.slice(6, 9)],
      currentPlayer: this._board.currentPlayer(),
      legalMoves: this._board.legalMoves().map((move) => move.index),
      gameOver: this._board.isTerminal(),
      winner: outcomeWinner(this._board.metaOutcome()),
      lastMove: lastMove ? lastMove.index : null,
    };
  }

  private result(reward: number, error?: EngineError): StepResult {
    const info = this.info();
    return {
      observation: this.observation(),
      reward,
      terminated: info.gameOver,
      truncated: false,
      info: error ? { ...info, error } : info,
    };
  }
}
