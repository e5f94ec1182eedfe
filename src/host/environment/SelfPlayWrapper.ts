/**
 * SelfPlayWrapper - single-agent view of a two-player environment
 *
 * The wrapped environment alternates players; this wrapper fixes the agent to
 * one piece and plays the other side with `opponentPolicy` (uniform random by
 * default), so every `step` is one agent move followed by at most one
 * opponent reply. Rewards are zero-sum from the agent's perspective.
 *
 * When the agent plays O and `flipObservation` is on, X and O are swapped in
 * observed boards so the agent always sees its own stones as 1.
 *
 * The opponent policy is given a copy of the board. A reply the engine
 * rejects is a bug in the policy: it is logged and the engine error thrown.
 */

import { EngineErrorCode, RulesViolation, type Player } from '../../shared/engine';
import { randomPolicy, type MovePolicy } from '../../shared/ai';
import { logger } from '../utils/logger';
import type { CellCode, Observation, ResetOptions, ResetResult, StepResult, UltimateTicTacToeEnv } from './UltimateTicTacToeEnv';

export interface SelfPlayOptions {
  agentPiece: Player;
  opponentPolicy?: MovePolicy;
  flipObservation?: boolean;
}

const FLIPPED: Record<CellCode, CellCode> = { 0: 0, 1: 2, 2: 1 };

export class SelfPlayWrapper {
  readonly agentPiece: Player;
  private readonly opponentPolicy: MovePolicy;
  private readonly flipObservation: boolean;

  constructor(
    readonly env: UltimateTicTacToeEnv,
    options: SelfPlayOptions
  ) {
    this.agentPiece = options.agentPiece;
    this.opponentPolicy = options.opponentPolicy ?? randomPolicy;
    this.flipObservation = options.flipObservation ?? true;
  }

  /**
   * Reset the environment. When the agent plays O the opponent's opening
   * move is made here, so the first observation is always the agent's turn.
   */
  reset(options: ResetOptions = {}): ResetResult {
    const initial = this.env.reset(options);
    if (this.env.board.isTerminal() || this.env.board.currentPlayer() === this.agentPiece) {
      return { observation: this.view(initial.observation), info: initial.info };
    }

    const opening = this.playOpponent();
    return { observation: opening.observation, info: opening.info };
  }

  /**
   * Play the agent's action, then one opponent reply if the game continues
   * and the action was accepted.
   */
  step(action: number): StepResult {
    const board = this.env.board;
    if (!board.isTerminal() && board.currentPlayer() !== this.agentPiece) {
      throw new RulesViolation(
        EngineErrorCode.RULES_NOT_AGENT_TURN,
        `Expected agent's turn (${this.agentPiece}), got ${board.currentPlayer()}`,
        { agentPiece: this.agentPiece, currentPlayer: board.currentPlayer() },
        'SelfPlayWrapper'
      );
    }

    const agentStep = this.env.step(action);
    if (agentStep.terminated || agentStep.truncated || agentStep.info.error) {
      return { ...agentStep, observation: this.view(agentStep.observation) };
    }

    const reply = this.playOpponent();
    return { ...reply, reward: agentStep.reward - reply.reward };
  }

  actionMask(): Array<0 | 1> {
    return this.env.actionMask();
  }

  private playOpponent(): StepResult {
    const move = this.opponentPolicy(this.env.board.copy(), this.env.rng);
    const result = this.env.step(move.index);
    if (result.info.error) {
      logger.error('Opponent policy proposed a rejected move', {
        agentPiece: this.agentPiece,
        move: move.index,
        error: result.info.error,
      });
      throw result.info.error;
    }
    return { ...result, observation: this.view(result.observation) };
  }

  private view(observation: Observation): Observation {
    if (!this.flipObservation || this.agentPiece !== 'O') {
      return observation;
    }
    return {
      board: observation.board.map((row) => row.map((cell) => FLIPPED[cell])),
      actionMask: observation.actionMask,
    };
  }
}
