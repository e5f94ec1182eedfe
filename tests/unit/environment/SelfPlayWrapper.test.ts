/**
 * Test suite for src/host/environment/SelfPlayWrapper.ts
 */

import { SelfPlayWrapper, UltimateTicTacToeEnv } from '../../../src/host/environment';
import { logger } from '../../../src/host/utils/logger';
import type { MovePolicy } from '../../../src/shared/ai';
import { EngineErrorCode, InvalidMove, RulesViolation } from '../../../src/shared/engine/errors';
import { positionFromIndex } from '../../../src/shared/engine/positionCodec';
import { O_WINS_META_AFTER_X, X_WINS_META_IN_ONE, g, snapshotFrom } from '../../utils/fixtures';

jest.mock('../../../src/host/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const lowestLegal: MovePolicy = (board) => {
  const [move] = board.legalMoves();
  if (!move) throw new Error('no legal move');
  return move;
};

function makeWrapper(agentPiece: 'X' | 'O', flipObservation?: boolean, policy: MovePolicy = lowestLegal) {
  const env = new UltimateTicTacToeEnv({ seed: 3 });
  const opponentPolicy = jest.fn(policy);
  const wrapper = new SelfPlayWrapper(env, { agentPiece, opponentPolicy, flipObservation });
  return { env, wrapper, opponentPolicy };
}

describe('SelfPlayWrapper', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('agent plays X', () => {
    it('resets to the agent to move without an opponent move', () => {
      const { env, wrapper, opponentPolicy } = makeWrapper('X');
      const { info } = wrapper.reset();

      expect(info.currentPlayer).toBe('X');
      expect(env.board.moveCount()).toBe(0);
      expect(opponentPolicy).not.toHaveBeenCalled();
    });

    it('plays exactly one opponent reply per step', () => {
      const { env, wrapper, opponentPolicy } = makeWrapper('X');
      wrapper.reset();
      const result = wrapper.step(40);

      // Reply forced into sub-board 4; lowest legal index there is 30.
      expect(opponentPolicy).toHaveBeenCalledTimes(1);
      expect(env.board.moveCount()).toBe(2);
      expect(result.info.lastMove).toBe(30);
      expect(result.info.currentPlayer).toBe('X');
      expect(result.reward).toBe(0);
      expect(result.observation.board[3][3]).toBe(2);
    });

    it('returns +1 and skips the reply when the agent wins', () => {
      const { wrapper, opponentPolicy } = makeWrapper('X');
      wrapper.reset({ snapshot: snapshotFrom(X_WINS_META_IN_ONE) });
      const result = wrapper.step(g(2, 2));

      expect(result.reward).toBe(1);
      expect(result.terminated).toBe(true);
      expect(opponentPolicy).not.toHaveBeenCalled();
    });

    it('returns -1 when the opponent reply wins', () => {
      const { wrapper } = makeWrapper('X');
      wrapper.reset({ snapshot: snapshotFrom(O_WINS_META_AFTER_X) });
      const result = wrapper.step(g(1, 5));

      expect(result.info.lastMove).toBe(35);
      expect(result.info.winner).toBe('O');
      expect(result.terminated).toBe(true);
      expect(result.reward).toBe(-1);
    });

    it('does not reply to a rejected action', () => {
      const { env, wrapper, opponentPolicy } = makeWrapper('X');
      wrapper.reset();
      const result = wrapper.step(81);

      expect(result.reward).toBe(-1);
      expect(result.info.error?.code).toBe(EngineErrorCode.BOARD_POSITION_OUT_OF_RANGE);
      expect(opponentPolicy).not.toHaveBeenCalled();
      expect(env.board.moveCount()).toBe(0);
    });

    it('throws when the opponent policy picks an occupied cell', () => {
      const { env, wrapper } = makeWrapper('X', undefined, () => positionFromIndex(40));
      wrapper.reset();

      expect(() => wrapper.step(40)).toThrow(InvalidMove);
      expect(logger.error).toHaveBeenCalledWith(
        'Opponent policy proposed a rejected move',
        expect.objectContaining({ agentPiece: 'X', move: 40 })
      );
      // Only the agent's move was applied.
      expect(env.board.moveCount()).toBe(1);
      expect(env.board.currentPlayer()).toBe('O');
    });

    it('gives the opponent policy a copy of the board', () => {
      const mutatingPolicy: MovePolicy = (board, rng) => {
        const move = lowestLegal(board, rng);
        board.applyMove(move);
        return move;
      };
      const { env, wrapper } = makeWrapper('X', undefined, mutatingPolicy);
      wrapper.reset();
      const result = wrapper.step(40);

      expect(result.info.error).toBeUndefined();
      expect(result.info.lastMove).toBe(30);
      expect(env.board.moveCount()).toBe(2);
    });

    it('throws when called on the opponent turn', () => {
      const { env, wrapper } = makeWrapper('X');
      wrapper.reset();
      env.step(40);

      expect(() => wrapper.step(30)).toThrow(RulesViolation);
      try {
        wrapper.step(30);
      } catch (err) {
        expect(err).toMatchObject({ code: EngineErrorCode.RULES_NOT_AGENT_TURN });
      }
    });
  });

  describe('agent plays O', () => {
    it('makes the opening move during reset and flips the board', () => {
      const { env, wrapper, opponentPolicy } = makeWrapper('O');
      const { observation, info } = wrapper.reset();

      expect(opponentPolicy).toHaveBeenCalledTimes(1);
      expect(env.board.moveCount()).toBe(1);
      expect(info.currentPlayer).toBe('O');
      expect(info.lastMove).toBe(0);
      // X's stone is shown as 2 from O's point of view.
      expect(observation.board[0][0]).toBe(2);
    });

    it('shows the agent stones as 1 after a step', () => {
      const { wrapper } = makeWrapper('O');
      wrapper.reset();
      // X at index 0 sent O to sub-board 0; O at index 1 sends X to sub-board 1.
      const result = wrapper.step(1);

      expect(result.info.lastMove).toBe(3);
      expect(result.observation.board[0].slice(0, 4)).toEqual([2, 1, 0, 2]);
    });

    it('leaves observations unflipped when flipping is disabled', () => {
      const { wrapper } = makeWrapper('O', false);
      const { observation } = wrapper.reset();
      expect(observation.board[0][0]).toBe(1);
    });
  });
});
