import {
  UltimateBoard,
  formatMoveList,
  formatStatus,
  type GameStatus,
  type Player,
  type Position,
} from '../../shared/engine';
import { RandomAgent, type Agent } from '../../shared/ai';
import { generateGameSeed } from '../../shared/utils/rng';
import { logger } from '../utils/logger';

export type MatchAgents = Record<Player, Agent>;

export interface PlayGameOptions {
  /** Start from this board instead of a fresh one. It is advanced in place. */
  board?: UltimateBoard;
  /** Called after every accepted move. */
  onMove?: (move: Position, board: UltimateBoard) => void;
  /** Label attached to log entries. */
  gameId?: string;
}

export interface GameRecord {
  status: GameStatus;
  moves: Position[];
  board: UltimateBoard;
}

export interface SeriesOptions {
  games: number;
  seed?: number;
  onGame?: (record: GameRecord, gameNumber: number) => void;
}

export interface SeriesResult {
  games: number;
  xWins: number;
  oWins: number;
  draws: number;
}

/**
 * Play one game to completion, asking the agent for the player to move each
 * turn. An agent that proposes a rejected move is a bug in the agent: the
 * engine error is logged and rethrown.
 */
export function playGame(agents: MatchAgents, options: PlayGameOptions = {}): GameRecord {
  const board = options.board ?? new UltimateBoard();
  const moves: Position[] = [];

  while (!board.isTerminal()) {
    const mover = board.currentPlayer();
    const move = agents[mover].selectMove(board);
    const result = board.applyMove(move);
    if (!result.ok) {
      logger.error('Agent proposed a rejected move', {
        gameId: options.gameId,
        agent: agents[mover].name,
        player: mover,
        error: result.error,
      });
      throw result.error;
    }
    moves.push(move);
    options.onMove?.(move, board);
  }

  const status = board.status();
  logger.debug('Game finished', {
    gameId: options.gameId,
    result: formatStatus(status),
    moveCount: moves.length,
    moves: formatMoveList(moves.map((move) => move.index)),
  });

  return { status, moves, board };
}

/**
 * Random-vs-random series. X and O each get their own seeded agent, so the
 * whole series is reproducible from `seed`.
 */
export function runSeries(options: SeriesOptions): SeriesResult {
  const seed = options.seed ?? generateGameSeed();
  const agents: MatchAgents = {
    X: new RandomAgent(seed, 'random-x'),
    O: new RandomAgent(seed + 1, 'random-o'),
  };

  const result: SeriesResult = { games: 0, xWins: 0, oWins: 0, draws: 0 };

  for (let game = 1; game <= options.games; game++) {
    const record = playGame(agents, { gameId: `${seed}-${game}` });
    result.games++;
    if (record.status.kind === 'won') {
      if (record.status.winner === 'X') result.xWins++;
      else result.oWins++;
    } else {
      result.draws++;
    }
    options.onGame?.(record, game);
  }

  logger.info('Series complete', { seed, ...result });
  return result;
}
