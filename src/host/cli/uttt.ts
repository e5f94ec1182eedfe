#!/usr/bin/env node
/**
 * uttt - command-line front end for the rules engine.
 *
 * Usage:
 *   uttt random [--games=N] [--seed=N] [--verbose]   random vs random series
 *   uttt human [--seed=N]                            play X against a random O
 *   uttt --help
 *
 * Boards and results go to stdout; log lines go to stderr.
 */

import readline from 'readline/promises';

import {
  UltimateBoard,
  formatBoard,
  formatPosition,
  formatStatus,
  isEngineError,
  parsePosition,
} from '../../shared/engine';
import { RandomAgent } from '../../shared/ai';
import { generateGameSeed } from '../../shared/utils/rng';
import { config } from '../config';
import { runSeries } from '../simulation/matchRunner';
import { logger } from '../utils/logger';

export type CliCommand = 'random' | 'human' | 'help';

export interface CliArgs {
  command: CliCommand;
  games: number;
  seed?: number;
  verbose: boolean;
}

const DEFAULT_GAMES = 10;

function printUsage(): void {
  // eslint-disable-next-line no-console
  console.log(
    [
      'Usage: uttt <command> [options]',
      '',
      'Commands:',
      '  random [--games=N] [--seed=N] [--verbose]   play a random vs random series',
      '  human [--seed=N]                            play X against a random O',
      '',
      'Moves are typed in algebraic form (a1..i9, file = column) or as an index 0-80.',
    ].join('\n')
  );
}

function parseNonNegativeInt(flag: string, value: string | undefined): number | null {
  if (value === undefined) {
    console.error(`Missing value for ${flag}`);
    return null;
  }
  if (!/^\d+$/.test(value)) {
    console.error(`Invalid ${flag} value: ${value}`);
    return null;
  }
  return Number.parseInt(value, 10);
}

/**
 * Parse `process.argv`. Returns null (after printing the problem) on bad
 * input.
 */
export function parseArgs(argv: string[]): CliArgs | null {
  let command: CliCommand | undefined;
  let games = DEFAULT_GAMES;
  let seed: number | undefined = config.simulation.seed;
  let verbose = false;

  for (let i = 2; i < argv.length; i += 1) {
    const raw = argv[i];

    if (!raw.startsWith('--')) {
      if (command !== undefined) {
        console.error(`Unexpected argument: ${raw}`);
        return null;
      }
      if (raw !== 'random' && raw !== 'human') {
        console.error(`Unknown command: ${raw}`);
        return null;
      }
      command = raw;
      continue;
    }

    const [flag, valueMaybe] = raw.split('=', 2);
    const next = argv[i + 1];
    const value = valueMaybe ?? (next !== undefined && !next.startsWith('--') ? next : undefined);
    const consumedNext = valueMaybe === undefined && value !== undefined;

    switch (flag) {
      case '--help':
        return { command: 'help', games, seed, verbose };
      case '--verbose':
        verbose = true;
        break;
      case '--games': {
        const parsed = parseNonNegativeInt(flag, value);
        if (parsed === null) return null;
        if (parsed === 0) {
          console.error('--games must be at least 1');
          return null;
        }
        games = parsed;
        if (consumedNext) i += 1;
        break;
      }
      case '--seed': {
        const parsed = parseNonNegativeInt(flag, value);
        if (parsed === null) return null;
        seed = parsed;
        if (consumedNext) i += 1;
        break;
      }
      default:
        console.error(`Unknown option: ${flag}`);
        return null;
    }
  }

  return { command: command ?? 'help', games, seed, verbose };
}

function runRandom(args: CliArgs): void {
  const seed = args.seed ?? generateGameSeed();
  // eslint-disable-next-line no-console
  console.log(`Random vs random: ${args.games} game(s), seed ${seed}`);

  const result = runSeries({
    games: args.games,
    seed,
    onGame: (record, gameNumber) => {
      if (!args.verbose) return;
      // eslint-disable-next-line no-console
      console.log(
        `\nGame ${gameNumber}/${args.games}: ${formatStatus(record.status)} in ${record.moves.length} moves\n` +
          formatBoard(record.board)
      );
    },
  });

  // eslint-disable-next-line no-console
  console.log(
    [
      '',
      `Results after ${result.games} games:`,
      `X wins: ${result.xWins}`,
      `O wins: ${result.oWins}`,
      `Draws: ${result.draws}`,
    ].join('\n')
  );
}

async function runHuman(args: CliArgs): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const opponent = new RandomAgent(args.seed ?? generateGameSeed(), 'random-o');
  const board = new UltimateBoard();

  try {
    while (!board.isTerminal()) {
      // eslint-disable-next-line no-console
      console.log(`\n${formatBoard(board)}\n`);

      if (board.currentPlayer() === 'O') {
        const reply = opponent.selectMove(board);
        const result = board.applyMove(reply);
        if (!result.ok) throw result.error;
        // eslint-disable-next-line no-console
        console.log(`O plays ${formatPosition(reply)}`);
        continue;
      }

      const forced = board.forcedSubBoard();
      const hint = forced === null ? 'any open sub-board' : `sub-board ${forced}`;
      const answer = (await rl.question(`X to move (${hint}), or "quit": `)).trim();
      if (answer === 'quit' || answer === 'q') {
        return;
      }

      try {
        const result = board.applyMove(parsePosition(answer));
        if (!result.ok) {
          // eslint-disable-next-line no-console
          console.log(result.error.message);
        }
      } catch (err) {
        if (!isEngineError(err)) throw err;
        // eslint-disable-next-line no-console
        console.log(`Cannot read move "${answer}": ${err.message}`);
      }
    }

    // eslint-disable-next-line no-console
    console.log(`\n${formatBoard(board)}\n\nResult: ${formatStatus(board.status())}`);
  } finally {
    rl.close();
  }
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const args = parseArgs(argv);
  if (!args) {
    printUsage();
    return 1;
  }

  switch (args.command) {
    case 'help':
      printUsage();
      return 0;
    case 'random':
      runRandom(args);
      return 0;
    case 'human':
      await runHuman(args);
      return 0;
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.error('uttt failed', { error: err });
      process.exitCode = 1;
    });
}
