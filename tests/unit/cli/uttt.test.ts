/**
 * Test suite for src/host/cli/uttt.ts (argument parsing and the random
 * series command).
 */

import { main, parseArgs } from '../../../src/host/cli/uttt';

jest.mock('../../../src/host/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const argv = (...args: string[]): string[] => ['node', 'uttt', ...args];

describe('uttt CLI', () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });

  describe('parseArgs', () => {
    it('defaults to help', () => {
      expect(parseArgs(argv())).toEqual({ command: 'help', games: 10, seed: undefined, verbose: false });
    });

    it('reads the random command with inline and separate values', () => {
      expect(parseArgs(argv('random', '--games=5', '--seed', '7', '--verbose'))).toEqual({
        command: 'random',
        games: 5,
        seed: 7,
        verbose: true,
      });
    });

    it('reads the human command', () => {
      expect(parseArgs(argv('human', '--seed=3'))).toMatchObject({ command: 'human', seed: 3 });
    });

    it('treats --help as help regardless of the command', () => {
      expect(parseArgs(argv('random', '--help'))).toMatchObject({ command: 'help' });
    });

    it.each<[string[], string]>([
      [['bogus'], 'Unknown command: bogus'],
      [['random', 'human'], 'Unexpected argument: human'],
      [['random', '--games=0'], '--games must be at least 1'],
      [['random', '--games=ten'], 'Invalid --games value: ten'],
      [['random', '--seed'], 'Missing value for --seed'],
      [['random', '--fast'], 'Unknown option: --fast'],
    ])('rejects %p', (args, message) => {
      expect(parseArgs(argv(...args))).toBeNull();
      expect(errorSpy).toHaveBeenCalledWith(message);
    });
  });

  describe('main', () => {
    it('runs a seeded random series and prints the tally', async () => {
      await expect(main(argv('random', '--games=3', '--seed=8'))).resolves.toBe(0);

      const output = logSpy.mock.calls.map((call) => String(call[0])).join('\n');
      expect(output).toContain('Random vs random: 3 game(s), seed 8');
      expect(output).toContain('Results after 3 games:');
    });

    it('prints boards in verbose mode', async () => {
      await main(argv('random', '--games=1', '--seed=8', '--verbose'));
      const output = logSpy.mock.calls.map((call) => String(call[0])).join('\n');
      expect(output).toContain('Game 1/1: ');
      expect(output).toContain('-----------------------');
    });

    it('prints usage and fails on bad arguments', async () => {
      await expect(main(argv('--nope'))).resolves.toBe(1);
      expect(String(logSpy.mock.calls[0][0])).toContain('Usage: uttt <command> [options]');
    });

    it('prints usage for --help', async () => {
      await expect(main(argv('--help'))).resolves.toBe(0);
      expect(String(logSpy.mock.calls[0][0])).toContain('Usage: uttt');
    });
  });
});
