/**
 * Test suite for src/shared/utils/envFlags.ts
 */

import {
  debugLog,
  flagEnabled,
  isEngineDebugEnabled,
  isJestRuntime,
  readEnv,
} from '../../../src/shared/utils/envFlags';
import { UltimateBoard } from '../../../src/shared/engine/UltimateBoard';
import { positionFromIndex } from '../../../src/shared/engine/positionCodec';

describe('envFlags', () => {
  const originalFlag = process.env.UTTT_DEBUG_ENGINE;

  afterEach(() => {
    if (originalFlag === undefined) delete process.env.UTTT_DEBUG_ENGINE;
    else process.env.UTTT_DEBUG_ENGINE = originalFlag;
    jest.restoreAllMocks();
  });

  it('detects the Jest test environment', () => {
    expect(isJestRuntime()).toBe(true);
    expect(readEnv('NODE_ENV')).toBe('test');
  });

  it.each<[string, boolean]>([
    ['1', true],
    ['true', true],
    ['TRUE', true],
    ['0', false],
    ['yes', false],
  ])('reads flag value %p as %p', (value, expected) => {
    process.env.UTTT_DEBUG_ENGINE = value;
    expect(flagEnabled('UTTT_DEBUG_ENGINE')).toBe(expected);
    expect(isEngineDebugEnabled()).toBe(expected);
  });

  it('treats a missing flag as disabled', () => {
    delete process.env.UTTT_DEBUG_ENGINE;
    expect(isEngineDebugEnabled()).toBe(false);
  });

  it('only logs when the condition holds', () => {
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    debugLog(false, 'hidden');
    debugLog(true, 'shown', 1);
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith('shown', 1);
  });

  it('emits one engine diagnostic per move when enabled', () => {
    process.env.UTTT_DEBUG_ENGINE = '1';
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    const board = new UltimateBoard();
    board.applyMove(positionFromIndex(40));

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith('[UltimateBoard.applyMove]', {
      index: 40,
      subBoard: 4,
      subBoardOutcome: 'in_progress',
      metaOutcome: 'in_progress',
      forcing: { kind: 'forced', subBoard: 4 },
    });
  });
});
