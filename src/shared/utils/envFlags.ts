// Shared helpers for reading environment flags from code that must stay
// host-agnostic (the rules engine has no dependency on the Node config
// layer). Keeping this logic centralised ensures engine diagnostics behave
// the same under the CLI, the environment wrapper and Jest.

// Type-safe process.env access that works in both Node and browser contexts
type ProcessEnv = Record<string, string | undefined>;
function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const env = getProcessEnv();
  if (env) {
    const value = env[name];
    if (typeof value === 'string') {
      return value;
    }
  }

  return undefined;
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * was configured differently (e.g. NODE_ENV=development from a .env file).
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

export function flagEnabled(name: string): boolean {
  const raw = readEnv(name);
  if (!raw) return false;
  return raw === '1' || raw === 'true' || raw === 'TRUE';
}

/**
 * Debug flag for the rules engine. When enabled, move application emits a
 * console line per move with the resulting outcomes and forcing pointer.
 */
export function isEngineDebugEnabled(): boolean {
  return flagEnabled('UTTT_DEBUG_ENGINE');
}

/**
 * Debug logging wrapper. The wrapped console.log is only invoked if the
 * condition is true.
 *
 * @example
 * debugLog(isEngineDebugEnabled(), '[applyMove]', data);
 */
export function debugLog(condition: boolean, ...args: unknown[]): void {
  if (condition) {
    // eslint-disable-next-line no-console
    console.log(...args);
  }
}
