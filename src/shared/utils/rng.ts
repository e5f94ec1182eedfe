/**
 * Deterministic pseudo-random number generator for agents and simulations.
 *
 * A 32-bit linear congruential generator: not suitable for anything
 * security-related, but the same seed always produces the same stream on
 * every host, which keeps random-agent games reproducible in tests.
 */
export class SeededRNG {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Next value in [0, 1). */
  next(): number {
    this.state = (Math.imul(this.state, 1664525) + 1013904223) >>> 0;
    return this.state / 0x100000000;
  }

  /** Uniform integer in [0, maxExclusive). */
  nextInt(maxExclusive: number): number {
    return Math.floor(this.next() * maxExclusive);
  }

  /** Uniform element of a non-empty array; undefined for an empty one. */
  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[this.nextInt(items.length)];
  }
}

/**
 * Fresh seed for games that were not given one explicitly.
 */
export function generateGameSeed(): number {
  return Math.floor(Math.random() * 0x7fffffff);
}
