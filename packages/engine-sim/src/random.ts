import { randomInt } from 'node:crypto';
import { EngineError, SimulationError } from '@shoal/engine-core';

export const MAX_SEED = 0xffffffff;

/** Seeds are unsigned 32-bit integers; each one names a distinct generator state. */
export function isValidSeed(seed: number): boolean {
  return Number.isInteger(seed) && seed >= 0 && seed <= MAX_SEED;
}

/**
 * Deterministic seeded PRNG (Mulberry32).
 * One instance per run; every stochastic choice in the run draws from it, in a
 * fixed order, so the same seed reproduces the same run.
 */
export class SeededRandom {
  private state: number;
  private draws = 0;

  constructor(
    seed: number,
    private readonly maxDraws: number = Number.POSITIVE_INFINITY,
  ) {
    if (!isValidSeed(seed)) throw new RangeError(`seed must be an integer in [0, ${MAX_SEED}], got ${seed}`);
    this.state = seed;
  }

  /** Uniform float in [0, 1). */
  next(): number {
    if (++this.draws > this.maxDraws) {
      throw new SimulationError(EngineError.RNG_EXHAUSTED, `random draw budget of ${this.maxDraws} exhausted`);
    }
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** true with probability p. */
  chance(p: number): boolean {
    return this.next() < p;
  }

  /** Uniform float in [min, max). */
  uniform(min: number, max: number): number {
    return min + (max - min) * this.next();
  }

  /** Choose one element from a non-empty array. */
  choice<T>(items: readonly T[]): T {
    if (items.length === 0) throw new RangeError('choice() on empty array');
    return items[Math.floor(this.next() * items.length)];
  }

  get drawCount(): number {
    return this.draws;
  }
}

/** Non-deterministic seed for callers that did not supply one. */
export function generateSeed(): number {
  return randomInt(0, MAX_SEED + 1);
}
