import type { Range } from './types';

/**
 * Uniform source of floats in [0, 1). Everything random in the game
 * (spawn point, lifetime, respawn gap) is drawn through one of these so
 * tests can swap in a deterministic sequence.
 */
export interface RandomSource {
  next(): number;
}

export const MathRandom: RandomSource = {
  next: () => Math.random(),
};

// ============================================
// Seeded PRNG (xorshift32)
// ============================================

export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0 || 1;
  }

  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state / 0x100000000;
  }
}

/** Integer in [range.min, range.max], both ends included. */
export function randomInt(rng: RandomSource, range: Range): number {
  const span = range.max - range.min + 1;
  return range.min + Math.min(span - 1, Math.floor(rng.next() * span));
}

export function pick<T>(rng: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  const index = Math.min(items.length - 1, Math.floor(rng.next() * items.length));
  return items[index];
}
