import type { RandomSource } from '@/core/random';

/** Replays a fixed list of values, cycling when exhausted. */
export class ScriptedRandom implements RandomSource {
  private index = 0;
  private readonly values: readonly number[];

  constructor(values: readonly number[]) {
    if (values.length === 0) throw new RangeError('ScriptedRandom needs at least one value');
    this.values = values;
  }

  next(): number {
    const value = this.values[this.index % this.values.length];
    this.index++;
    return value;
  }
}
