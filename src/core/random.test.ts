import { describe, it, expect } from 'vitest';
import { SeededRandom, pick, randomInt } from './random';
import { ScriptedRandom } from '@/testing/ScriptedRandom';

describe('SeededRandom', () => {
  it('repeats its sequence for the same seed', () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);
    for (let i = 0; i < 20; i++) {
      expect(a.next()).toBe(b.next());
    }
  });

  it('stays in [0, 1)', () => {
    const rng = new SeededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('does not get stuck on a zero seed', () => {
    const rng = new SeededRandom(0);
    const first = rng.next();
    expect(first).toBeGreaterThan(0);
    expect(rng.next()).not.toBe(first);
  });
});

describe('randomInt', () => {
  it('includes both ends of the range', () => {
    const range = { min: 220, max: 520 };
    expect(randomInt(new ScriptedRandom([0]), range)).toBe(220);
    expect(randomInt(new ScriptedRandom([0.9999999]), range)).toBe(520);
  });

  it('handles a single-value range', () => {
    expect(randomInt(new ScriptedRandom([0.7]), { min: 5, max: 5 })).toBe(5);
  });

  it('stays in range for seeded draws', () => {
    const rng = new SeededRandom(3);
    for (let i = 0; i < 500; i++) {
      const v = randomInt(rng, { min: 800, max: 1500 });
      expect(Number.isInteger(v)).toBe(true);
      expect(v).toBeGreaterThanOrEqual(800);
      expect(v).toBeLessThanOrEqual(1500);
    }
  });
});

describe('pick', () => {
  it('maps the draw onto an index', () => {
    const items = ['a', 'b', 'c', 'd'];
    expect(pick(new ScriptedRandom([0]), items)).toBe('a');
    expect(pick(new ScriptedRandom([0.5]), items)).toBe('c');
    expect(pick(new ScriptedRandom([0.99]), items)).toBe('d');
  });

  it('rejects an empty list', () => {
    expect(() => pick(new ScriptedRandom([0]), [])).toThrow(RangeError);
  });
});
