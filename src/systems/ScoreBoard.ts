/** Percentage of clicks that hit; 0 before any click counted. */
export function accuracy(hits: number, misses: number): number {
  const total = hits + misses;
  return total > 0 ? (hits / total) * 100 : 0;
}

export class ScoreBoard {
  private hitCount = 0;
  private missCount = 0;

  get hits(): number {
    return this.hitCount;
  }

  get misses(): number {
    return this.missCount;
  }

  recordHit(): void {
    this.hitCount++;
  }

  recordMiss(): void {
    this.missCount++;
  }

  accuracy(): number {
    return accuracy(this.hitCount, this.missCount);
  }
}
