import type { Zombie } from '@/systems/Zombie';
import { ScoreBoard } from '@/systems/ScoreBoard';

/**
 * All mutable game state, owned by the session and passed into each
 * system call.
 */
export interface GameContext {
  /** The single active zombie slot. */
  zombie: Zombie | null;
  /** Only meaningful while `zombie` is null. */
  nextSpawnAt: number;
  score: ScoreBoard;
  muted: boolean;
  running: boolean;
}

export function createGameContext(): GameContext {
  return {
    zombie: null,
    nextSpawnAt: 0,
    score: new ScoreBoard(),
    muted: false,
    running: true,
  };
}
