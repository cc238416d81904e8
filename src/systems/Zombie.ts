import type { DrawSurface } from '@/core/DrawSurface';
import { easeOutBack, lerpEased } from '@/core/easing';
import type { Point } from '@/core/types';
import { ZOMBIE_COLORS } from '@/config/constants';

export type ZombiePhase = 'spawning' | 'alive' | 'despawning' | 'dead';

export interface ZombieState {
  phase: ZombiePhase;
  enteredAt: number; // timestamp of entering the current phase
}

export interface ZombieTiming {
  lifetimeMs: number;
  spawnAnimMs: number;
  despawnAnimMs: number;
}

export interface ZombieSpec extends ZombieTiming {
  id: number;
  position: Point;
  radius: number;
  hitboxFactor: number;
  spawnedAt: number;
}

const PHASE_ORDER: Record<ZombiePhase, number> = {
  spawning: 0,
  alive: 1,
  despawning: 2,
  dead: 3,
};

export function phaseRank(phase: ZombiePhase): number {
  return PHASE_ORDER[phase];
}

/**
 * Time-driven transition for one zombie. Only ever returns the current
 * state or the next phase in order, never an earlier one.
 */
export function nextState(
  state: ZombieState,
  now: number,
  spawnedAt: number,
  timing: ZombieTiming
): ZombieState {
  switch (state.phase) {
    case 'spawning':
      return now - state.enteredAt >= timing.spawnAnimMs ? { phase: 'alive', enteredAt: now } : state;
    case 'alive':
      return now - spawnedAt >= timing.lifetimeMs ? { phase: 'despawning', enteredAt: now } : state;
    case 'despawning':
      return now - state.enteredAt >= timing.despawnAnimMs ? { phase: 'dead', enteredAt: now } : state;
    case 'dead':
      return state;
  }
}

// Pop-in grows from this scale, shrink-away ends at this one
const SPAWN_SCALE_FROM = 0.6;
const DESPAWN_SCALE_TO = 0.1;

export class Zombie {
  readonly id: number;
  readonly position: Point;
  readonly radius: number;
  readonly spawnedAt: number;
  readonly lifetimeMs: number;

  private readonly hitboxFactor: number;
  private readonly timing: ZombieTiming;
  private current: ZombieState;
  private hit = false;

  constructor(spec: ZombieSpec) {
    this.id = spec.id;
    this.position = { x: spec.position.x, y: spec.position.y };
    this.radius = spec.radius;
    this.hitboxFactor = spec.hitboxFactor;
    this.spawnedAt = spec.spawnedAt;
    this.lifetimeMs = spec.lifetimeMs;
    this.timing = {
      lifetimeMs: spec.lifetimeMs,
      spawnAnimMs: spec.spawnAnimMs,
      despawnAnimMs: spec.despawnAnimMs,
    };
    this.current = { phase: 'spawning', enteredAt: spec.spawnedAt };
  }

  get state(): ZombieState {
    return this.current;
  }

  get phase(): ZombiePhase {
    return this.current.phase;
  }

  get hitRegistered(): boolean {
    return this.hit;
  }

  isDead(): boolean {
    return this.current.phase === 'dead';
  }

  update(now: number): void {
    this.current = nextState(this.current, now, this.spawnedAt, this.timing);
  }

  isClickable(): boolean {
    return (this.current.phase === 'spawning' || this.current.phase === 'alive') && !this.hit;
  }

  /** Circular hitbox on the base radius; animation scale never applies. */
  hitTest(point: Point): boolean {
    const dx = point.x - this.position.x;
    const dy = point.y - this.position.y;
    const reach = this.radius * this.hitboxFactor;
    return dx * dx + dy * dy <= reach * reach;
  }

  // Callers check isClickable() first
  registerHit(now: number): void {
    this.hit = true;
    this.current = { phase: 'despawning', enteredAt: now };
  }

  visualScale(now: number): number {
    const elapsed = now - this.current.enteredAt;
    switch (this.current.phase) {
      case 'spawning':
        return lerpEased(SPAWN_SCALE_FROM, 1, elapsed / this.timing.spawnAnimMs, easeOutBack);
      case 'despawning':
        return lerpEased(1, DESPAWN_SCALE_TO, elapsed / this.timing.despawnAnimMs);
      case 'alive':
      case 'dead':
        return 1;
    }
  }

  draw(surface: DrawSurface, now: number): void {
    if (this.current.phase === 'dead') return;

    const r = Math.round(this.radius * this.visualScale(now));
    const { x, y } = this.position;
    const c = ZOMBIE_COLORS;

    // Drop shadow
    surface.circle(x + 6, y + 10, Math.round(r * 0.95), c.dropShadow, 0.12);

    // Face with top-left shading
    surface.circle(x, y, r, c.skin);
    surface.ring(x - Math.round(r * 0.2), y - Math.round(r * 0.2), Math.round(r * 1.02), c.shadow, 4);

    // Eyes, slightly mismatched
    const ex = Math.round(r * 0.45);
    const ey = Math.round(r * 0.2);
    surface.circle(x - ex, y - ey, Math.round(r * 0.28), c.eye);
    surface.circle(x + ex, y - ey, Math.round(r * 0.24), c.eye);
    surface.circle(x - ex, y - ey, Math.round(r * 0.1), c.pupil);
    surface.circle(x + ex, y - ey, Math.round(r * 0.08), c.pupil);

    // Scar
    surface.line(x - Math.round(r * 0.7), y - Math.round(r * 0.55), x - Math.round(r * 0.2), y - Math.round(r * 0.1), c.scar, 3);
    surface.line(x - Math.round(r * 0.6), y - Math.round(r * 0.5), x - Math.round(r * 0.5), y - Math.round(r * 0.35), c.scar, 3);

    // Mouth
    const mouthW = r;
    const mouthH = Math.round(r * 0.45);
    surface.ellipse(x, y + Math.round(r * 0.4), mouthW, mouthH, c.mouth);

    // Teeth
    const toothW = Math.max(4, Math.round(r * 0.12));
    const toothH = Math.round(mouthH * 0.35);
    const toothY = y + Math.round(r * 0.33);
    for (const dx of [-Math.round(mouthW * 0.25), 0, Math.round(mouthW * 0.25)]) {
      surface.rect(x + dx - toothW / 2, toothY - toothH / 2, toothW, toothH, c.tooth);
    }
  }
}
