import type { GameConfig } from '@/config/GameConfig';
import type { GameContext } from '@/core/GameContext';
import { createLogger } from '@/core/logger';
import { pick, randomInt, type RandomSource } from '@/core/random';
import { Zombie } from './Zombie';

const log = createLogger('spawner');

type SchedulerConfig = Pick<
  GameConfig,
  | 'spawnPoints'
  | 'lifetime'
  | 'respawnGap'
  | 'zombieRadius'
  | 'hitboxFactor'
  | 'spawnAnimMs'
  | 'despawnAnimMs'
>;

/**
 * Decides when and where the next zombie appears. Keeps the context's
 * zombie slot to at most one entry.
 */
export class SpawnScheduler {
  private readonly config: SchedulerConfig;
  private readonly rng: RandomSource;
  private nextId = 0;

  constructor(config: SchedulerConfig, rng: RandomSource) {
    this.config = config;
    this.rng = rng;
  }

  /** Spawns into an empty slot once the respawn gap has passed. */
  maybeSpawn(ctx: GameContext, now: number): Zombie | null {
    if (ctx.zombie !== null || now < ctx.nextSpawnAt) return null;

    const zombie = new Zombie({
      id: this.nextId++,
      position: pick(this.rng, this.config.spawnPoints),
      radius: this.config.zombieRadius,
      hitboxFactor: this.config.hitboxFactor,
      spawnedAt: now,
      lifetimeMs: randomInt(this.rng, this.config.lifetime),
      spawnAnimMs: this.config.spawnAnimMs,
      despawnAnimMs: this.config.despawnAnimMs,
    });
    ctx.zombie = zombie;
    log.debug(
      { id: zombie.id, x: zombie.position.x, y: zombie.position.y, lifetimeMs: zombie.lifetimeMs },
      'Zombie spawned'
    );
    return zombie;
  }

  /** Advances the active zombie and releases it once it is dead. */
  advance(ctx: GameContext, now: number): void {
    const zombie = ctx.zombie;
    if (zombie === null) return;

    zombie.update(now);
    if (zombie.isDead()) {
      ctx.zombie = null;
      ctx.nextSpawnAt = now + randomInt(this.rng, this.config.respawnGap);
      log.debug({ id: zombie.id, nextSpawnAt: ctx.nextSpawnAt }, 'Zombie released');
    }
  }

  update(ctx: GameContext, now: number): void {
    this.maybeSpawn(ctx, now);
    this.advance(ctx, now);
  }
}
