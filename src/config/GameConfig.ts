import { ConfigError } from '@/core/errors';
import { createLogger, isLogLevel, type LogLevel } from '@/core/logger';
import type { Point, Range } from '@/core/types';
import {
  GAME_WIDTH,
  GAME_HEIGHT,
  FPS,
  ZOMBIE_LIFETIME_MIN,
  ZOMBIE_LIFETIME_MAX,
  RESPAWN_GAP_MIN,
  RESPAWN_GAP_MAX,
  ZOMBIE_BASE_RADIUS,
  HITBOX_FACTOR,
  SPAWN_ANIM_MS,
  DESPAWN_ANIM_MS,
  SPAWN_POINTS,
  MIN_SPAWN_POINTS,
} from './constants';

const log = createLogger('config');

export interface GameConfig {
  width: number;
  height: number;
  fps: number;
  lifetime: Range;
  respawnGap: Range;
  zombieRadius: number;
  hitboxFactor: number;
  spawnAnimMs: number;
  despawnAnimMs: number;
  spawnPoints: readonly Point[];
  /** Fixed seed for deterministic play; unseeded uses Math.random. */
  seed: number | null;
  logLevel: LogLevel | null;
}

export const DEFAULT_CONFIG: GameConfig = {
  width: GAME_WIDTH,
  height: GAME_HEIGHT,
  fps: FPS,
  lifetime: { min: ZOMBIE_LIFETIME_MIN, max: ZOMBIE_LIFETIME_MAX },
  respawnGap: { min: RESPAWN_GAP_MIN, max: RESPAWN_GAP_MAX },
  zombieRadius: ZOMBIE_BASE_RADIUS,
  hitboxFactor: HITBOX_FACTOR,
  spawnAnimMs: SPAWN_ANIM_MS,
  despawnAnimMs: DESPAWN_ANIM_MS,
  spawnPoints: SPAWN_POINTS,
  seed: null,
  logLevel: null,
};

export function resolveConfig(overrides: Partial<GameConfig> = {}): GameConfig {
  const config: GameConfig = { ...DEFAULT_CONFIG, ...overrides };
  validateConfig(config);
  return config;
}

function requirePositive(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(field, `expected a positive number, got ${value}`);
  }
}

function requireRange(field: string, range: Range): void {
  if (!Number.isInteger(range.min) || !Number.isInteger(range.max)) {
    throw new ConfigError(field, 'bounds must be integers');
  }
  if (range.min < 0 || range.min > range.max) {
    throw new ConfigError(field, `expected 0 <= min <= max, got ${range.min}..${range.max}`);
  }
}

export function validateConfig(config: GameConfig): void {
  requirePositive('width', config.width);
  requirePositive('height', config.height);
  requirePositive('fps', config.fps);
  requirePositive('zombieRadius', config.zombieRadius);
  requirePositive('spawnAnimMs', config.spawnAnimMs);
  requirePositive('despawnAnimMs', config.despawnAnimMs);
  requireRange('lifetime', config.lifetime);
  requireRange('respawnGap', config.respawnGap);

  if (!(config.hitboxFactor > 0 && config.hitboxFactor <= 1)) {
    throw new ConfigError('hitboxFactor', `expected a value in (0, 1], got ${config.hitboxFactor}`);
  }

  const distinct = new Set(config.spawnPoints.map((p) => `${p.x},${p.y}`));
  if (distinct.size < MIN_SPAWN_POINTS) {
    throw new ConfigError(
      'spawnPoints',
      `need at least ${MIN_SPAWN_POINTS} distinct points, got ${distinct.size}`
    );
  }
  for (const p of config.spawnPoints) {
    if (p.x < 0 || p.y < 0 || p.x > config.width || p.y > config.height) {
      throw new ConfigError('spawnPoints', `point (${p.x}, ${p.y}) lies outside the playfield`);
    }
  }

  if (config.seed !== null && !(Number.isInteger(config.seed) && config.seed >= 0)) {
    throw new ConfigError('seed', `expected a non-negative integer, got ${config.seed}`);
  }
}

/**
 * Reads overrides from a page query string, e.g. `?seed=42&log=debug`.
 * Malformed values are skipped with a warning.
 */
export function configFromQuery(search: string): Partial<GameConfig> {
  const params = new URLSearchParams(search);
  const overrides: Partial<GameConfig> = {};

  const seed = params.get('seed');
  if (seed !== null) {
    const parsed = Number(seed);
    if (seed.trim() !== '' && Number.isInteger(parsed) && parsed >= 0) {
      overrides.seed = parsed;
    } else {
      log.warn({ seed }, 'Ignoring malformed seed');
    }
  }

  const level = params.get('log');
  if (level !== null) {
    if (isLogLevel(level)) {
      overrides.logLevel = level;
    } else {
      log.warn({ level }, 'Ignoring unknown log level');
    }
  }

  return overrides;
}
