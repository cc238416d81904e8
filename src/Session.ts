import type { GameConfig } from '@/config/GameConfig';
import type { DrawSurface } from '@/core/DrawSurface';
import { createGameContext, type GameContext } from '@/core/GameContext';
import type { InputEvent } from '@/core/InputEvents';
import { MathRandom, SeededRandom, type RandomSource } from '@/core/random';
import { InputCoordinator } from '@/systems/InputCoordinator';
import { SpawnScheduler } from '@/systems/SpawnScheduler';
import type { AudioSink } from '@/systems/SoundManager';
import { drawHud } from '@/ui/Hud';

export interface SessionOptions {
  config: GameConfig;
  audio: AudioSink;
  rng?: RandomSource;
}

export function randomSourceFor(config: GameConfig): RandomSource {
  return config.seed === null ? MathRandom : new SeededRandom(config.seed);
}

/**
 * One run of the game, independent of how frames are timed, where input
 * comes from or what draws the result.
 */
export class Session {
  readonly context: GameContext;
  private readonly scheduler: SpawnScheduler;
  private readonly coordinator: InputCoordinator;

  constructor(options: SessionOptions) {
    this.context = createGameContext();
    this.scheduler = new SpawnScheduler(options.config, options.rng ?? randomSourceFor(options.config));
    this.coordinator = new InputCoordinator(options.audio);
  }

  /**
   * Runs a frame: input, spawn, zombie update, render. Returns false once
   * quit has been requested; the frame still completes.
   */
  frame(now: number, events: readonly InputEvent[], surface: DrawSurface): boolean {
    const ctx = this.context;

    this.coordinator.handleAll(ctx, events, now);
    this.scheduler.update(ctx, now);

    ctx.zombie?.draw(surface, now);
    drawHud(surface, ctx.score, this.coordinator.audioSupported);

    return ctx.running;
  }
}
