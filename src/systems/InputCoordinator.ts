import type { GameContext } from '@/core/GameContext';
import type { InputEvent } from '@/core/InputEvents';
import { createLogger } from '@/core/logger';
import type { Point } from '@/core/types';
import { KEY_MUTE, KEY_QUIT, PRIMARY_BUTTON } from '@/config/constants';
import type { AudioSink } from './SoundManager';

const log = createLogger('input');

/**
 * Applies one frame's input to the game context: hit-testing, scoring,
 * mute and quit.
 */
export class InputCoordinator {
  private readonly audio: AudioSink;

  constructor(audio: AudioSink) {
    this.audio = audio;
  }

  get audioSupported(): boolean {
    return this.audio.supported;
  }

  /** Handles events strictly in arrival order. */
  handleAll(ctx: GameContext, events: readonly InputEvent[], now: number): void {
    for (const event of events) {
      this.handle(ctx, event, now);
    }
  }

  handle(ctx: GameContext, event: InputEvent, now: number): void {
    switch (event.type) {
      case 'quit':
        this.requestQuit(ctx, 'window closed');
        break;
      case 'keydown':
        this.handleKey(ctx, event.key);
        break;
      case 'pointerdown':
        if (event.button === PRIMARY_BUTTON) {
          this.handleClick(ctx, event.position, now);
        }
        break;
    }
  }

  private handleKey(ctx: GameContext, key: string): void {
    if (key === KEY_QUIT) {
      this.requestQuit(ctx, 'escape pressed');
    } else if (key === KEY_MUTE && this.audio.supported) {
      ctx.muted = !ctx.muted;
      log.debug({ muted: ctx.muted }, 'Mute toggled');
    }
  }

  private handleClick(ctx: GameContext, position: Point, now: number): void {
    const zombie = ctx.zombie;
    if (zombie === null) return;

    if (zombie.isClickable() && zombie.hitTest(position)) {
      zombie.registerHit(now);
      ctx.score.recordHit();
      log.debug({ id: zombie.id, hits: ctx.score.hits }, 'Hit');
      if (!ctx.muted) {
        this.audio.play();
      }
      return;
    }

    // Only clicks during active play count against the player
    if (zombie.phase === 'spawning' || zombie.phase === 'alive') {
      ctx.score.recordMiss();
      log.debug({ id: zombie.id, misses: ctx.score.misses }, 'Miss');
    }
  }

  private requestQuit(ctx: GameContext, reason: string): void {
    if (!ctx.running) return;
    ctx.running = false;
    log.info({ reason }, 'Quit requested');
  }
}
