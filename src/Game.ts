import { Application } from 'pixi.js';
import type { GameConfig } from '@/config/GameConfig';
import { COLOR_BACKGROUND } from '@/config/constants';
import { GameLoop } from '@/core/GameLoop';
import { InputManager } from '@/core/InputManager';
import { createLogger } from '@/core/logger';
import { Session } from '@/Session';
import { createAudioSink } from '@/systems/SoundManager';
import { PixiSurface } from '@/ui/PixiSurface';
import { drawPlayfield } from '@/ui/Playfield';

const log = createLogger('game');

export type ExitCode = 0;

export class Game {
  private app: Application;
  private config: GameConfig;

  // Created in init()
  private input: InputManager | null = null;
  private gameLoop: GameLoop | null = null;
  private session: Session | null = null;
  private settle: ((code: ExitCode) => void) | null = null;

  // Layers
  private background: PixiSurface | null = null;
  private foreground: PixiSurface | null = null;

  constructor(config: GameConfig) {
    this.config = config;
    this.app = new Application();
  }

  async init(parent: HTMLElement = document.body): Promise<void> {
    await this.app.init({
      width: this.config.width,
      height: this.config.height,
      backgroundColor: COLOR_BACKGROUND,
      antialias: true,
      // One render per loop iteration, driven by GameLoop
      autoStart: false,
    });

    parent.appendChild(this.app.canvas);

    // Background is drawn once and never touched again
    this.background = new PixiSurface();
    drawPlayfield(this.background, this.config.width, this.config.height, this.config.spawnPoints);
    this.app.stage.addChild(this.background.getContainer());

    this.foreground = new PixiSurface();
    this.app.stage.addChild(this.foreground.getContainer());

    this.input = new InputManager(this.app.canvas, this.config.width, this.config.height);
    this.session = new Session({ config: this.config, audio: createAudioSink() });
  }

  /**
   * Runs until quit is requested or the game is destroyed. Resolves with
   * the process-style exit code once the last frame has completed.
   */
  run(): Promise<ExitCode> {
    const { input, session, foreground } = this;
    if (!input || !session || !foreground) {
      return Promise.reject(new Error('Game.run() called before init()'));
    }

    log.info({ seed: this.config.seed, fps: this.config.fps }, 'Session started');

    return new Promise<ExitCode>((resolve) => {
      this.settle = resolve;
      const loop: GameLoop = new GameLoop(
        (now) => {
          foreground.begin();
          const keepRunning = session.frame(now, input.drain(), foreground);
          foreground.end();
          this.app.render();

          if (!keepRunning) {
            loop.stop();
            this.finish(session);
          }
        },
        { fps: this.config.fps }
      );
      this.gameLoop = loop;
      loop.start();
    });
  }

  private finish(session: Session): void {
    if (!this.settle) return;
    const { hits, misses } = session.context.score;
    log.info({ hits, misses, accuracy: session.context.score.accuracy() }, 'Session ended');
    this.settle(0);
    this.settle = null;
  }

  destroy(): void {
    this.gameLoop?.stop();
    if (this.session) this.finish(this.session);
    this.input?.destroy();
    this.background?.destroy();
    this.foreground?.destroy();
    this.app.destroy(true);
    this.gameLoop = null;
    this.input = null;
    this.session = null;
    this.background = null;
    this.foreground = null;
  }
}
