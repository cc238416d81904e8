import { performanceClock, type Clock } from './Clock';

export type FrameCallback = (now: number) => void;

export interface FrameScheduler {
  request(callback: () => void): number;
  cancel(handle: number): void;
}

export const animationFrameScheduler: FrameScheduler = {
  request: (callback) => requestAnimationFrame(() => callback()),
  cancel: (handle) => cancelAnimationFrame(handle),
};

export interface GameLoopOptions {
  fps: number;
  clock?: Clock;
  scheduler?: FrameScheduler;
}

/**
 * Fixed-rate frame loop. Display callbacks that arrive before the frame
 * budget has elapsed are skipped, so the frame callback runs at most
 * `fps` times per second. The clock is read once per executed frame.
 */
export class GameLoop {
  private lastFrame = 0;
  private isRunning = false;
  private handle: number | null = null;

  private readonly frameFn: FrameCallback;
  private readonly frameBudget: number;
  private readonly clock: Clock;
  private readonly scheduler: FrameScheduler;

  constructor(frameFn: FrameCallback, options: GameLoopOptions) {
    this.frameFn = frameFn;
    this.frameBudget = 1000 / options.fps;
    this.clock = options.clock ?? performanceClock;
    this.scheduler = options.scheduler ?? animationFrameScheduler;
  }

  get running(): boolean {
    return this.isRunning;
  }

  start(): void {
    if (this.isRunning) return;
    this.isRunning = true;
    this.lastFrame = -Infinity;
    this.handle = this.scheduler.request(this.loop);
  }

  stop(): void {
    this.isRunning = false;
    if (this.handle !== null) {
      this.scheduler.cancel(this.handle);
      this.handle = null;
    }
  }

  private loop = (): void => {
    this.handle = null;
    if (!this.isRunning) return;

    const now = this.clock.now();
    const elapsed = now - this.lastFrame;
    // 1 ms tolerance for display timestamp jitter
    if (elapsed >= this.frameBudget - 1) {
      // Carry the remainder so the pace holds on any refresh rate; re-anchor after a stall
      this.lastFrame = elapsed > 2 * this.frameBudget ? now : this.lastFrame + this.frameBudget;
      this.frameFn(now);
    }

    if (this.isRunning) {
      this.handle = this.scheduler.request(this.loop);
    }
  };
}
