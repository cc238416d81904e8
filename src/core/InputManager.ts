import { keyDown, pointerDown, quitEvent, type InputEvent } from './InputEvents';
import type { Point } from './types';

/**
 * Collects DOM input into a per-frame queue. Nothing is handled here;
 * the frame drains the queue and processes it in arrival order.
 */
export class InputManager {
  private queue: InputEvent[] = [];
  private readonly surface: HTMLElement;
  private readonly host: Window;
  private readonly width: number;
  private readonly height: number;

  constructor(surface: HTMLElement, width: number, height: number, host: Window = window) {
    this.surface = surface;
    this.host = host;
    this.width = width;
    this.height = height;

    this.surface.addEventListener('mousedown', this.onMouseDown);
    this.surface.addEventListener('contextmenu', this.onContextMenu);
    this.host.addEventListener('keydown', this.onKeyDown);
    this.host.addEventListener('pagehide', this.onPageHide);
  }

  private onMouseDown = (e: MouseEvent): void => {
    const { x, y } = this.toCanvas(e.clientX, e.clientY);
    this.queue.push(pointerDown(e.button, x, y));
  };

  private onContextMenu = (e: MouseEvent): void => {
    e.preventDefault();
  };

  private onKeyDown = (e: KeyboardEvent): void => {
    if (e.repeat) return;
    this.queue.push(keyDown(e.code));
  };

  private onPageHide = (): void => {
    this.queue.push(quitEvent());
  };

  // Client coordinates -> canvas pixels, accounting for CSS scaling
  private toCanvas(clientX: number, clientY: number): Point {
    const rect = this.surface.getBoundingClientRect();
    const scaleX = rect.width > 0 ? this.width / rect.width : 1;
    const scaleY = rect.height > 0 ? this.height / rect.height : 1;
    return {
      x: (clientX - rect.left) * scaleX,
      y: (clientY - rect.top) * scaleY,
    };
  }

  /** Returns every event queued since the last drain, oldest first. */
  drain(): InputEvent[] {
    const events = this.queue;
    this.queue = [];
    return events;
  }

  destroy(): void {
    this.surface.removeEventListener('mousedown', this.onMouseDown);
    this.surface.removeEventListener('contextmenu', this.onContextMenu);
    this.host.removeEventListener('keydown', this.onKeyDown);
    this.host.removeEventListener('pagehide', this.onPageHide);
    this.queue = [];
  }
}
