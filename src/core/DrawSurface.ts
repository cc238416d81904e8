/**
 * Immediate-mode drawing primitives in absolute canvas pixels. Game code
 * draws against this; the pixi implementation lives in `PixiSurface`.
 */
export interface DrawSurface {
  circle(x: number, y: number, radius: number, color: number, alpha?: number): void;
  /** Stroked circle outline. */
  ring(x: number, y: number, radius: number, color: number, width: number): void;
  /** Filled ellipse centered on (x, y). */
  ellipse(x: number, y: number, width: number, height: number, color: number): void;
  rect(x: number, y: number, width: number, height: number, color: number): void;
  line(x1: number, y1: number, x2: number, y2: number, color: number, width: number): void;
  text(value: string, x: number, y: number, color: number, size: number): void;
}
