import type { DrawSurface } from '@/core/DrawSurface';

export type DrawCall =
  | { op: 'circle'; x: number; y: number; radius: number; color: number; alpha: number }
  | { op: 'ring'; x: number; y: number; radius: number; color: number; width: number }
  | { op: 'ellipse'; x: number; y: number; width: number; height: number; color: number }
  | { op: 'rect'; x: number; y: number; width: number; height: number; color: number }
  | { op: 'line'; x1: number; y1: number; x2: number; y2: number; color: number; width: number }
  | { op: 'text'; value: string; x: number; y: number; color: number; size: number };

/** DrawSurface that remembers every primitive, for assertions. */
export class RecordingSurface implements DrawSurface {
  calls: DrawCall[] = [];

  circle(x: number, y: number, radius: number, color: number, alpha = 1): void {
    this.calls.push({ op: 'circle', x, y, radius, color, alpha });
  }

  ring(x: number, y: number, radius: number, color: number, width: number): void {
    this.calls.push({ op: 'ring', x, y, radius, color, width });
  }

  ellipse(x: number, y: number, width: number, height: number, color: number): void {
    this.calls.push({ op: 'ellipse', x, y, width, height, color });
  }

  rect(x: number, y: number, width: number, height: number, color: number): void {
    this.calls.push({ op: 'rect', x, y, width, height, color });
  }

  line(x1: number, y1: number, x2: number, y2: number, color: number, width: number): void {
    this.calls.push({ op: 'line', x1, y1, x2, y2, color, width });
  }

  text(value: string, x: number, y: number, color: number, size: number): void {
    this.calls.push({ op: 'text', value, x, y, color, size });
  }

  texts(): string[] {
    const out: string[] = [];
    for (const call of this.calls) {
      if (call.op === 'text') out.push(call.value);
    }
    return out;
  }

  reset(): void {
    this.calls = [];
  }
}
