import type { Point } from './types';

export type InputEvent =
  | { type: 'quit' }
  | { type: 'keydown'; key: string }
  | { type: 'pointerdown'; button: number; position: Point };

export const quitEvent = (): InputEvent => ({ type: 'quit' });

export const keyDown = (key: string): InputEvent => ({ type: 'keydown', key });

export const pointerDown = (button: number, x: number, y: number): InputEvent => ({
  type: 'pointerdown',
  button,
  position: { x, y },
});
