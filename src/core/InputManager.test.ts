// @vitest-environment happy-dom

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InputManager } from './InputManager';

describe('InputManager', () => {
  let canvas: HTMLCanvasElement;
  let input: InputManager;

  beforeEach(() => {
    canvas = document.createElement('canvas');
    document.body.appendChild(canvas);
    input = new InputManager(canvas, 900, 600, window);
  });

  afterEach(() => {
    input.destroy();
    canvas.remove();
  });

  it('starts with an empty queue', () => {
    expect(input.drain()).toEqual([]);
  });

  it('queues mouse presses with canvas coordinates', () => {
    canvas.dispatchEvent(new MouseEvent('mousedown', { button: 0, clientX: 120, clientY: 80 }));
    expect(input.drain()).toEqual([{ type: 'pointerdown', button: 0, position: { x: 120, y: 80 } }]);
  });

  it('queues key presses by code', () => {
    window.dispatchEvent(new KeyboardEvent('keydown', { code: 'KeyM', key: 'm' }));
    expect(input.drain()).toEqual([{ type: 'keydown', key: 'KeyM' }]);
  });

  it('turns page hide into a quit event', () => {
    window.dispatchEvent(new Event('pagehide'));
    expect(input.drain()).toEqual([{ type: 'quit' }]);
  });

  it('keeps arrival order and empties on drain', () => {
    canvas.dispatchEvent(new MouseEvent('mousedown', { button: 0, clientX: 1, clientY: 2 }));
    window.dispatchEvent(new KeyboardEvent('keydown', { code: 'Escape' }));
    canvas.dispatchEvent(new MouseEvent('mousedown', { button: 2, clientX: 3, clientY: 4 }));

    expect(input.drain().map((e) => e.type)).toEqual(['pointerdown', 'keydown', 'pointerdown']);
    expect(input.drain()).toEqual([]);
  });

  it('stops listening after destroy', () => {
    input.destroy();
    canvas.dispatchEvent(new MouseEvent('mousedown', { button: 0, clientX: 1, clientY: 2 }));
    window.dispatchEvent(new KeyboardEvent('keydown', { code: 'KeyM' }));
    expect(input.drain()).toEqual([]);
  });
});
