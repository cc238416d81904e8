import { Container, Graphics, Text, TextStyle } from 'pixi.js';
import type { DrawSurface } from '@/core/DrawSurface';

/**
 * DrawSurface backed by one pixi Graphics plus a pool of Text objects.
 * Call begin() before drawing a frame and end() after it.
 */
export class PixiSurface implements DrawSurface {
  private readonly container: Container;
  private readonly graphics: Graphics;
  private readonly textPool: Text[] = [];
  private textCursor = 0;

  constructor() {
    this.container = new Container();
    this.graphics = new Graphics();
    this.container.addChild(this.graphics);
  }

  getContainer(): Container {
    return this.container;
  }

  begin(): void {
    this.graphics.clear();
    this.textCursor = 0;
  }

  end(): void {
    // Hide pooled labels not used this frame
    for (let i = this.textCursor; i < this.textPool.length; i++) {
      this.textPool[i].visible = false;
    }
  }

  circle(x: number, y: number, radius: number, color: number, alpha = 1): void {
    this.graphics.circle(x, y, radius).fill({ color, alpha });
  }

  ring(x: number, y: number, radius: number, color: number, width: number): void {
    this.graphics.circle(x, y, radius).stroke({ width, color });
  }

  ellipse(x: number, y: number, width: number, height: number, color: number): void {
    this.graphics.ellipse(x, y, width / 2, height / 2).fill(color);
  }

  rect(x: number, y: number, width: number, height: number, color: number): void {
    this.graphics.rect(x, y, width, height).fill(color);
  }

  line(x1: number, y1: number, x2: number, y2: number, color: number, width: number): void {
    this.graphics.moveTo(x1, y1).lineTo(x2, y2).stroke({ width, color });
  }

  text(value: string, x: number, y: number, color: number, size: number): void {
    let label = this.textPool[this.textCursor];
    if (!label) {
      const style = new TextStyle({ fontFamily: 'Arial', fontSize: size, fill: color });
      label = new Text({ text: value, style });
      this.textPool.push(label);
      this.container.addChild(label);
    }
    this.textCursor++;

    if (label.text !== value) label.text = value;
    label.style.fill = color;
    label.style.fontSize = size;
    label.x = x;
    label.y = y;
    label.visible = true;
  }

  destroy(): void {
    this.container.destroy({ children: true });
    this.textPool.length = 0;
  }
}
