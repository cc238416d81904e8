import type { DrawSurface } from '@/core/DrawSurface';
import type { ScoreBoard } from '@/systems/ScoreBoard';
import { COLOR_HUD, HUD_X, HUD_Y, HUD_LINE_HEIGHT, HUD_FONT_SIZE } from '@/config/constants';

export function hudLines(score: ScoreBoard, audioSupported: boolean): string[] {
  return [
    `Hits: ${score.hits}`,
    `Misses: ${score.misses}`,
    `Accuracy: ${score.accuracy().toFixed(1)}%`,
    audioSupported ? 'Press M to mute' : 'Sound unavailable',
  ];
}

// Stacked top-left, redrawn every frame
export function drawHud(surface: DrawSurface, score: ScoreBoard, audioSupported: boolean): void {
  hudLines(score, audioSupported).forEach((line, i) => {
    surface.text(line, HUD_X, HUD_Y + i * HUD_LINE_HEIGHT, COLOR_HUD, HUD_FONT_SIZE);
  });
}
