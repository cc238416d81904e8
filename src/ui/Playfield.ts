import type { DrawSurface } from '@/core/DrawSurface';
import type { Point } from '@/core/types';
import { COLOR_BACKGROUND, COLOR_HOLE_OUTER, COLOR_HOLE_INNER } from '@/config/constants';

/**
 * Static background: a flat fill with a two-tone hole under each spawn
 * point. Drawn once at startup.
 */
export function drawPlayfield(
  surface: DrawSurface,
  width: number,
  height: number,
  spawnPoints: readonly Point[]
): void {
  surface.rect(0, 0, width, height, COLOR_BACKGROUND);
  for (const { x, y } of spawnPoints) {
    surface.circle(x, y + 18, 58, COLOR_HOLE_OUTER);
    surface.circle(x, y + 14, 54, COLOR_HOLE_INNER);
  }
}
