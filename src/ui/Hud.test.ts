import { describe, it, expect } from 'vitest';
import { drawHud, hudLines } from './Hud';
import { ScoreBoard } from '@/systems/ScoreBoard';
import { RecordingSurface } from '@/testing/RecordingSurface';

function scoreOf(hits: number, misses: number): ScoreBoard {
  const score = new ScoreBoard();
  for (let i = 0; i < hits; i++) score.recordHit();
  for (let i = 0; i < misses; i++) score.recordMiss();
  return score;
}

describe('hudLines', () => {
  it('shows zero accuracy before any click', () => {
    expect(hudLines(new ScoreBoard(), true)).toEqual([
      'Hits: 0',
      'Misses: 0',
      'Accuracy: 0.0%',
      'Press M to mute',
    ]);
  });

  it('rounds accuracy to one decimal', () => {
    expect(hudLines(scoreOf(2, 1), true)[2]).toBe('Accuracy: 66.7%');
    expect(hudLines(scoreOf(1, 0), true)[2]).toBe('Accuracy: 100.0%');
  });

  it('reports missing sound', () => {
    expect(hudLines(new ScoreBoard(), false)[3]).toBe('Sound unavailable');
  });
});

describe('drawHud', () => {
  it('stacks lines in the top-left corner', () => {
    const surface = new RecordingSurface();
    drawHud(surface, scoreOf(3, 1), false);

    expect(surface.calls).toEqual([
      { op: 'text', value: 'Hits: 3', x: 12, y: 12, color: 0xe6ebf5, size: 22 },
      { op: 'text', value: 'Misses: 1', x: 12, y: 36, color: 0xe6ebf5, size: 22 },
      { op: 'text', value: 'Accuracy: 75.0%', x: 12, y: 60, color: 0xe6ebf5, size: 22 },
      { op: 'text', value: 'Sound unavailable', x: 12, y: 84, color: 0xe6ebf5, size: 22 },
    ]);
  });
});
