import type { Point } from '@/core/types';

// Display
export const GAME_WIDTH = 900;
export const GAME_HEIGHT = 600;

// Timing
export const FPS = 60;

// Zombie lifetime (ms, inclusive range)
export const ZOMBIE_LIFETIME_MIN = 800;
export const ZOMBIE_LIFETIME_MAX = 1500;

// Pause between a despawn and the next spawn (ms, inclusive range)
export const RESPAWN_GAP_MIN = 220;
export const RESPAWN_GAP_MAX = 520;

// Zombie
export const ZOMBIE_BASE_RADIUS = 48;
export const HITBOX_FACTOR = 0.95; // hitbox is slightly tighter than the drawn head

// Animation durations (ms)
export const SPAWN_ANIM_MS = 180;
export const DESPAWN_ANIM_MS = 220;

// Spawn points spread over the playfield
export const SPAWN_POINTS: readonly Point[] = [
  { x: 150, y: 160 },
  { x: 300, y: 140 },
  { x: 450, y: 170 },
  { x: 600, y: 150 },
  { x: 750, y: 170 },
  { x: 220, y: 320 },
  { x: 420, y: 300 },
  { x: 620, y: 330 },
  { x: 780, y: 310 },
  { x: 320, y: 480 },
  { x: 500, y: 470 },
  { x: 700, y: 500 },
];
export const MIN_SPAWN_POINTS = 6;

// HUD
export const HUD_X = 12;
export const HUD_Y = 12;
export const HUD_LINE_HEIGHT = 24;
export const HUD_FONT_SIZE = 22;

// Key bindings (KeyboardEvent.code)
export const KEY_QUIT = 'Escape';
export const KEY_MUTE = 'KeyM';

// Primary mouse button (MouseEvent.button)
export const PRIMARY_BUTTON = 0;

// Hit sound
export const BLIP_SAMPLE_RATE = 22050;
export const BLIP_DURATION = 0.08; // seconds
export const BLIP_FREQUENCY = 880;
export const BLIP_DECAY = 18;
export const BLIP_AMPLITUDE = 0.6;

// Colors (no assets - just hex values)
export const COLOR_BACKGROUND = 0x181c26;
export const COLOR_HUD = 0xe6ebf5;
export const COLOR_HOLE_OUTER = 0x12141a;
export const COLOR_HOLE_INNER = 0x1c212b;

export const ZOMBIE_COLORS = {
  skin: 0x8dc73f,
  shadow: 0x5e862d,
  eye: 0xf5f5f5,
  pupil: 0x141414,
  scar: 0xb73e3e,
  mouth: 0x3c1414,
  tooth: 0xebebeb,
  dropShadow: 0x000000,
} as const;
