export type Easer = (t: number) => number;

export const clamp01 = (x: number): number => Math.min(1, Math.max(0, x));

const BACK_C1 = 1.70158;
const BACK_C3 = BACK_C1 + 1;

/** Overshoots past 1 near the end before settling. */
export const easeOutBack: Easer = (t) =>
  1 + BACK_C3 * Math.pow(t - 1, 3) + BACK_C1 * Math.pow(t - 1, 2);

export const linear: Easer = (t) => t;

/** Maps progress onto [from, to] through an easing curve. */
export function lerpEased(from: number, to: number, t: number, ease: Easer = linear): number {
  return from + (to - from) * ease(clamp01(t));
}
