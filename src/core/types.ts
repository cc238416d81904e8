export interface Point {
  x: number;
  y: number;
}

/** Inclusive integer range. */
export interface Range {
  min: number;
  max: number;
}
