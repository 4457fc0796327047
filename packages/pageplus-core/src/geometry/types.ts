/**
 * Geometry types
 *
 * Coordinates are image pixels with the origin in the upper left corner,
 * x growing to the right and y growing downwards.
 */

export type Point = [number, number];

/** Open polyline, e.g. a baseline. */
export type LineString = Point[];

/**
 * Closed boundary stored open: the first vertex is not repeated at the end.
 */
export type Ring = Point[];

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

/**
 * Sides that receive the offset of a buffer operation.
 * `y` grows a line above and below only, `x` left and right only.
 */
export type BufferDirection = 'all' | 'x' | 'y';

export interface BufferOptions {
  direction?: BufferDirection;
  /** Axis-aligned box instead of a rounded offset */
  rectangular?: boolean;
}

export type BufferInput =
  | { kind: 'line'; points: LineString }
  | { kind: 'ring'; points: Ring };
