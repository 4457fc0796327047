/**
 * Point and ring helpers
 */

import type { Bounds, LineString, Point, Ring } from './types';

const POINT_PATTERN = /^(-?\d+(?:\.\d+)?),(-?\d+(?:\.\d+)?)$/;

/**
 * Parse a PAGE `points` attribute ("x1,y1 x2,y2 ...").
 * Returns undefined when any token is malformed.
 */
export function parsePoints(value: string | null | undefined): Point[] | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const tokens = value.trim().split(/\s+/).filter((token) => token.length > 0);
  const points: Point[] = [];
  for (const token of tokens) {
    const match = POINT_PATTERN.exec(token);
    if (!match) {
      return undefined;
    }
    points.push([Number(match[1]), Number(match[2])]);
  }
  return points;
}

/**
 * Format points for a PAGE `points` attribute. Coordinates are rounded and
 * clamped to the non-negative integers the schema allows.
 */
export function formatPoints(points: Point[]): string {
  return points
    .map(([x, y]) => `${Math.max(0, Math.round(x))},${Math.max(0, Math.round(y))}`)
    .join(' ');
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(b[0] - a[0], b[1] - a[1]);
}

export function samePoint(a: Point, b: Point): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

export function distinctPoints(points: Point[]): Point[] {
  const seen = new Set<string>();
  const result: Point[] = [];
  for (const point of points) {
    const key = `${point[0]},${point[1]}`;
    if (!seen.has(key)) {
      seen.add(key);
      result.push(point);
    }
  }
  return result;
}

export function bounds(points: Point[]): Bounds {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const [x, y] of points) {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  }
  return { minX, minY, maxX, maxY };
}

/**
 * Signed shoelace area; the sign depends on vertex order.
 */
export function signedArea(ring: Ring): number {
  let sum = 0;
  for (let i = 0; i < ring.length; i++) {
    const [x1, y1] = ring[i];
    const [x2, y2] = ring[(i + 1) % ring.length];
    sum += x1 * y2 - x2 * y1;
  }
  return sum / 2;
}

export function ringArea(ring: Ring): number {
  return Math.abs(signedArea(ring));
}

/**
 * Area centroid of a ring, falling back to the vertex mean for zero-area input.
 */
export function centroid(ring: Ring): Point {
  const area = signedArea(ring);
  if (ring.length < 3 || area === 0) {
    const sumX = ring.reduce((sum, [x]) => sum + x, 0);
    const sumY = ring.reduce((sum, [, y]) => sum + y, 0);
    return [sumX / ring.length, sumY / ring.length];
  }
  let cx = 0;
  let cy = 0;
  for (let i = 0; i < ring.length; i++) {
    const [x1, y1] = ring[i];
    const [x2, y2] = ring[(i + 1) % ring.length];
    const cross = x1 * y2 - x2 * y1;
    cx += (x1 + x2) * cross;
    cy += (y1 + y2) * cross;
  }
  return [cx / (6 * area), cy / (6 * area)];
}

export function lineLength(line: LineString): number {
  let length = 0;
  for (let i = 1; i < line.length; i++) {
    length += distance(line[i - 1], line[i]);
  }
  return length;
}

export function meanY(points: Point[]): number {
  return points.reduce((sum, [, y]) => sum + y, 0) / points.length;
}

export function translate(points: Point[], xoff: number, yoff: number): Point[] {
  return points.map(([x, y]) => [x + xoff, y + yoff]);
}

/**
 * Collapse consecutive vertices closer than `tolerance` into the first one.
 * The closing edge is checked as well, so no two neighbours on the ring are
 * closer than `tolerance` afterwards.
 */
export function removeRepeatedPoints(ring: Ring, tolerance: number): Ring {
  if (ring.length === 0) {
    return [];
  }
  const kept: Ring = [ring[0]];
  for (let i = 1; i < ring.length; i++) {
    if (distance(kept[kept.length - 1], ring[i]) >= tolerance) {
      kept.push(ring[i]);
    }
  }
  while (kept.length > 1 && distance(kept[kept.length - 1], kept[0]) < tolerance) {
    kept.pop();
  }
  return kept;
}

export function boxRing({ minX, minY, maxX, maxY }: Bounds): Ring {
  return [[minX, minY], [maxX, minY], [maxX, maxY], [minX, maxY]];
}

/**
 * Drop vertices lying on the straight line between their neighbours.
 */
export function removeCollinear(ring: Ring): Ring {
  if (ring.length <= 3) {
    return ring;
  }
  const kept = ring.filter((point, i) => {
    const prev = ring[(i - 1 + ring.length) % ring.length];
    const next = ring[(i + 1) % ring.length];
    return orientation(prev, point, next) !== 0;
  });
  return kept.length >= 3 ? kept : ring;
}

/**
 * Strip a repeated closing vertex and collinear vertices, and start the ring
 * at its top-most, then left-most vertex.
 */
export function normalizeRing(ring: Ring): Ring {
  let open = ring;
  if (open.length > 1 && samePoint(open[0], open[open.length - 1])) {
    open = open.slice(0, -1);
  }
  open = removeCollinear(open);
  if (open.length === 0) {
    return [];
  }
  let start = 0;
  for (let i = 1; i < open.length; i++) {
    const [x, y] = open[i];
    const [sx, sy] = open[start];
    if (y < sy || (y === sy && x < sx)) {
      start = i;
    }
  }
  return [...open.slice(start), ...open.slice(0, start)];
}

function orientation(a: Point, b: Point, c: Point): number {
  return (b[0] - a[0]) * (c[1] - a[1]) - (b[1] - a[1]) * (c[0] - a[0]);
}

function onSegment(a: Point, b: Point, p: Point): boolean {
  return (
    Math.min(a[0], b[0]) <= p[0] && p[0] <= Math.max(a[0], b[0]) &&
    Math.min(a[1], b[1]) <= p[1] && p[1] <= Math.max(a[1], b[1])
  );
}

export function segmentsIntersect(p1: Point, p2: Point, p3: Point, p4: Point): boolean {
  const d1 = orientation(p3, p4, p1);
  const d2 = orientation(p3, p4, p2);
  const d3 = orientation(p1, p2, p3);
  const d4 = orientation(p1, p2, p4);

  if (((d1 > 0 && d2 < 0) || (d1 < 0 && d2 > 0)) && ((d3 > 0 && d4 < 0) || (d3 < 0 && d4 > 0))) {
    return true;
  }
  return (
    (d1 === 0 && onSegment(p3, p4, p1)) ||
    (d2 === 0 && onSegment(p3, p4, p2)) ||
    (d3 === 0 && onSegment(p1, p2, p3)) ||
    (d4 === 0 && onSegment(p1, p2, p4))
  );
}

/**
 * A ring is simple when it has at least three distinct vertices, a non-zero
 * area, no folded-back neighbouring edges and no touching non-neighbouring edges.
 */
export function isSimpleRing(ring: Ring): boolean {
  const open = ring.filter((point, i) => i === 0 || !samePoint(point, ring[i - 1]));
  if (open.length > 1 && samePoint(open[0], open[open.length - 1])) {
    open.pop();
  }
  const n = open.length;
  if (n < 3 || distinctPoints(open).length < 3 || ringArea(open) === 0) {
    return false;
  }

  for (let i = 0; i < n; i++) {
    const a = open[i];
    const b = open[(i + 1) % n];
    const c = open[(i + 2) % n];
    // spike: the next edge runs back over this one
    if (orientation(a, b, c) === 0 && (c[0] - b[0]) * (b[0] - a[0]) + (c[1] - b[1]) * (b[1] - a[1]) < 0) {
      return false;
    }
  }

  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      const neighbours = j === i + 1 || (i === 0 && j === n - 1);
      if (neighbours) {
        continue;
      }
      if (segmentsIntersect(open[i], open[(i + 1) % n], open[j], open[(j + 1) % n])) {
        return false;
      }
    }
  }
  return true;
}
