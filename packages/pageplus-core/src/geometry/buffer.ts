/**
 * Buffer (offset) of baselines and line polygons.
 *
 * The rounded buffer is built as a Minkowski sum: every segment is swept by
 * a structuring element (a 16-gon for `all`, a short axis-parallel segment
 * for `x`/`y`), each sweep is the convex hull of the element placed at both
 * segment ends, and the sweeps are united.
 */

import { GeometryError } from '@pageplus/errors';
import { err, ok, Result } from '../result';
import { convexHull } from './convex-hull';
import { largestRing, unionRings } from './clipping';
import { bounds, distinctPoints, isSimpleRing, ringArea } from './points';
import type { BufferDirection, BufferInput, BufferOptions, Point, Ring } from './types';

export const ROUND_SEGMENTS = 16;

/**
 * Structuring element centred on the origin. The polygon for `all`
 * circumscribes the disc of radius `distance`, so every direction grows by
 * at least `distance`.
 */
export function structuringElement(distance: number, direction: BufferDirection): Point[] {
  switch (direction) {
    case 'x':
      return [[-distance, 0], [distance, 0]];
    case 'y':
      return [[0, -distance], [0, distance]];
    case 'all': {
      const radius = distance / Math.cos(Math.PI / ROUND_SEGMENTS);
      return Array.from({ length: ROUND_SEGMENTS }, (_, i): Point => {
        const angle = (2 * Math.PI * i) / ROUND_SEGMENTS + Math.PI / ROUND_SEGMENTS;
        return [radius * Math.cos(angle), radius * Math.sin(angle)];
      });
    }
  }
}

function sweep(element: Point[], from: Point, to: Point): Ring {
  const placed: Point[] = [];
  for (const [ex, ey] of element) {
    placed.push([from[0] + ex, from[1] + ey], [to[0] + ex, to[1] + ey]);
  }
  return convexHull(placed);
}

function rectangularBuffer(points: Point[], distance: number, direction: BufferDirection): Ring {
  const { minX, minY, maxX, maxY } = bounds(points);
  const dx = direction === 'y' ? 0 : distance;
  const dy = direction === 'x' ? 0 : distance;
  return [
    [minX - dx, minY - dy],
    [maxX + dx, minY - dy],
    [maxX + dx, maxY + dy],
    [minX - dx, maxY + dy],
  ];
}

/**
 * Offset a line or ring outwards by `distance` pixels.
 */
export function buffer(input: BufferInput, distance: number, options: BufferOptions = {}): Result<Ring> {
  const { direction = 'all', rectangular = false } = options;
  const points = input.points;

  if (distinctPoints(points).length < 2) {
    return err(new GeometryError('Cannot buffer fewer than 2 distinct points', { points: points.length }));
  }
  if (!(distance > 0)) {
    return err(new GeometryError('Buffer distance must be positive', { distance }));
  }

  if (rectangular) {
    const box = rectangularBuffer(points, distance, direction);
    if (ringArea(box) === 0) {
      return err(new GeometryError('Rectangular buffer is degenerate', { direction }));
    }
    return ok(box);
  }

  const element = structuringElement(distance, direction);
  const pieces: Ring[] = [];
  const segmentCount = input.kind === 'ring' ? points.length : points.length - 1;
  for (let i = 0; i < segmentCount; i++) {
    const piece = sweep(element, points[i], points[(i + 1) % points.length]);
    if (piece.length >= 3 && ringArea(piece) > 0) {
      pieces.push(piece);
    }
  }
  if (input.kind === 'ring') {
    pieces.push(isSimpleRing(points) ? points : convexHull(points));
  }

  const result = largestRing(unionRings(pieces));
  if (!result) {
    return err(new GeometryError('Buffer produced an empty polygon', { direction, distance }));
  }
  if (!isSimpleRing(result)) {
    const hull = convexHull(result);
    if (hull.length < 3) {
      return err(new GeometryError('Buffer produced a degenerate polygon', { direction, distance }));
    }
    return ok(hull);
  }
  return ok(result);
}
