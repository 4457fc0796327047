/**
 * Boolean polygon operations on rings, backed by polygon-clipping.
 */

import { intersection, union } from 'polygon-clipping';
import type { MultiPolygon, Polygon as ClipPolygon } from 'polygon-clipping';
import type { Ring } from './types';
import { normalizeRing, ringArea } from './points';

export function toClipPolygon(ring: Ring): ClipPolygon {
  return [[...ring.map(([x, y]): [number, number] => [x, y]), [ring[0][0], ring[0][1]]]];
}

/**
 * Outer rings of every piece, largest first.
 */
export function outerRings(result: MultiPolygon): Ring[] {
  return result
    .map((polygon) => normalizeRing(polygon[0]))
    .filter((ring) => ring.length >= 3)
    .sort((a, b) => ringArea(b) - ringArea(a));
}

export function largestRing(result: MultiPolygon): Ring | undefined {
  return outerRings(result)[0];
}

export function unionRings(rings: Ring[]): MultiPolygon {
  const polygons = rings.filter((ring) => ring.length >= 3).map(toClipPolygon);
  if (polygons.length === 0) {
    return [];
  }
  const [first, ...rest] = polygons;
  return union(first, ...rest);
}

export function intersectRings(a: Ring, b: Ring): MultiPolygon {
  return intersection(toClipPolygon(a), toClipPolygon(b));
}
