/**
 * Resolve the overlap between two neighbouring line polygons.
 */

import { difference, intersection } from 'polygon-clipping';
import { largestRing, toClipPolygon } from './clipping';
import { boxRing, bounds, centroid, meanY, ringArea } from './points';
import type { LineString, Ring } from './types';

export interface OverlapHints {
  /** Baseline of the first ring's line */
  baselineA?: LineString;
  /** Baseline of the second ring's line */
  baselineB?: LineString;
}

/**
 * Cut the shared area of `a` and `b` along a straight line and give each
 * ring only the part on its own side.
 *
 * Vertically stacked rings are cut horizontally at the middle of the
 * overlap's vertical extent. When both baselines are known and that middle
 * is not strictly between them, the midpoint of the two baselines is used.
 * Side-by-side rings are cut vertically at the middle of the overlap.
 * Rings without a shared area are returned unchanged.
 */
export function splitOverlappingRings(a: Ring, b: Ring, hints: OverlapHints = {}): [Ring, Ring] {
  if (a.length < 3 || b.length < 3) {
    return [a, b];
  }
  const overlap = largestRing(intersection(toClipPolygon(a), toClipPolygon(b)));
  if (!overlap || ringArea(overlap) === 0) {
    return [a, b];
  }

  const [ax, ay] = centroid(a);
  const [bx, by] = centroid(b);
  const stacked = Math.abs(by - ay) >= Math.abs(bx - ax);
  const shared = bounds(overlap);
  const extent = bounds([...a, ...b]);
  extent.minX -= 1;
  extent.minY -= 1;
  extent.maxX += 1;
  extent.maxY += 1;

  let sideA: Ring;
  let sideB: Ring;
  if (stacked) {
    let cut = (shared.minY + shared.maxY) / 2;
    let aAbove = ay <= by;
    const { baselineA, baselineB } = hints;
    if (baselineA && baselineA.length > 0 && baselineB && baselineB.length > 0) {
      const ya = meanY(baselineA);
      const yb = meanY(baselineB);
      if (ya !== yb) {
        aAbove = ya < yb;
        if (!(cut > Math.min(ya, yb) && cut < Math.max(ya, yb))) {
          cut = (ya + yb) / 2;
        }
      }
    }
    const above = boxRing({ ...extent, maxY: cut });
    const below = boxRing({ ...extent, minY: cut });
    [sideA, sideB] = aAbove ? [above, below] : [below, above];
  } else {
    const cut = (shared.minX + shared.maxX) / 2;
    const left = boxRing({ ...extent, maxX: cut });
    const right = boxRing({ ...extent, minX: cut });
    [sideA, sideB] = ax <= bx ? [left, right] : [right, left];
  }

  const sharedPolygon = toClipPolygon(overlap);
  const aLoses = intersection(sharedPolygon, toClipPolygon(sideB));
  const bLoses = intersection(sharedPolygon, toClipPolygon(sideA));
  const aCut = aLoses.length > 0 ? largestRing(difference(toClipPolygon(a), aLoses)) : a;
  const bCut = bLoses.length > 0 ? largestRing(difference(toClipPolygon(b), bLoses)) : b;

  return [aCut ?? a, bCut ?? b];
}
