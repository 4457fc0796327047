import { GeometryError } from '@pageplus/errors';
import { err, ok, Result } from '../result';
import { intersectRings, largestRing } from './clipping';
import { distinctPoints, ringArea } from './points';
import type { Ring } from './types';

/**
 * Clip `polygon` to `parent`. The largest piece of the intersection is kept;
 * an empty intersection is a failure for the calling line.
 */
export function fitIntoParent(polygon: Ring, parent: Ring): Result<Ring> {
  if (distinctPoints(parent).length < 3) {
    return err(new GeometryError('Parent boundary has fewer than 3 distinct points'));
  }
  if (distinctPoints(polygon).length < 3) {
    return err(new GeometryError('Polygon has fewer than 3 distinct points'));
  }

  const clipped = largestRing(intersectRings(polygon, parent));
  if (!clipped || ringArea(clipped) === 0) {
    return err(new GeometryError('Polygon does not intersect its parent boundary'));
  }
  return ok(clipped);
}
