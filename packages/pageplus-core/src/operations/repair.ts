import { OK } from '../result';
import type { PageOperation } from './types';
import { emptyStats } from './types';
import { runLineSteps } from './line-steps';

export const REPAIR_TOLERANCE = 1;

/**
 * Clean up line geometry: drop near-duplicate polygon vertices, replace
 * invalid polygons by their convex hull and check the baseline.
 */
export function repairOperation(): PageOperation {
  return {
    name: 'repair',
    apply(page, logger) {
      const stats = emptyStats();
      for (const region of page.regions()) {
        for (const line of region.lines) {
          runLineSteps(
            line,
            [
              (l) => l.removeRepeatedPoints(REPAIR_TOLERANCE),
              (l) => (l.validateRegion() ? OK : l.convexHull()),
              (l) => l.validateBaseline(),
            ],
            logger,
            stats
          );
        }
        if (region.counter('textlines') === 0) {
          logger.info(`${region.id}: Region contains no text lines`, { regionId: region.id });
        }
      }
      return stats;
    },
  };
}
