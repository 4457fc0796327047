import type { PageOperation } from './types';
import { emptyStats } from './types';
import { cutOverlapWithPredecessor, runLineSteps } from './line-steps';
import type { LineStep } from './line-steps';

export interface PseudoLinePolygonOptions {
  /** Buffer above and below the baseline in pixels (default: 16) */
  buffersize?: number;
  /** Downward shift of the baseline after the polygon is built (default: 10) */
  baselineOffset?: number;
  cutOverlaps?: boolean;
}

/**
 * Rebuild every line polygon from its baseline. Lines are sorted first so
 * that neighbours in the region are neighbours on the page.
 */
export function pseudoLinePolygonOperation(options: PseudoLinePolygonOptions = {}): PageOperation {
  const { buffersize = 16, baselineOffset = 10, cutOverlaps = false } = options;
  return {
    name: 'pseudolinepolygon',
    apply(page, logger) {
      const stats = emptyStats();
      for (const region of page.regions()) {
        region.sortLines();
        region.lines.forEach((line, idx) => {
          const steps: LineStep[] = [
            (l) => l.computePseudoTextLinePolygon(buffersize),
            (l) => l.translateBaseline(baselineOffset),
            (l) => l.fitIntoParent(),
            (l) => l.extendBaseline(),
          ];
          if (cutOverlaps && idx > 0) {
            steps.push(cutOverlapWithPredecessor(region.lines[idx - 1]));
          }
          runLineSteps(line, steps, logger, stats);
        });
      }
      return stats;
    },
  };
}
