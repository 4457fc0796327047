import type { BufferDirection } from '../geometry';
import type { PageOperation } from './types';
import { emptyStats } from './types';
import { cutOverlapWithPredecessor, runLineSteps } from './line-steps';
import type { LineStep } from './line-steps';

export interface ExtendLinesOptions {
  /** Extension in pixels (default: 16) */
  distance?: number;
  dim?: BufferDirection;
  /** Use axis-aligned rectangles instead of rounded buffers (default: true) */
  rectify?: boolean;
  /** Split overlaps with the preceding line (default: true) */
  cutOverlaps?: boolean;
}

/**
 * Grow every line polygon (or baseline) by `distance`, clip it to the
 * region and resolve overlaps with the previous line of the region.
 */
export function extendLinesOperation(options: ExtendLinesOptions = {}): PageOperation {
  const { distance = 16, dim = 'all', rectify = true, cutOverlaps = true } = options;
  return {
    name: 'extend_lines',
    apply(page, logger) {
      const stats = emptyStats();
      for (const region of page.regions()) {
        region.lines.forEach((line, idx) => {
          const steps: LineStep[] = [(l) => l.buffer(distance, dim, rectify), (l) => l.fitIntoParent()];
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
