import type { PageOperation } from './types';
import { emptyStats } from './types';

export interface SortAndMergeOptions {
  gapX?: number;
  gapY?: number;
}

export function sortAndMergeOperation(options: SortAndMergeOptions = {}): PageOperation {
  const { gapX = 64, gapY = 10 } = options;
  return {
    name: 'sort_and_merge',
    apply(page, logger) {
      const stats = { ...emptyStats(), merged: 0 };
      for (const region of page.regions()) {
        region.sortLines();
        const merged = region.mergeSplittedLines(gapX, gapY);
        if (merged > 0) {
          logger.debug(`${region.id}: merged ${merged} line(s)`, { regionId: region.id, merged });
        }
        stats.merged += merged;
        stats.changed += merged;
        stats.lines += region.counter('textlines');
      }
      return stats;
    },
  };
}
