import type { PageOperation } from './types';
import { emptyStats } from './types';
import { runLineSteps } from './line-steps';

export interface TranslateLinesOptions {
  xoff?: number;
  yoff?: number;
}

/**
 * Center every line polygon on its baseline, then shift the line.
 */
export function translateLinesOperation(options: TranslateLinesOptions = {}): PageOperation {
  const { xoff = 0, yoff = 0 } = options;
  return {
    name: 'translate_lines',
    apply(page, logger) {
      const stats = emptyStats();
      for (const region of page.regions()) {
        for (const line of region.lines) {
          runLineSteps(
            line,
            [(l) => l.placeTextLinePolygonOverBaseline(), (l) => l.translate(xoff, yoff)],
            logger,
            stats
          );
        }
      }
      return stats;
    },
  };
}
