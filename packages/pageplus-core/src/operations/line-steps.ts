/**
 * Per-line step runner shared by the geometry drivers.
 */

import type { Logger } from '@pageplus/logger';
import { OK } from '../result';
import type { Result } from '../result';
import type { TextLine } from '../models/text-line';
import type { OperationStats } from './types';

export type LineStep = (line: TextLine) => Result<void>;

/**
 * Run `steps` in order on `line`. The first failure stops the sequence,
 * rolls the line back to its geometry before the first step and is logged
 * with the line and region ids. Returns whether every step succeeded.
 */
export function runLineSteps(line: TextLine, steps: LineStep[], logger: Logger, stats: OperationStats): boolean {
  const before = line.snapshot();
  stats.lines++;
  for (const step of steps) {
    const result = step(line);
    if (!result.ok) {
      line.restore(before);
      stats.failed++;
      const error = result.error.withContext({ lineId: line.id, regionId: line.region.id });
      logger.error(`${line.id}: ${error.message}`, { ...error.context, code: error.code });
      return false;
    }
  }
  stats.changed++;
  return true;
}

/**
 * Split the overlap between `line` and the line before it in its region.
 */
export function cutOverlapWithPredecessor(predecessor: TextLine): LineStep {
  return (line) => {
    const previousRing = predecessor.polygon;
    const ring = line.polygon;
    if (!previousRing || !ring) {
      return OK;
    }
    const [previousCut, cut] = line.splitOverlappingLinearrings(previousRing, ring, predecessor.baseline);
    predecessor.polygon = previousCut;
    line.polygon = cut;
    return OK;
  };
}
