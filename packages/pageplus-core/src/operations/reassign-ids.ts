import type { ReadingOrderMode } from '../models/page';
import type { PageOperation } from './types';
import { emptyStats } from './types';

export function reassignIdsOperation(mode: ReadingOrderMode = 'auto'): PageOperation {
  return {
    name: 'reassign_ids',
    apply(page, logger) {
      const mapping = page.reassignIds(mode);
      let renamed = 0;
      for (const [oldId, newId] of mapping) {
        if (oldId !== newId) {
          renamed++;
        }
      }
      logger.debug(`Reassigned ${mapping.size} region id(s)`, { mode, renamed });
      return { ...emptyStats(), lines: page.counter('textlines'), changed: renamed };
    },
  };
}
