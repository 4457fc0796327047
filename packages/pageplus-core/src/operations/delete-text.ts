import type { TextLevel } from '../models/page';
import type { PageOperation } from './types';
import { emptyStats } from './types';

/**
 * Remove transcriptions at `level` (word, line or region).
 */
export function deleteTextOperation(level: TextLevel = 'region'): PageOperation {
  return {
    name: 'delete_text',
    apply(page, logger) {
      const removed = page.deleteTextlevel(level);
      logger.debug(`Removed ${removed} ${level}-level text element(s)`, { level, removed });
      return { ...emptyStats(), changed: removed };
    },
  };
}

export function deleteTextLinesOperation(): PageOperation {
  return {
    name: 'delete_textlines',
    apply(page) {
      const removed = page.deleteTextLines();
      return { ...emptyStats(), lines: removed, changed: removed };
    },
  };
}
