import type { Logger } from '@pageplus/logger';
import type { Page } from '../models/page';

export interface OperationStats {
  /** Lines visited */
  lines: number;
  /** Lines, elements or ids the operation changed */
  changed: number;
  /** Lines whose geometry step failed and was rolled back */
  failed: number;
  /** Lines absorbed by merges */
  merged?: number;
}

/**
 * One modification verb applied to a loaded page.
 */
export interface PageOperation {
  readonly name: string;
  apply(page: Page, logger: Logger): OperationStats;
}

export function emptyStats(): OperationStats {
  return { lines: 0, changed: 0, failed: 0 };
}
