export type { OperationStats, PageOperation } from './types';
export { emptyStats } from './types';
export { runLineSteps, cutOverlapWithPredecessor } from './line-steps';
export type { LineStep } from './line-steps';
export { repairOperation, REPAIR_TOLERANCE } from './repair';
export { extendLinesOperation } from './extend-lines';
export type { ExtendLinesOptions } from './extend-lines';
export { pseudoLinePolygonOperation } from './pseudo-line-polygon';
export type { PseudoLinePolygonOptions } from './pseudo-line-polygon';
export { sortAndMergeOperation } from './sort-and-merge';
export type { SortAndMergeOptions } from './sort-and-merge';
export { deleteTextOperation, deleteTextLinesOperation } from './delete-text';
export { reassignIdsOperation } from './reassign-ids';
export { translateLinesOperation } from './translate-lines';
export type { TranslateLinesOptions } from './translate-lines';
export { runBatch, runFiles, exportFulltext } from './batch';
export type { BatchReport, FileReport, FileStatus, BatchHooks, BatchOptions, FileTask } from './batch';
