export { TextLine } from './text-line';
export type { LineGeometry, LineCountLevel } from './text-line';
export { TextRegion, TableCell, mergeLinePolygons, DEFAULT_ROW_TOLERANCE } from './text-region';
export type { RegionCountLevel } from './text-region';
export { TableRegion } from './table-region';
export type { TableCountLevel } from './table-region';
export { Page } from './page';
export type {
  ReadingOrderMode,
  PageCountLevel,
  TextLevel,
  FulltextLevel,
  FulltextOptions,
} from './page';
export { dehyphenate } from './dehyphenate';
