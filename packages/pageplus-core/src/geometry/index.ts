export type { Point, LineString, Ring, Bounds, BufferDirection, BufferOptions, BufferInput } from './types';
export {
  parsePoints,
  formatPoints,
  distance,
  samePoint,
  distinctPoints,
  bounds,
  boxRing,
  signedArea,
  ringArea,
  centroid,
  lineLength,
  meanY,
  translate,
  removeRepeatedPoints,
  removeCollinear,
  normalizeRing,
  segmentsIntersect,
  isSimpleRing,
} from './points';
export { convexHull } from './convex-hull';
export { buffer, structuringElement, ROUND_SEGMENTS } from './buffer';
export { fitIntoParent } from './fit';
export { splitOverlappingRings } from './overlap';
export type { OverlapHints } from './overlap';
export { unionRings, intersectRings, largestRing, outerRings, toClipPolygon } from './clipping';
