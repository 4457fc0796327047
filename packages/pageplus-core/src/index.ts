/**
 * @pageplus/core
 * PAGE-XML geometry engine: primitives, document models, operation drivers
 */

export * from './geometry';
export * from './models';
export * from './io';
export * from './operations';
export { ok, err, OK } from './result';
export type { Result } from './result';
