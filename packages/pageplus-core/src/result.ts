/**
 * Explicit success/failure values for per-line work.
 *
 * Geometry operations report failures through a Result so region-level
 * drivers can log and continue with the next line.
 */

import type { GeometryError } from '@pageplus/errors';

export type Result<T, E = GeometryError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export const OK: Result<void, never> = { ok: true, value: undefined };
