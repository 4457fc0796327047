/**
 * Guards and conversion of unknown thrown values to AppErrors
 */

import { AppError } from './base-error';
import { NotFoundError, OperationError, InternalError } from './errors';

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isOperationalError(error: unknown): boolean {
  return isAppError(error) && error.isOperational;
}

export function getErrorMessage(error: unknown): string {
  if (isErrorLike(error)) {
    return error.message;
  }
  return String(error);
}

/**
 * Known file-system codes map to operational errors; anything else is an
 * internal, non-operational error.
 */
export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }

  // errors raised by Node's fs may come from another realm under test runners
  if (isErrorLike(error)) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    const name = typeof error.name === 'string' ? error.name : 'Error';

    if (code === 'ENOENT') {
      return new NotFoundError(error.message, { originalError: name, code });
    }
    if (code === 'EACCES' || code === 'EPERM') {
      return new OperationError(error.message, { originalError: name, code });
    }

    const wrapped = new InternalError(error.message, { originalError: name });
    wrapped.isOperational = false;
    return wrapped;
  }

  const wrapped = new InternalError('An unexpected error occurred', { error: String(error) });
  wrapped.isOperational = false;
  return wrapped;
}

function isErrorLike(error: unknown): error is { message: string; name?: unknown; code?: unknown } {
  return (
    typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string'
  );
}
