/**
 * @pageplus/errors
 * Unified error hierarchy for the PagePlus packages
 */

export { AppError, ErrorSeverity } from './base-error';
export type { ErrorContext } from './base-error';
export {
  NotFoundError,
  InputsNotFoundError,
  PageXmlError,
  GeometryError,
  SerializationError,
  OperationError,
  InternalError,
} from './errors';
export { isAppError, isOperationalError, getErrorMessage, toAppError } from './convert';
