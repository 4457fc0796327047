/**
 * Specific Error Classes
 * Domain-specific errors for PAGE-XML processing
 */

import { AppError, ErrorContext, ErrorSeverity } from './base-error';

export class NotFoundError extends AppError {
  code = 'NOT_FOUND';
  exitCode = 3;
  severity = ErrorSeverity.LOW;

  constructor(message: string, context?: ErrorContext) {
    super(message, context, 'Verify the path or identifier and try again');
  }
}

/**
 * Raised when an input set resolves to no PAGE-XML files at all.
 * Aborts a batch before any file is processed.
 */
export class InputsNotFoundError extends NotFoundError {
  code = 'INPUTS_NOT_FOUND';
  severity = ErrorSeverity.HIGH;

  constructor(inputs: string[], message = 'No PAGE-XML files found for the given inputs') {
    super(`${message}: ${inputs.length > 0 ? inputs.join(', ') : '<none>'}`, { inputs });
    this.suggestion = 'Pass existing files, directories or a registered workspace name';
  }
}

export class PageXmlError extends AppError {
  code = 'PAGE_XML_ERROR';
  exitCode = 4;
  severity = ErrorSeverity.MEDIUM;

  constructor(message: string, context?: ErrorContext) {
    super(message, context, 'Make sure the file is a well-formed PAGE-XML document');
  }
}

/**
 * Per-line geometry failure (degenerate baseline, empty clip, invalid buffer).
 * Recovered locally: the line keeps its previous geometry.
 */
export class GeometryError extends AppError {
  code = 'GEOMETRY_ERROR';
  exitCode = 5;
  severity = ErrorSeverity.LOW;

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
  }

  /**
   * Same error with line/region identifiers attached.
   */
  withContext(context: ErrorContext): GeometryError {
    const error = new GeometryError(this.message, { ...this.context, ...context });
    error.stack = this.stack;
    return error;
  }
}

export class SerializationError extends AppError {
  code = 'SERIALIZATION_ERROR';
  exitCode = 6;
  severity = ErrorSeverity.HIGH;

  constructor(message: string, outputPath: string, originalError?: Error) {
    super(
      message,
      { outputPath, originalError: originalError?.message },
      'Check that the output directory is writable'
    );
  }
}

export class OperationError extends AppError {
  code = 'OPERATION_ERROR';
  exitCode = 1;
  severity = ErrorSeverity.MEDIUM;

  constructor(message: string, context?: ErrorContext) {
    super(message, context, 'Operation cannot be completed in current state');
  }
}

export class InternalError extends AppError {
  code = 'INTERNAL_ERROR';
  exitCode = 1;
  severity = ErrorSeverity.HIGH;

  constructor(message: string, context?: ErrorContext) {
    super(message, context, 'An unexpected error occurred');
  }
}
