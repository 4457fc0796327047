/**
 * Root of the PagePlus error hierarchy. Subclasses fix the code, process
 * exit code and severity; instances carry context for logs and reports.
 */

export interface ErrorContext {
  [key: string]: unknown;
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export abstract class AppError extends Error {
  abstract code: string;
  abstract exitCode: number;
  abstract severity: ErrorSeverity;

  context?: ErrorContext;
  /** false for programming errors that should stop a batch */
  isOperational = true;
  suggestion?: string;

  constructor(message: string, context?: ErrorContext, suggestion?: string) {
    super(message);
    this.name = new.target.name;
    this.context = context;
    this.suggestion = suggestion;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      exitCode: this.exitCode,
      severity: this.severity,
      suggestion: this.suggestion,
      context: this.context
    };
  }
}
