/**
 * Error Handler for the PagePlus CLI
 *
 * Formats errors for the terminal and maps them to exit codes.
 */

import chalk from 'chalk';
import { CommanderError } from 'commander';
import { AppError, ErrorSeverity, getErrorMessage, isAppError } from '@pageplus/errors';
import type { ErrorContext } from '@pageplus/errors';
import { getLogger } from './logger.js';

/**
 * Invalid or unreadable settings (.env file, environment variables)
 */
export class ConfigurationError extends AppError {
  code = 'CONFIG_ERROR';
  exitCode = 7;
  severity = ErrorSeverity.HIGH;

  constructor(message: string, context?: ErrorContext) {
    super(message, context, 'Check the .env file and the PAGEPLUS_* environment variables');
  }
}

const UNKNOWN_EXIT_CODE = 1;

/**
 * Get exit code for an error
 */
export function getExitCode(error: unknown): number {
  if (isAppError(error)) {
    return error.exitCode;
  }
  if (error instanceof CommanderError) {
    return error.exitCode;
  }
  return UNKNOWN_EXIT_CODE;
}

/**
 * Format error for display
 */
export function formatError(error: unknown, verbose: boolean = false): string {
  const lines: string[] = [];

  if (isAppError(error)) {
    lines.push(chalk.red.bold(`${error.name}: ${error.message}`));

    if (error.context && Object.keys(error.context).length > 0) {
      lines.push('');
      lines.push(chalk.yellow('Context:'));
      for (const [key, value] of Object.entries(error.context)) {
        lines.push(`  ${chalk.gray(key)}: ${JSON.stringify(value)}`);
      }
    }

    if (error.suggestion) {
      lines.push('');
      lines.push(chalk.cyan(`Suggestion: ${error.suggestion}`));
    }
  } else {
    lines.push(chalk.red.bold(`Error: ${getErrorMessage(error)}`));
  }

  if (verbose && error instanceof Error && error.stack) {
    lines.push('');
    lines.push(chalk.gray('Stack Trace:'));
    lines.push(chalk.gray(error.stack));
  }

  return lines.join('\n');
}

/**
 * Print the error and exit with its code
 */
export function handleError(error: unknown, verbose: boolean = false): never {
  console.error(formatError(error, verbose));

  const exitCode = getExitCode(error);
  getLogger().error(
    `Exiting with code ${exitCode}: ${getErrorMessage(error)}`,
    isAppError(error) ? error.toJSON() : {}
  );
  process.exit(exitCode);
}

/**
 * Global error handler for uncaught exceptions
 */
export function setupGlobalErrorHandlers(verbose: boolean = false): void {
  process.on('uncaughtException', (error: Error) => {
    getLogger().error('Uncaught Exception', { error });
    handleError(error, verbose);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    getLogger().error('Unhandled Promise Rejection', { error: reason });
    handleError(reason, verbose);
  });

  process.on('SIGINT', () => {
    console.log('\n' + chalk.yellow('Interrupted by user'));
    process.exit(130);
  });

  process.on('SIGTERM', () => {
    console.log('\n' + chalk.yellow('Terminated'));
    process.exit(143);
  });
}
