/**
 * Process-wide logger for the CLI.
 *
 * Commands log through `getLogger()`; `configureLogger` swaps in the
 * configured winston logger once settings and global flags are known.
 */

import { createLogger, silentLogger } from '@pageplus/logger';
import type { Logger, LogLevel } from '@pageplus/logger';

export interface CliLoggerOptions {
  level: LogLevel;
  logDir?: string;
  verbose?: boolean;
  quiet?: boolean;
}

let current: Logger = silentLogger;

export function getLogger(): Logger {
  return current;
}

/**
 * The console only shows warnings unless `--verbose` is given, so that
 * record lines do not interleave with the progress spinner. The rotating
 * file under `logDir` receives everything at `level`.
 */
export function configureLogger(options: CliLoggerOptions): Logger {
  const { level, logDir, verbose = false, quiet = false } = options;
  const consoleLevel: LogLevel = verbose ? 'debug' : quiet ? 'error' : 'warn';

  current = createLogger({
    service: 'pageplus',
    level: verbose ? 'debug' : level,
    consoleLevel,
    enableDailyRotate: logDir !== undefined,
    logDir,
  });
  return current;
}
