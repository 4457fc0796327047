/**
 * Type definitions for @pageplus/logger
 */

import type winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface LoggerConfig {
  /** Service name (required) */
  service: string;

  /** Log level (default: 'info') */
  level?: LogLevel;

  /** Enable console transport (default: true) */
  enableConsole?: boolean;

  /** Level of the console transport when it differs from the file transports */
  consoleLevel?: LogLevel;

  /** Enable daily rotate file transport (default: false) */
  enableDailyRotate?: boolean;

  /** Directory for rotated log files (default: 'logs') */
  logDir?: string;

  /** Max files for rotation (default: '14d') */
  maxFiles?: string;

  /** Max file size for rotation (default: '20m') */
  maxSize?: string;

  /** Log format (default: 'pretty') */
  format?: LogFormat;

  /** Suppress every transport */
  silent?: boolean;

  /** Additional metadata to include in all logs */
  metadata?: LogMetadata;
}

export interface LogMetadata {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;

  info(message: string, metadata?: LogMetadata): void;

  warn(message: string, metadata?: LogMetadata): void;

  error(message: string, metadata?: LogMetadata): void;

  /** Create child logger with additional context */
  child(metadata: LogMetadata): Logger;

  /** Get Winston logger instance (for advanced use) */
  getWinstonLogger(): winston.Logger;
}
