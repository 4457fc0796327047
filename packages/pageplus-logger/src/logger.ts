/**
 * Core Logger Implementation
 * Unified logging for the PagePlus command line and its processing core
 */

import path from 'path';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { Logger, LoggerConfig, LogLevel, LogMetadata } from './types';

const { combine, timestamp, json, printf, colorize, errors } = winston.format;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

/**
 * Unpack an Error passed as `metadata.error` so its message and stack survive
 * the JSON formatter.
 */
function withErrorFields(metadata?: LogMetadata): LogMetadata | undefined {
  if (metadata?.error instanceof Error) {
    return {
      ...metadata,
      error: metadata.error.message,
      stack: metadata.error.stack,
    };
  }
  return metadata;
}

function wrap(winstonLogger: winston.Logger): Logger {
  return {
    debug(message: string, metadata?: LogMetadata) {
      winstonLogger.debug(message, metadata);
    },

    info(message: string, metadata?: LogMetadata) {
      winstonLogger.info(message, metadata);
    },

    warn(message: string, metadata?: LogMetadata) {
      winstonLogger.warn(message, metadata);
    },

    error(message: string, metadata?: LogMetadata) {
      winstonLogger.error(message, withErrorFields(metadata));
    },

    child(metadata: LogMetadata): Logger {
      return wrap(winstonLogger.child(metadata));
    },

    getWinstonLogger() {
      return winstonLogger;
    },
  };
}

/**
 * Create a Winston logger instance with standardized configuration
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    service,
    level = 'info',
    enableConsole = true,
    consoleLevel = config.level ?? 'info',
    enableDailyRotate = false,
    logDir = 'logs',
    maxFiles = '14d',
    maxSize = '20m',
    format: logFormat = 'pretty',
    silent = false,
    metadata = {},
  } = config;

  const baseMetadata = {
    service,
    ...metadata,
  };

  const prettyLine = printf(({ timestamp, level, message, service, ...meta }) => {
    const metaPart = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} [${level}] [${service}] ${message}${metaPart}`;
  });
  const output = logFormat === 'json' ? json() : prettyLine;

  const transports: winston.transport[] = [];

  if (enableConsole) {
    // stdout carries command output
    transports.push(new winston.transports.Console({
      level: consoleLevel,
      stderrLevels: ['error', 'warn', 'info', 'debug'],
      format: logFormat === 'json' ? undefined : combine(colorize(), prettyLine),
    }));
  }

  if (enableDailyRotate) {
    transports.push(new DailyRotateFile({
      level,
      filename: path.join(logDir, 'PagePlus_%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      maxSize,
      maxFiles,
      zippedArchive: false,
    }));
  }

  // the logger level admits whatever the most verbose transport wants
  const loggerLevel = enableConsole && LEVEL_PRIORITY[consoleLevel] > LEVEL_PRIORITY[level] ? consoleLevel : level;

  const winstonLogger = winston.createLogger({
    level: loggerLevel,
    silent,
    format: combine(
      errors({ stack: true }),
      timestamp(logFormat === 'json' ? undefined : { format: 'YYYY-MM-DD HH:mm:ss' }),
      output
    ),
    defaultMeta: baseMetadata,
    transports,
    exitOnError: false,
  });

  return wrap(winstonLogger);
}

/**
 * Logger that drops everything, for library callers that pass none
 */
export const silentLogger = createLogger({
  service: 'pageplus',
  enableConsole: false,
  silent: true,
});
