/**
 * @pageplus/logger
 * Unified logging package for the PagePlus toolkit
 */

export { createLogger, silentLogger } from './logger';
export type {
  Logger,
  LoggerConfig,
  LogMetadata,
  LogLevel,
  LogFormat,
} from './types';
