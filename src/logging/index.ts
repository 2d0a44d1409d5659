/**
 * Logging module
 */

export {
  Logger,
  LOG_LEVELS,
  DEFAULT_LOGGER_CONFIG,
  type LogLevel,
  type LogThreshold,
  type LogContext,
  type LoggerConfig,
  type LogEntry,
} from './logger.js';
