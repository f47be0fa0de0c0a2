/**
 * Logging exports for imap-response-decoder
 */

export {
  ConsoleLogger,
  silentLogger,
  type Logger,
  type LogLevel,
  type LogThreshold,
  type LogContext,
  type ConsoleLoggerConfig
} from './logger.js';
