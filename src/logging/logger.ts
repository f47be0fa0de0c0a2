/**
 * Structured logging for the reader layer
 *
 * The decoder itself never logs. ResponseReader reports what it decoded,
 * what it is waiting for, and what it dropped through this interface.
 */

/**
 * Levels a line can be written at, lowest first
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Minimum level setting; 'silent' drops every line
 */
export type LogThreshold = LogLevel | 'silent';

const LOG_LEVEL_VALUES: Record<LogThreshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

/**
 * Context attached to a log line
 */
export type LogContext = Record<string, string | number | boolean | null | undefined>;

/**
 * Logger accepted by ResponseReader
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/**
 * Console logger configuration
 */
export interface ConsoleLoggerConfig {
  /** Lines below this level are dropped (default: 'info') */
  minLevel: LogThreshold;
  /** Logger name shown in brackets */
  name?: string;
  /** Prefix lines with an ISO timestamp (default: true) */
  includeTimestamp: boolean;
}

const DEFAULT_CONFIG: ConsoleLoggerConfig = {
  minLevel: 'info',
  includeTimestamp: true
};

/**
 * Logger writing one formatted line per entry to stderr
 *
 * Output: `[2024-01-01T00:00:00.000Z] [WARN] [reader] message {key=value}`
 */
export class ConsoleLogger implements Logger {
  private config: ConsoleLoggerConfig;

  constructor(config: Partial<ConsoleLoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Set minimum log level
   */
  setMinLevel(level: LogThreshold): void {
    this.config.minLevel = level;
  }

  /**
   * Create a logger under a nested name, starting from a copy of this
   * configuration; later setMinLevel calls on either side stay local
   */
  child(name: string): ConsoleLogger {
    const parent = this.config.name;
    return new ConsoleLogger({ ...this.config, name: parent ? `${parent}:${name}` : name });
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.minLevel];
  }

  /**
   * Format a log entry for stderr output
   */
  format(level: LogLevel, message: string, context?: LogContext, timestamp: Date = new Date()): string {
    const parts: string[] = [];

    if (this.config.includeTimestamp) {
      parts.push(`[${timestamp.toISOString()}]`);
    }

    parts.push(`[${level.toUpperCase()}]`);

    if (this.config.name) {
      parts.push(`[${this.config.name}]`);
    }

    parts.push(message);

    if (context) {
      const pairs = Object.entries(context)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => `${key}=${String(value)}`);
      if (pairs.length > 0) {
        parts.push(`{${pairs.join(', ')}}`);
      }
    }

    return parts.join(' ');
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;
    console.error(this.format(level, message, context));
  }
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};
