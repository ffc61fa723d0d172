/**
 * Leveled console logging.
 *
 * Usage:
 *   import { createLogger } from './logger.js';
 *   const log = createLogger('FrameBuffer');
 *   log.debug('Dropped frame', { timestamp });
 *   log.info('Decoder created');
 *   log.warn('Context closed');
 *   log.error('Decode failed', error);
 *
 * The root level comes from STREAM_DECODER_LOG_LEVEL (debug, info, warn, error, silent)
 * and can be changed at runtime with {@link setLogLevel}.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/**
 * Parse a level name, falling back when the name is unknown or missing.
 *
 * @param name - Level name (case-insensitive)
 *
 * @param fallback - Level used when the name does not match
 *
 * @returns Parsed level
 */
export function parseLogLevel(name: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  if (!name) {
    return fallback;
  }
  return LEVEL_NAMES[name.trim().toLowerCase()] ?? fallback;
}

// Shared by every logger so setLogLevel() reaches children created earlier
const rootState = {
  level: parseLogLevel(process.env.STREAM_DECODER_LOG_LEVEL),
};

export class Logger {
  private readonly prefix: string;

  constructor(prefix = '') {
    this.prefix = prefix;
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= rootState.level;
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage(message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.info(this.formatMessage(message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage(message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage(message), ...args);
    }
  }

  /**
   * Create a child logger with a nested prefix
   */
  child(prefix: string): Logger {
    return new Logger(this.prefix ? `${this.prefix}:${prefix}` : prefix);
  }
}

const logger = new Logger('stream-decoder');

/**
 * Factory for module-specific loggers.
 *
 * @example
 * ```typescript
 * const log = createLogger('MediaDecoder');
 * log.info('decoder stopped');  // [stream-decoder:MediaDecoder] decoder stopped
 * ```
 */
export function createLogger(module: string): Logger {
  return logger.child(module);
}

/**
 * Set the level of every logger.
 */
export function setLogLevel(level: LogLevel): void {
  rootState.level = level;
}

/**
 * Current level of every logger.
 */
export function getLogLevel(): LogLevel {
  return rootState.level;
}
