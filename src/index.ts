export * from './api/index.js';
export * from './constants/media.js';
export * from './lib/error.js';
export { createLogger, getLogLevel, Logger, LogLevel, parseLogLevel, setLogLevel } from './lib/logger.js';
