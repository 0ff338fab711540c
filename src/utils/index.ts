/**
 * Utility exports for meshlink-runtime
 * @module
 */

export { type Logger, type LogLevel, type LogSink, createLogger, silentLogger } from './logger.js';

export { MAX_TIMER_DELAY_MS, toErrorMessage, withTimeout } from './async.js';
