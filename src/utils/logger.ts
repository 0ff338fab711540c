/**
 * Logger utility for meshlink-runtime
 *
 * Provides a lightweight, dependency-free logging system with configurable
 * log levels and formatted output. Output goes to the console unless a sink
 * function is supplied.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Private - not exported from module
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  setLevel(level: LogLevel): void;
}

/** Receives each formatted line that passes the level filter. */
export type LogSink = (level: LogLevel, line: string, args: readonly unknown[]) => void;

const consoleSink: LogSink = (level, line, args) => {
  switch (level) {
    case 'debug':
      console.debug(line, ...args);
      break;
    case 'info':
      console.info(line, ...args);
      break;
    case 'warn':
      console.warn(line, ...args);
      break;
    case 'error':
      console.error(line, ...args);
      break;
  }
};

/**
 * Create a logger instance with the specified minimum level
 *
 * @param minLevel - Minimum log level to output (default: 'info')
 * @param prefix - Prefix for log messages (default: '[Meshlink]')
 * @param sink - Destination for formatted lines (default: console)
 * @returns Logger instance
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug', '[Router]');
 * logger.info('Transport registered'); // 2026-01-21T12:00:00.000Z INFO  [Router] Transport registered
 *
 * const lines: string[] = [];
 * const captured = createLogger('info', '[Router]', (_level, line) => lines.push(line));
 * ```
 */
export function createLogger(
  minLevel: LogLevel = 'info',
  prefix = '[Meshlink]',
  sink: LogSink = consoleSink,
): Logger {
  let currentLevel = LOG_LEVELS[minLevel];

  const log = (level: LogLevel, message: string, ...args: unknown[]) => {
    if (LOG_LEVELS[level] >= currentLevel) {
      const timestamp = new Date().toISOString();
      const levelStr = level.toUpperCase().padEnd(5);
      sink(level, `${timestamp} ${levelStr} ${prefix} ${message}`, args);
    }
  };

  return {
    debug: (message, ...args) => log('debug', message, ...args),
    info: (message, ...args) => log('info', message, ...args),
    warn: (message, ...args) => log('warn', message, ...args),
    error: (message, ...args) => log('error', message, ...args),
    setLevel: (level) => {
      currentLevel = LOG_LEVELS[level];
    },
  };
}

/**
 * No-op logger for silent operation
 *
 * Default for every component that accepts an optional logger, and the usual
 * choice in tests.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  setLevel: () => {},
};
