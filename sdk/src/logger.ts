/**
 * Logger Interface for SDK Observability
 * Structured logging for batch dispatch, per-filter completion and aggregation.
 */

export interface Logger {
  /**
   * Log informational messages
   */
  info(message: string, meta?: Record<string, unknown>): void;

  /**
   * Log warning messages
   */
  warn(message: string, meta?: Record<string, unknown>): void;

  /**
   * Log error messages
   */
  error(message: string, meta?: Record<string, unknown>): void;

  /**
   * Log debug messages
   */
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Default silent logger - no console output, safe for production
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface ConsoleLoggerOptions {
  /** Tag printed before every line, e.g. `[acl-admin] [INFO] ...` */
  prefix?: string;
  /** Lowest level written (default: 'info') */
  level?: LogLevel;
}

type ConsoleMethod = 'log' | 'warn' | 'error' | 'debug';

/**
 * Console logger - outputs to console.
 * Per-filter dispatch lines are logged at debug, so the default level hides them.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'info'];
  const tag = options.prefix ? `[${options.prefix}] ` : '';

  const write =
    (level: LogLevel, method: ConsoleMethod) =>
    (message: string, meta?: Record<string, unknown>): void => {
      if (LEVEL_RANK[level] < threshold) {
        return;
      }
      const line = `${tag}[${level.toUpperCase()}] ${message}`;
      if (meta === undefined) {
        console[method](line);
      } else {
        console[method](line, meta);
      }
    };

  return {
    info: write('info', 'log'),
    warn: write('warn', 'warn'),
    error: write('error', 'error'),
    debug: write('debug', 'debug'),
  };
}

/**
 * Fans every call out to each of the given loggers.
 */
export function createCompositeLogger(loggers: Logger[]): Logger {
  return {
    info: (message: string, meta?: Record<string, unknown>) => {
      loggers.forEach((logger) => logger.info(message, meta));
    },
    warn: (message: string, meta?: Record<string, unknown>) => {
      loggers.forEach((logger) => logger.warn(message, meta));
    },
    error: (message: string, meta?: Record<string, unknown>) => {
      loggers.forEach((logger) => logger.error(message, meta));
    },
    debug: (message: string, meta?: Record<string, unknown>) => {
      loggers.forEach((logger) => logger.debug(message, meta));
    },
  };
}
