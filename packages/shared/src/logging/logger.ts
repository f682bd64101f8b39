/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/**
 * Destination for formatted log lines
 */
export type LogSink = (level: Exclude<LogLevel, 'silent'>, line: string) => void;

/**
 * Logger options
 */
export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  context?: Record<string, unknown>;
  /** Defaults to the matching console method */
  sink?: LogSink;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const consoleSink: LogSink = (level, line) => {
  console[level](line);
};

/**
 * Create a console logger.
 * Lines look like `[2026-01-05T08:00:00.000Z] [WARN] [einvoice-tw] message {"key":"value"}`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? 'info'];
  const prefix = options.prefix ?? 'einvoice-tw';
  const baseContext = options.context ?? {};
  const sink = options.sink ?? consoleSink;

  const write = (level: Exclude<LogLevel, 'silent'>, message: string, context?: Record<string, unknown>): void => {
    if (LOG_LEVELS[level] < minLevel) {
      return;
    }

    const timestamp = new Date().toISOString();
    const mergedContext = { ...baseContext, ...context };
    const contextStr = Object.keys(mergedContext).length > 0
      ? ` ${JSON.stringify(mergedContext)}`
      : '';

    sink(level, `[${timestamp}] [${level.toUpperCase()}] [${prefix}] ${message}${contextStr}`);
  };

  return {
    debug(message, context) {
      write('debug', message, context);
    },

    info(message, context) {
      write('info', message, context);
    },

    warn(message, context) {
      write('warn', message, context);
    },

    error(message, context) {
      write('error', message, context);
    },

    child(context: Record<string, unknown>): Logger {
      return createLogger({ ...options, context: { ...baseContext, ...context } });
    },
  };
}
