/**
 * Logger Interface
 * Structured logging abstraction; contracts default to the no-op logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log context - additional metadata for log entries
 */
export interface LogContext {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: LogContext;
}

/* eslint-disable @typescript-eslint/no-empty-function */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
/* eslint-enable @typescript-eslint/no-empty-function */

function writeToConsole(level: LogLevel, message: string, context?: LogContext): void {
  const line = `[${level.toUpperCase()}] ${message}`;
  const sink = level === 'debug' ? console.debug : level === 'info' ? console.info : level === 'warn' ? console.warn : console.error;
  if (context) {
    sink(line, context);
  } else {
    sink(line);
  }
}

/**
 * Console logger that outputs to console with structured context
 */
export const consoleLogger: Logger = {
  debug: (message, context) => writeToConsole('debug', message, context),
  info: (message, context) => writeToConsole('info', message, context),
  warn: (message, context) => writeToConsole('warn', message, context),
  error: (message, context) => writeToConsole('error', message, context),
};

/**
 * Create a prefixed logger that adds a component prefix to all messages
 */
export function createPrefixedLogger(logger: Logger, prefix: string): Logger {
  return {
    debug: (message, context) => logger.debug(`[${prefix}] ${message}`, context),
    info: (message, context) => logger.info(`[${prefix}] ${message}`, context),
    warn: (message, context) => logger.warn(`[${prefix}] ${message}`, context),
    error: (message, context) => logger.error(`[${prefix}] ${message}`, context),
  };
}

/**
 * Logger that keeps every entry in memory, for inspection
 */
export function createRecordingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (message: string, context?: LogContext) => {
    entries.push(context === undefined ? { level, message } : { level, message, context });
  };
  return {
    logger: {
      debug: record('debug'),
      info: record('info'),
      warn: record('warn'),
      error: record('error'),
    },
    entries,
  };
}
