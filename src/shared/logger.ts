/**
 * Structured logging
 *
 * Level filtering plus a context tag on every line. Console is the only
 * transport.
 */

import { config } from './config';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

const LOG_LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m', // Cyan
  [LogLevel.INFO]: '\x1b[32m',  // Green
  [LogLevel.WARN]: '\x1b[33m',  // Yellow
  [LogLevel.ERROR]: '\x1b[31m', // Red
};

const RESET_COLOR = '\x1b[0m';

/**
 * Parse a level name, unknown names fall back to info
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    default: return LogLevel.INFO;
  }
}

let currentLogLevel = parseLogLevel(config.logging.level);

/**
 * Change the threshold for every logger (the session's `debug` option uses this)
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

/**
 * Errors stringify to `{}`, so they are flattened to name and message first
 */
export function formatMeta(meta: unknown): string {
  if (meta instanceof Error) {
    return JSON.stringify({ error: meta.name, message: meta.message });
  }
  return JSON.stringify(meta);
}

/**
 * Logger with context
 */
export class Logger {
  constructor(private context: string) {}

  debug(message: string, meta?: unknown) {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown) {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown) {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown) {
    this.log(LogLevel.ERROR, message, meta);
  }

  private log(level: LogLevel, message: string, meta?: unknown) {
    if (level < currentLogLevel) {
      return;
    }

    const timestamp = new Date().toISOString();
    const levelName = LOG_LEVEL_NAMES[level];
    const contextStr = this.context ? `[${this.context}]` : '';

    let logMessage: string;

    if (config.logging.colorize) {
      const color = LOG_LEVEL_COLORS[level];
      logMessage = `${color}${timestamp} ${levelName.padEnd(5)}${RESET_COLOR} ${contextStr} ${message}`;
    } else {
      logMessage = `${timestamp} ${levelName.padEnd(5)} ${contextStr} ${message}`;
    }

    if (meta !== undefined) {
      logMessage += ` ${formatMeta(meta)}`;
    }

    switch (level) {
      case LogLevel.DEBUG:
      case LogLevel.INFO:
        console.log(logMessage);
        break;
      case LogLevel.WARN:
        console.warn(logMessage);
        break;
      case LogLevel.ERROR:
        console.error(logMessage);
        break;
    }
  }
}

/**
 * Helper to create a logger with context
 */
export function createLogger(context: string): Logger {
  return new Logger(context);
}
