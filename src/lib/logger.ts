/**
 * Newsdesk — Logger
 *
 * Simple structured logging utility.
 * Logs are either human-readable lines or one JSON object per line.
 * Instances are created explicitly and handed to the pipeline.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { LogLevelSchema } from '../types';
import type { LogFormat, LogLevel } from '../types';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Create a child logger with default context. */
  child(defaultContext: LogContext): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Every emitted line is also appended here */
  file?: string;
  /** Write to the console (default true) */
  console?: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const parsed = LogLevelSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : fallback;
}

export function formatEntry(entry: LogEntry, format: LogFormat): string {
  if (format === 'json') {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, context } = entry;
  const levelStr = level.toUpperCase().padEnd(5);
  const time = timestamp.split('T')[1]?.split('.')[0] ?? timestamp;

  let output = `${time} ${levelStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    output += ` ${JSON.stringify(context)}`;
  }

  return output;
}

/**
 * Create a logger. Nothing is shared between instances.
 */
export function createLogger(options: LoggerOptions = {}, defaultContext: LogContext = {}): Logger {
  const threshold = LOG_LEVELS[options.level ?? 'info'];
  const format = options.format ?? 'pretty';
  const toConsole = options.console ?? true;

  if (options.file) {
    mkdirSync(dirname(options.file), { recursive: true });
  }

  const log = (level: LogEntry['level'], message: string, context?: LogContext): void => {
    if (LOG_LEVELS[level] < threshold) return;

    const merged = { ...defaultContext, ...context };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: Object.keys(merged).length > 0 ? merged : undefined,
    };

    const formatted = formatEntry(entry, format);

    if (options.file) {
      appendFileSync(options.file, formatted + '\n', 'utf-8');
    }

    if (!toConsole) return;

    switch (level) {
      case 'error':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      default:
        console.log(formatted);
    }
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
    child: (childContext) => createLogger(options, { ...defaultContext, ...childContext }),
  };
}

/**
 * Logger for scripts, configured from LOG_LEVEL and NODE_ENV.
 */
export const logger: Logger = createLogger({
  level: parseLogLevel(process.env.LOG_LEVEL),
  format: process.env.NODE_ENV === 'production' ? 'json' : 'pretty',
});

/**
 * Logger that drops everything. Default for library callers that pass none.
 */
export const silentLogger: Logger = createLogger({ level: 'silent' });

/**
 * Performance timing utility.
 */
export function timeOperation<T>(
  log: Logger,
  name: string,
  operation: () => T | Promise<T>
): T | Promise<T> {
  const start = performance.now();

  const logResult = (durationMs: number) => {
    log.debug(`${name} completed`, { durationMs: Math.round(durationMs) });
  };

  try {
    const result = operation();

    if (result instanceof Promise) {
      return result
        .then((r) => {
          logResult(performance.now() - start);
          return r;
        })
        .catch((err: unknown) => {
          logResult(performance.now() - start);
          throw err;
        });
    }

    logResult(performance.now() - start);
    return result;
  } catch (err) {
    logResult(performance.now() - start);
    throw err;
  }
}
