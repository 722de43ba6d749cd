/**
 * Structured JSON logger for querydock
 *
 * Provides configurable logging with:
 * - JSON output format (stderr by default, so stdout stays clean for results)
 * - Configurable log levels (debug/info/warn/error/silent)
 * - Optional file output
 * - Timestamps and context metadata
 */

import pino, { type Logger, type LoggerOptions, type DestinationStream } from 'pino';
import { createWriteStream } from 'node:fs';
import type { LoggingConfig } from '../config/schema.js';

/**
 * Log level type
 */
export type LogLevel = LoggingConfig['level'];

/**
 * Context metadata for log entries
 */
export interface LogContext {
  /** Operation name */
  operation?: string;
  /** Table being registered or described */
  table?: string;
  /** Query file being processed */
  file?: string;
  /** Additional metadata */
  [key: string]: unknown;
}

/**
 * Logger instance type
 */
export type QueryDockLogger = Logger;

/**
 * Create a destination stream for logging
 */
function createDestination(config: LoggingConfig): DestinationStream {
  if (config.file !== undefined && config.file !== '') {
    return createWriteStream(config.file, { flags: 'a' });
  }
  return pino.destination(2);
}

/**
 * Create logger options from configuration
 */
function createLoggerOptions(config: LoggingConfig): LoggerOptions {
  const options: LoggerOptions = {
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'querydock',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (config.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: 2,
      },
    };
  }

  return options;
}

/**
 * Create a configured logger instance
 */
export function createLogger(config: LoggingConfig): QueryDockLogger {
  const options = createLoggerOptions(config);

  // pino refuses an explicit destination when a transport is configured
  if (options.transport !== undefined) {
    return pino(options);
  }

  return pino(options, createDestination(config));
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(logger: QueryDockLogger, context: LogContext): QueryDockLogger {
  return logger.child(context);
}

let defaultLogger: QueryDockLogger | null = null;

/**
 * Get or create the default logger instance (info level, stderr, JSON format)
 */
export function getLogger(): QueryDockLogger {
  defaultLogger ??= createLogger({
    level: 'info',
    pretty: false,
  });
  return defaultLogger;
}

/**
 * Set the default logger instance
 */
export function setDefaultLogger(logger: QueryDockLogger): void {
  defaultLogger = logger;
}

/**
 * A logger that drops everything; for library callers and tests
 */
export function createSilentLogger(): QueryDockLogger {
  return pino({ level: 'silent' });
}

/**
 * Utility function to log operation start
 */
export function logOperationStart(
  logger: QueryDockLogger,
  operation: string,
  context?: LogContext
): void {
  logger.info({ operation, ...context }, `Starting ${operation}`);
}

/**
 * Utility function to log operation completion
 */
export function logOperationComplete(
  logger: QueryDockLogger,
  operation: string,
  durationMs: number,
  context?: LogContext
): void {
  logger.info(
    { operation, durationMs, ...context },
    `Completed ${operation} in ${String(durationMs)}ms`
  );
}

/**
 * Utility function to log operation failure
 */
export function logOperationError(
  logger: QueryDockLogger,
  operation: string,
  error: Error,
  context?: LogContext
): void {
  logger.error(
    {
      operation,
      error: {
        message: error.message,
        name: error.name,
        stack: error.stack,
      },
      ...context,
    },
    `Failed ${operation}: ${error.message}`
  );
}

/**
 * Create a timed operation wrapper that logs start, completion, and errors
 */
export async function withLogging<T>(
  logger: QueryDockLogger,
  operation: string,
  fn: () => Promise<T>,
  context?: LogContext
): Promise<T> {
  const start = Date.now();
  logOperationStart(logger, operation, context);

  try {
    const result = await fn();
    logOperationComplete(logger, operation, Date.now() - start, context);
    return result;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logOperationError(logger, operation, err, context);
    throw error;
  }
}
