/**
 * Winston-based logger with structured output.
 */

import { createLogger as createWinstonLogger, format, transports, Logger } from 'winston';
import * as path from 'path';
import * as fs from 'fs';
import { env } from '../core/env';
import { AnalyticsError } from '../core/errors';
import type { LoggingConfig } from '../types/config';

const logDir = path.join(process.cwd(), 'logs');
const fileLoggingEnabled = env.LOG_TO_FILE && env.NODE_ENV !== 'test';

const logFormat = format.combine(
  format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  format.errors({ stack: true }),
  format.splat(),
  format.json()
);

const consoleFormat = format.combine(
  format.colorize(),
  format.timestamp({ format: 'HH:mm:ss' }),
  format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${String(timestamp)} [${level}]: ${String(message)}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

function createFileTransports() {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  return [
    new transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 5 * 1024 * 1024,
      maxFiles: 5,
    }),
    new transports.File({
      filename: path.join(logDir, 'combined.log'),
      maxsize: 5 * 1024 * 1024,
      maxFiles: 5,
    }),
  ];
}

let fileTransports = fileLoggingEnabled ? createFileTransports() : [];

export const logger: Logger = createWinstonLogger({
  level: env.LOG_LEVEL,
  format: logFormat,
  defaultMeta: { service: 'archive-insights' },
  transports: [...fileTransports],
});

if (env.NODE_ENV !== 'production') {
  // stdout is reserved for reports
  logger.add(
    new transports.Console({
      format: consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug'],
    })
  );
}

export interface ModuleLogger {
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
}

export function normalizeErrorMeta(
  error: Error | undefined,
  extraMeta: Record<string, unknown>,
): Record<string, unknown> {
  if (!error) {
    return extraMeta;
  }

  const meta: Record<string, unknown> = { ...extraMeta };

  if (error instanceof AnalyticsError) {
    meta.errorCode = error.code;
    meta.errorContext = error.context;
    if (error.originalError) {
      meta.originalError = {
        name: error.originalError.name,
        message: error.originalError.message,
      };
    }
  }
  meta.errorName = error.name;
  meta.errorMessage = error.message;

  return meta;
}

export function createModuleLogger(module: string): ModuleLogger {
  return {
    info: (message: string, meta: Record<string, unknown> = {}) =>
      logger.info(message, { module, ...meta }),
    warn: (message: string, meta: Record<string, unknown> = {}) =>
      logger.warn(message, { module, ...meta }),
    error: (message: string, error?: Error, meta: Record<string, unknown> = {}) =>
      logger.error(message, normalizeErrorMeta(error, { module, ...meta })),
    debug: (message: string, meta: Record<string, unknown> = {}) =>
      logger.debug(message, { module, ...meta }),
  };
}

export type LogContext = Record<string, unknown>;

/**
 * Module logger with timing helpers and a sticky context
 */
export class EnhancedLogger {
  private baseLogger: ModuleLogger;
  private context: LogContext = {};

  constructor(module: string) {
    this.baseLogger = createModuleLogger(module);
  }

  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  info(message: string, meta?: LogContext): void {
    this.baseLogger.info(message, { ...this.context, ...meta });
  }

  warn(message: string, meta?: LogContext): void {
    this.baseLogger.warn(message, { ...this.context, ...meta });
  }

  error(message: string, error?: Error, meta?: LogContext): void {
    this.baseLogger.error(message, error, { ...this.context, ...meta });
  }

  debug(message: string, meta?: LogContext): void {
    this.baseLogger.debug(message, { ...this.context, ...meta });
  }

  performance(operation: string, duration: number, metadata?: LogContext): void {
    this.baseLogger.debug(`[PERF] ${operation}`, {
      ...this.context,
      ...metadata,
      duration,
      operation,
      type: 'performance',
    });
  }

  startOperation(operation: string, metadata?: LogContext): () => void {
    const startTime = Date.now();
    this.debug(`[START] ${operation}`, metadata);
    return () => {
      const duration = Date.now() - startTime;
      this.performance(operation, duration, metadata);
    };
  }

  async trackAsync<T>(operation: string, fn: () => Promise<T>, metadata?: LogContext): Promise<T> {
    const endOperation = this.startOperation(operation, metadata);
    try {
      const result = await fn();
      endOperation();
      return result;
    } catch (error: unknown) {
      endOperation();
      this.error(`[FAILED] ${operation}`, error instanceof Error ? error : undefined, metadata);
      throw error;
    }
  }

  trackSync<T>(operation: string, fn: () => T, metadata?: LogContext): T {
    const endOperation = this.startOperation(operation, metadata);
    try {
      const result = fn();
      endOperation();
      return result;
    } catch (error: unknown) {
      endOperation();
      this.error(`[FAILED] ${operation}`, error instanceof Error ? error : undefined, metadata);
      throw error;
    }
  }
}

export function createEnhancedLogger(module: string): EnhancedLogger {
  return new EnhancedLogger(module);
}

export const LOG_LEVELS = {
  ERROR: 'error',
  WARN: 'warn',
  INFO: 'info',
  DEBUG: 'debug',
} as const;

export function setLogLevel(level: string): void {
  logger.level = level;
}

/**
 * Applies the logging section of the app config. File logging stays off under NODE_ENV=test.
 */
export function configureLogger(config: LoggingConfig): void {
  setLogLevel(config.level);

  const wantFiles = config.toFile && env.NODE_ENV !== 'test';
  if (!wantFiles && fileTransports.length > 0) {
    fileTransports.forEach((transport) => logger.remove(transport));
    fileTransports = [];
  } else if (wantFiles && fileTransports.length === 0) {
    fileTransports = createFileTransports();
    fileTransports.forEach((transport) => logger.add(transport));
  }
}

export async function closeLogger(): Promise<void> {
  await new Promise<void>((resolve) => {
    logger.on('finish', resolve);
    logger.end();
  });
}
