/**
 * Structured Logging System
 * =========================
 * Centralized logging using Winston with structured output, optional log
 * rotation, and context propagation across packages.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
  TRACE = 'trace',
}

export interface LogContext {
  phase?: string;
  transformId?: string;
  artifactId?: string;
  [key: string]: unknown;
}

interface LoggerConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

const defaultConfig: LoggerConfig = {
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
  enableConsole: process.env.LOG_CONSOLE !== 'false',
  // File logging is opt-in for a library engine
  enableFile: process.env.LOG_FILE === 'true',
  logDir: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
  maxFiles: process.env.LOG_MAX_FILES || '14d',
  maxSize: process.env.LOG_MAX_SIZE || '20m',
};

const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Human-readable format for development
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? '\n' + metaStr : ''}`;
  })
);

const transports: winston.transport[] = [];

if (defaultConfig.enableConsole) {
  transports.push(
    new winston.transports.Console({
      format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
      level: defaultConfig.level,
      // Keep stdout clean for CLI output
      stderrLevels: ['error', 'warn', 'info', 'debug', 'trace'],
    })
  );
}

if (defaultConfig.enableFile && process.env.NODE_ENV !== 'test') {
  fs.mkdirSync(defaultConfig.logDir, { recursive: true });

  transports.push(
    new DailyRotateFile({
      filename: path.join(defaultConfig.logDir, 'error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      format: structuredFormat,
      maxSize: defaultConfig.maxSize,
      maxFiles: defaultConfig.maxFiles,
      zippedArchive: true,
    })
  );

  transports.push(
    new DailyRotateFile({
      filename: path.join(defaultConfig.logDir, 'combined-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      format: structuredFormat,
      maxSize: defaultConfig.maxSize,
      maxFiles: defaultConfig.maxFiles,
      zippedArchive: true,
    })
  );
}

const winstonLogger = winston.createLogger({
  level: defaultConfig.level,
  format: structuredFormat,
  defaultMeta: { service: 'prepflow' },
  transports,
  // A logger without transports warns on every write
  silent: transports.length === 0,
  exitOnError: false,
});

/**
 * Logger with persistent context and package namespacing
 */
class Logger {
  private context: LogContext = {};
  private namespace: string = 'prepflow';

  constructor(namespace?: string) {
    if (namespace) {
      this.namespace = namespace;
    }
  }

  /**
   * Set context that will be included in all subsequent log messages
   */
  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  getContext(): LogContext {
    return { ...this.context };
  }

  getNamespace(): string {
    return this.namespace;
  }

  private mergeContext(additionalContext?: LogContext): LogContext {
    return {
      namespace: this.namespace,
      ...this.context,
      ...additionalContext,
    };
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const logContext = this.mergeContext(context);

    if (error instanceof Error) {
      winstonLogger.error(message, {
        ...logContext,
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name,
        },
      });
    } else if (error !== undefined) {
      winstonLogger.error(message, { ...logContext, error });
    } else {
      winstonLogger.error(message, logContext);
    }
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.mergeContext(context));
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, this.mergeContext(context));
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, this.mergeContext(context));
  }

  /**
   * Most verbose level. Winston has no trace level, so it rides on debug.
   */
  trace(message: string, context?: LogContext): void {
    winstonLogger.debug(message, { ...this.mergeContext(context), severity: 'trace' });
  }

  /**
   * Create a child logger with persistent context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.namespace);
    childLogger.setContext({ ...this.context, ...context });
    return childLogger;
  }
}

/**
 * Factory for package-specific loggers
 */
export function createLogger(packageName: string): Logger {
  return new Logger(packageName);
}

export const logger = new Logger('prepflow');

export { Logger, winstonLogger };
