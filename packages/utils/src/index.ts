/**
 * @prepflow/utils - Shared utilities package
 *
 * Logger, configuration loading and the base error classes.
 * No domain code - that lives in @prepflow/engine.
 */

export { logger, Logger, LogLevel, winstonLogger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

export * from './config/index.js';

export * from './errors.js';
export { handleError } from './error-handler.js';
export type { ErrorHandlerResult } from './error-handler.js';
