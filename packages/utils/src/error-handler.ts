/**
 * Error Handler
 * =============
 * Centralized error handling utilities.
 */

import { AppError } from './errors.js';
import { logger } from './logger.js';

export interface ErrorHandlerResult {
  handled: boolean;
  message: string;
  code: string;
  exitCode: number;
}

/**
 * Handle and log error appropriately
 */
export function handleError(error: unknown, context?: Record<string, unknown>): ErrorHandlerResult {
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AppError) {
    if (err.isOperational) {
      logger.warn('Operational error occurred', {
        ...err.context,
        ...context,
        error: {
          name: err.name,
          message: err.message,
          code: err.code,
        },
      });
    } else {
      // Programming errors
      logger.error('Application error occurred', err, {
        ...err.context,
        ...context,
      });
    }

    return {
      handled: true,
      message: err.message,
      code: err.code,
      exitCode: err.exitCode,
    };
  }

  logger.error('Unknown error occurred', err, context);

  return {
    handled: true,
    message: err.message,
    code: 'UNKNOWN_ERROR',
    exitCode: 1,
  };
}
