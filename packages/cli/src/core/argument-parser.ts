/**
 * Argument Parser - Zod-based validation and parsing
 */

import { z } from 'zod';
import { AppError } from '@prepflow/utils';

/**
 * Command-line arguments that fail their command's schema
 */
export class InvalidArgumentsError extends AppError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid arguments:\n${issues.map((issue) => `  ${issue}`).join('\n')}`, 'INVALID_ARGUMENTS', 64, {
      issues,
    });
    this.issues = issues;
  }
}

/**
 * Parse and validate arguments using Zod schema
 *
 * @throws InvalidArgumentsError listing every failing option
 */
export function parseArguments<T extends z.ZodTypeAny>(schema: T, rawArgs: Record<string, unknown>): z.infer<T> {
  const result = schema.safeParse(rawArgs);
  if (!result.success) {
    throw new InvalidArgumentsError(
      result.error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      })
    );
  }
  return result.data;
}

/**
 * Normalize Commander.js options to a flat object.
 *
 * Keys are never renamed: Commander already turns --shard-count into
 * shardCount. Undefined values are dropped and "true"/"false" strings
 * become booleans; numbers are left to the schema.
 */
export function normalizeOptions(options: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(options)) {
    if (value === undefined || value === null) {
      continue;
    }
    if (value === 'true') {
      normalized[key] = true;
    } else if (value === 'false') {
      normalized[key] = false;
    } else {
      normalized[key] = value;
    }
  }

  return normalized;
}
