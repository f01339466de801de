/**
 * CLI-specific type definitions
 */

import type { z } from 'zod';
import type { CommandContext } from '../core/command-context.js';

/**
 * Command definition structure
 */
export interface CommandDefinition {
  /**
   * Command name (e.g., 'analyze', 'apply')
   */
  name: string;

  /**
   * Command description for help text
   */
  description: string;

  /**
   * Zod schema for argument validation
   */
  schema: z.ZodTypeAny;

  /**
   * Command handler. Receives arguments already validated against `schema`.
   */
  handler: (args: unknown, ctx: CommandContext) => Promise<unknown>;

  /**
   * Optional examples for help text
   */
  examples?: string[];
}

/**
 * Package command module structure
 */
export interface PackageCommandModule {
  /**
   * Command group name (e.g., 'preprocess')
   */
  packageName: string;

  description: string;

  commands: CommandDefinition[];
}

/**
 * Output format options
 */
export type OutputFormat = 'json' | 'table';
