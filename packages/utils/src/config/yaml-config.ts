/**
 * YAML Configuration Loader
 * ==========================
 * Loads configuration from prepflow.yaml with fallback to environment variables
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { load } from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { logger } from '../logger.js';

export const AppConfigSchema = z
  .object({
    pipeline: z
      .object({
        validationMode: z.enum(['strict', 'lenient']).optional(),
        shardCount: z.number().int().positive().optional(),
      })
      .optional(),
  })
  .passthrough();

export type AppConfig = z.infer<typeof AppConfigSchema>;

let cachedConfig: AppConfig | null = null;

/**
 * Load configuration from prepflow.yaml. A missing file is an empty config;
 * a file that does not parse or validate is a ConfigurationError.
 */
export function loadConfigFromYaml(configPath?: string): AppConfig {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const resolvedPath = configPath || process.env.PREPFLOW_CONFIG || join(process.cwd(), 'prepflow.yaml');

  if (!existsSync(resolvedPath)) {
    logger.debug('prepflow.yaml not found, using environment variables only', {
      path: resolvedPath,
    });
    cachedConfig = {};
    return cachedConfig;
  }

  let raw: unknown;
  try {
    raw = load(readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to parse ${resolvedPath}`, 'PREPFLOW_CONFIG', {
      path: resolvedPath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = AppConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration in ${resolvedPath}`, 'PREPFLOW_CONFIG', {
      path: resolvedPath,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  logger.info('Loaded configuration from prepflow.yaml', { path: resolvedPath });
  cachedConfig = parsed.data;
  return cachedConfig;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
