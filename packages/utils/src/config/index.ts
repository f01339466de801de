/**
 * Configuration loading from environment variables and prepflow.yaml
 *
 * Priority: prepflow.yaml > environment variables > defaults.
 * Explicit options passed to a pipeline override all of these.
 */

import { ConfigurationError } from '../errors.js';
import { loadConfigFromYaml } from './yaml-config.js';

export type ValidationMode = 'strict' | 'lenient';

export interface PipelineConfig {
  validationMode: ValidationMode;
  shardCount: number;
}

function parseValidationMode(value: string | undefined): ValidationMode {
  if (value === undefined || value === '') {
    return 'strict';
  }
  if (value === 'strict' || value === 'lenient') {
    return value;
  }
  throw new ConfigurationError(
    `PREPFLOW_VALIDATION_MODE must be 'strict' or 'lenient', got '${value}'`,
    'PREPFLOW_VALIDATION_MODE'
  );
}

function parseShardCount(value: string | undefined): number {
  if (value === undefined || value === '') {
    return 1;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(
      `PREPFLOW_SHARD_COUNT must be a positive integer, got '${value}'`,
      'PREPFLOW_SHARD_COUNT'
    );
  }
  return parsed;
}

/**
 * Load pipeline configuration
 */
export function getPipelineConfig(): PipelineConfig {
  const { PREPFLOW_VALIDATION_MODE, PREPFLOW_SHARD_COUNT } = process.env;
  const fromYaml = loadConfigFromYaml().pipeline ?? {};

  return {
    validationMode: fromYaml.validationMode ?? parseValidationMode(PREPFLOW_VALIDATION_MODE),
    shardCount: fromYaml.shardCount ?? parseShardCount(PREPFLOW_SHARD_COUNT),
  };
}

export { loadConfigFromYaml, clearConfigCache, AppConfigSchema, type AppConfig } from './yaml-config.js';
