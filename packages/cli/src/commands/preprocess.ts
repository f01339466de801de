/**
 * Preprocess Commands
 */

import type { Command } from 'commander';
import { defineCommand } from '../core/defineCommand.js';
import { commandDefinition, commandRegistry } from '../core/command-registry.js';
import { analyzeSchema, applySchema, inspectSchema, transformsSchema } from '../command-defs/preprocess.js';
import { analyzeHandler } from '../handlers/preprocess/analyze.js';
import { applyHandler } from '../handlers/preprocess/apply.js';
import { inspectHandler } from '../handlers/preprocess/inspect.js';
import { listTransformsHandler } from '../handlers/preprocess/list-transforms.js';
import type { PackageCommandModule } from '../types/index.js';

export const PREPROCESS_PACKAGE = 'preprocess';

/**
 * Register preprocess commands on the top-level program
 */
export function registerPreprocessCommands(program: Command): void {
  const analyzeCmd = program
    .command('analyze')
    .description('Analyze a batch, transform it and write the frozen artifact')
    .requiredOption('--schema <file>', 'Input schema (JSON or YAML)')
    .requiredOption('--batch <file>', 'Batch of records (JSON array or NDJSON)')
    .requiredOption('--transform <id>', 'Registered transform id')
    .requiredOption('--out <file>', 'Where to write the artifact')
    .option('--output <file>', 'Write transformed records as NDJSON')
    .option('--lenient', 'Skip invalid records instead of failing')
    .option('--shards <n>', 'Number of shards for the analysis pass')
    .option('--format <format>', 'Output format (json, table)', 'table');

  defineCommand(analyzeCmd, { name: 'analyze', packageName: PREPROCESS_PACKAGE });

  const applyCmd = program
    .command('apply')
    .description('Transform a single record with a frozen artifact')
    .requiredOption('--artifact <file>', 'Artifact written by analyze')
    .requiredOption('--record <json>', 'Record as a JSON object')
    .option('--format <format>', 'Output format (json, table)', 'table');

  defineCommand(applyCmd, { name: 'apply', packageName: PREPROCESS_PACKAGE });

  const inspectCmd = program
    .command('inspect')
    .description('Show the schemas and constants of an artifact')
    .requiredOption('--artifact <file>', 'Artifact written by analyze')
    .option('--format <format>', 'Output format (json, table)', 'table');

  defineCommand(inspectCmd, { name: 'inspect', packageName: PREPROCESS_PACKAGE });

  const transformsCmd = program
    .command('transforms')
    .description('List registered transforms')
    .option('--format <format>', 'Output format (json, table)', 'table');

  defineCommand(transformsCmd, { name: 'transforms', packageName: PREPROCESS_PACKAGE });
}

/**
 * Register as package command module
 */
export const preprocessModule: PackageCommandModule = {
  packageName: PREPROCESS_PACKAGE,
  description: 'Analyze batches, serve records and inspect frozen artifacts',
  commands: [
    commandDefinition({
      name: 'analyze',
      description: 'Analyze a batch, transform it and write the frozen artifact',
      schema: analyzeSchema,
      handler: analyzeHandler,
      examples: [
        'prepflow analyze --schema schema.yaml --batch train.ndjson --transform example.basic --out artifact.json',
        'prepflow analyze --schema schema.json --batch train.json --transform example.basic --out artifact.json --lenient --shards 4',
      ],
    }),
    commandDefinition({
      name: 'apply',
      description: 'Transform a single record with a frozen artifact',
      schema: applySchema,
      handler: applyHandler,
      examples: [`prepflow apply --artifact artifact.json --record '{"x": 2, "y": 5, "s": "hello"}'`],
    }),
    commandDefinition({
      name: 'inspect',
      description: 'Show the schemas and constants of an artifact',
      schema: inspectSchema,
      handler: inspectHandler,
      examples: ['prepflow inspect --artifact artifact.json --format json'],
    }),
    commandDefinition({
      name: 'transforms',
      description: 'List registered transforms',
      schema: transformsSchema,
      handler: listTransformsHandler,
      examples: ['prepflow transforms'],
    }),
  ],
};

commandRegistry.registerPackage(preprocessModule);
