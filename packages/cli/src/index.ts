/**
 * @prepflow/cli - command line interface
 *
 * Public API exports for the CLI package
 */

export * from './core/command-registry.js';
export * from './core/command-context.js';
export * from './core/argument-parser.js';
export * from './core/output-formatter.js';
export * from './core/input-loader.js';
export * from './core/execute.js';
export * from './core/defineCommand.js';
export * from './command-defs/preprocess.js';
export * from './commands/preprocess.js';
export * from './handlers/preprocess/analyze.js';
export * from './handlers/preprocess/apply.js';
export * from './handlers/preprocess/inspect.js';
export * from './handlers/preprocess/list-transforms.js';
export * from './transforms/index.js';
export type { CommandDefinition, PackageCommandModule, OutputFormat } from './types/index.js';
