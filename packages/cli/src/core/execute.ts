/**
 * Command Executor
 *
 * Everything around a handler call: context, output format, printing,
 * error reporting and the process exit code. Handlers stay pure.
 */

import { handleError } from '@prepflow/utils';
import { parseArguments, normalizeOptions } from './argument-parser.js';
import { CommandContext } from './command-context.js';
import { formatOutput } from './output-formatter.js';
import type { CommandDefinition, OutputFormat } from '../types/index.js';

export interface ExecuteOptions {
  ctx?: CommandContext;
  /** Sink for formatted output; defaults to stdout */
  write?: (text: string) => void;
  /** Sink for error messages; defaults to stderr */
  writeError?: (text: string) => void;
}

function extractFormat(args: Record<string, unknown>): { format: OutputFormat; handlerArgs: Record<string, unknown> } {
  const { format, ...handlerArgs } = args;
  return { format: format === 'json' ? 'json' : 'table', handlerArgs };
}

/**
 * Execute a command with arguments already validated against its schema.
 *
 * @returns the process exit code (0 on success)
 */
export async function executeValidated(
  commandDef: CommandDefinition,
  validatedArgs: Record<string, unknown>,
  options: ExecuteOptions = {}
): Promise<number> {
  const write = options.write ?? ((text: string) => process.stdout.write(`${text}\n`));
  const writeError = options.writeError ?? ((text: string) => process.stderr.write(`${text}\n`));

  try {
    const ctx = options.ctx ?? new CommandContext();
    // Format is a CLI concern, not a handler concern
    const { format, handlerArgs } = extractFormat(validatedArgs);
    const result = await commandDef.handler(handlerArgs, ctx);
    write(formatOutput(result, format));
    return 0;
  } catch (error) {
    const handled = handleError(error, { command: commandDef.name });
    writeError(`Error: ${handled.message}`);
    return handled.exitCode;
  }
}

/**
 * Execute a command with raw Commander.js options
 */
export async function execute(
  commandDef: CommandDefinition,
  rawOptions: Record<string, unknown>,
  options: ExecuteOptions = {}
): Promise<number> {
  let args: Record<string, unknown>;
  try {
    const parsed: unknown = parseArguments(commandDef.schema, normalizeOptions(rawOptions));
    args = typeof parsed === 'object' && parsed !== null ? { ...parsed } : {};
  } catch (error) {
    const handled = handleError(error, { command: commandDef.name });
    (options.writeError ?? ((text: string) => process.stderr.write(`${text}\n`)))(`Error: ${handled.message}`);
    return handled.exitCode;
  }
  return executeValidated(commandDef, args, options);
}
