/**
 * Standard Command Wrapper
 *
 * Commander owns flags and parsing; the wrapper looks the command up in the
 * registry, validates with the registered schema and runs it. The registry
 * schema is the only validation path.
 *
 * Invariant: option keys are never renamed.
 */

import type { Command } from 'commander';
import { NotFoundError } from '@prepflow/utils';
import { commandRegistry } from './command-registry.js';
import type { CommandRegistry } from './command-registry.js';
import { execute } from './execute.js';
import type { ExecuteOptions } from './execute.js';

export interface DefineCommandArgs {
  name: string;
  packageName: string;
  /** Merge positional Commander arguments into options */
  argsToOpts?: (args: unknown[], rawOpts: Record<string, unknown>) => Record<string, unknown>;
  registry?: CommandRegistry;
  execution?: ExecuteOptions;
}

export function defineCommand(cmd: Command, args: DefineCommandArgs): Command {
  cmd.action(async (...commanderArgs: unknown[]) => {
    const registry = args.registry ?? commandRegistry;
    const commandDef = registry.getCommand(args.packageName, args.name);
    if (!commandDef) {
      throw new NotFoundError('Command', `${args.packageName}.${args.name}`);
    }

    const rawOpts: Record<string, unknown> = cmd.opts();
    // Commander passes positionals first, then the options object and the command
    const positionals = commanderArgs.slice(0, -2);
    const merged = args.argsToOpts ? args.argsToOpts(positionals, rawOpts) : rawOpts;

    const exitCode = await execute(commandDef, merged, args.execution);
    if (exitCode !== 0) {
      process.exitCode = exitCode;
    }
  });

  return cmd;
}
