/**
 * Command Registry - command lookup and help text
 */

import type { z } from 'zod';
import { ConfigurationError } from '@prepflow/utils';
import type { CommandContext } from './command-context.js';
import type { CommandDefinition, PackageCommandModule } from '../types/index.js';

/**
 * Build a command definition whose handler is typed by its schema.
 * The handler re-parses its input, so it is safe to call with raw arguments.
 */
export function commandDefinition<S extends z.ZodTypeAny>(definition: {
  name: string;
  description: string;
  schema: S;
  handler: (args: z.infer<S>, ctx: CommandContext) => Promise<unknown>;
  examples?: string[];
}): CommandDefinition {
  return {
    name: definition.name,
    description: definition.description,
    schema: definition.schema,
    handler: (args, ctx) => definition.handler(definition.schema.parse(args), ctx),
    examples: definition.examples,
  };
}

/**
 * Command registry for managing CLI commands
 */
export class CommandRegistry {
  private packages: Map<string, PackageCommandModule> = new Map();
  private commands: Map<string, CommandDefinition> = new Map();

  /**
   * Register a command module
   */
  registerPackage(module: PackageCommandModule): void {
    if (this.packages.has(module.packageName)) {
      throw new ConfigurationError(`Package ${module.packageName} is already registered`, 'packageName', {
        packageName: module.packageName,
      });
    }

    const seen = new Set<string>();
    for (const command of module.commands) {
      const fullName = `${module.packageName}.${command.name}`;
      if (this.commands.has(fullName) || seen.has(fullName)) {
        throw new ConfigurationError(`Command ${fullName} is already registered`, 'commandName', {
          packageName: module.packageName,
          commandName: command.name,
        });
      }
      seen.add(fullName);
    }

    this.packages.set(module.packageName, module);
    for (const command of module.commands) {
      this.commands.set(`${module.packageName}.${command.name}`, command);
    }
  }

  /**
   * Get a command by full name (package.command)
   */
  getCommand(packageName: string, commandName: string): CommandDefinition | undefined {
    return this.commands.get(`${packageName}.${commandName}`);
  }

  getPackageCommands(packageName: string): CommandDefinition[] {
    return this.packages.get(packageName)?.commands ?? [];
  }

  getPackages(): PackageCommandModule[] {
    return Array.from(this.packages.values());
  }

  getAllCommands(): CommandDefinition[] {
    return Array.from(this.commands.values());
  }

  /**
   * Generate help text for a package
   */
  generatePackageHelp(packageName: string): string {
    const module = this.packages.get(packageName);
    if (!module) {
      return `Package ${packageName} not found`;
    }

    const lines: string[] = [];
    lines.push(module.description);
    lines.push('');
    lines.push('Commands:');
    for (const command of module.commands) {
      lines.push(`  ${command.name.padEnd(20)} ${command.description}`);
      for (const example of command.examples ?? []) {
        lines.push(`    Example: ${example}`);
      }
    }

    return lines.join('\n');
  }
}

/**
 * Global command registry instance
 */
export const commandRegistry = new CommandRegistry();
