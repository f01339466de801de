#!/usr/bin/env tsx

/**
 * prepflow CLI Entry Point
 *
 * Importing the command module registers its handlers in commandRegistry;
 * registerPreprocessCommands adds the Commander options and wires them to execute().
 */

import { program } from 'commander';
import { handleError } from '@prepflow/utils';
import { registerPreprocessCommands } from '../commands/preprocess.js';

program
  .name('prepflow')
  .description('Schema-driven feature preprocessing: analyze once, serve the same transform')
  .version('0.1.0');

registerPreprocessCommands(program);

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

async function main(): Promise<void> {
  await program.parseAsync();
}

main().catch((error: unknown) => {
  const handled = handleError(error, { command: 'prepflow' });
  process.stderr.write(`Error: ${handled.message}\n`);
  process.exitCode = handled.exitCode;
});

export { program };
