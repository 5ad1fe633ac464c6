#!/usr/bin/env node

/**
 * barreplay CLI Entry Point
 *
 * Importing a command module registers its definitions in commandRegistry;
 * registerXCommands adds the Commander options and wires them to execute().
 */

import { program } from 'commander';
import { logger } from '@barreplay/utils';
import { registerBacktestCommands } from '../commands/backtest.js';

program
  .name('barreplay')
  .description('Bar-by-bar strategy replay with maker/taker fills')
  .version('0.1.0');

registerBacktestCommands(program);

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

async function main(): Promise<void> {
  await program.parseAsync();
}

main().catch((error: unknown) => {
  logger.error('Unhandled error in CLI', error);
  process.exit(1);
});

export { program };
