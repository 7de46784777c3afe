#!/usr/bin/env -S node --import tsx

/**
 * chartlane CLI Entry Point
 *
 * Command modules register themselves in commandRegistry when imported (side effects).
 * registerXCommands functions add Commander options and wire them to execute(),
 * which uses handlers from the registry.
 */

import { program } from 'commander';
import { logger } from '@chartlane/utils';
import { registerChartCommands } from '../commands/charts.js';
import { registerIntegrityCommands } from '../commands/integrity.js';
import { reportFailure } from '../core/execute.js';

program
  .name('chartlane')
  .description('Load nautical chart archives with first-use integrity checks')
  .version('0.1.0');

registerChartCommands(program);
registerIntegrityCommands(program);

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
  reportFailure(error);
});
