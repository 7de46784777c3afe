/**
 * Chart Commands - load charts through the queue, inspect archives
 */

import type { Command } from 'commander';
import type { CommandDefinition, PackageCommandModule } from '../types/index.js';
import { commandRegistry } from '../core/command-registry.js';
import { defineCommand } from '../core/defineCommand.js';
import { coerceNumber } from '../core/coerce.js';
import { listEntriesSchema, loadChartSchema } from '../command-defs/charts.js';
import { loadChartHandler } from '../handlers/charts/load-chart.js';
import { listEntriesHandler } from '../handlers/charts/list-entries.js';

export function registerChartCommands(program: Command): void {
  const chartCmd = program.command('chart').description('Load and inspect chart archives');

  const loadCmd = chartCmd
    .command('load')
    .description('Load one or more charts from an archive, one at a time')
    .argument('<chartIds...>', 'Chart ids, e.g. US5WA50M')
    .requiredOption('--archive <path>', 'ZIP archive holding the charts')
    .option('--expected-path <path>', 'Archive entry to try before the standard layouts')
    .option('--verbose', 'Include technical detail in failures')
    .option('--inject-failures <n>', 'Fail the first N decode attempts transiently')
    .option('--format <format>', 'Output format (json, table)', 'table');

  defineCommand(loadCmd, {
    name: 'load',
    packageName: 'chart',
    argsToOpts: (args, raw) => ({ ...raw, chartIds: args[0] }),
    coerce: (raw) => ({
      ...raw,
      injectFailures: coerceNumber(raw.injectFailures, 'inject-failures'),
    }),
  });

  const entriesCmd = chartCmd
    .command('entries')
    .description('List the file entries of an archive')
    .requiredOption('--archive <path>', 'ZIP archive')
    .option('--format <format>', 'Output format (json, table)', 'table');

  defineCommand(entriesCmd, {
    name: 'entries',
    packageName: 'chart',
  });
}

const loadCommand: CommandDefinition<typeof loadChartSchema> = {
  name: 'load',
  description: 'Load one or more charts from an archive, one at a time',
  schema: loadChartSchema,
  handler: loadChartHandler,
  examples: [
    'chartlane chart load US5WA50M --archive ./ENC_ROOT.zip',
    'chartlane chart load US5WA50M US5WA51M --archive ./charts.zip --verbose --format json',
    'chartlane chart load US5WA50M --archive ./charts.zip --inject-failures 2',
  ],
};

const entriesCommand: CommandDefinition<typeof listEntriesSchema> = {
  name: 'entries',
  description: 'List the file entries of an archive',
  schema: listEntriesSchema,
  handler: listEntriesHandler,
  examples: ['chartlane chart entries --archive ./charts.zip'],
};

export const chartModule: PackageCommandModule = {
  packageName: 'chart',
  description: 'Load and inspect chart archives',
  commands: [loadCommand, entriesCommand],
};

commandRegistry.registerPackage(chartModule);
