/**
 * Integrity Commands - inspect and maintain trusted chart hashes
 */

import type { Command } from 'commander';
import type { CommandDefinition, PackageCommandModule } from '../types/index.js';
import { commandRegistry } from '../core/command-registry.js';
import { defineCommand } from '../core/defineCommand.js';
import {
  listIntegritySchema,
  resetIntegritySchema,
  seedIntegritySchema,
  showIntegritySchema,
} from '../command-defs/integrity.js';
import { showIntegrityHandler } from '../handlers/integrity/show.js';
import { listIntegrityHandler } from '../handlers/integrity/list.js';
import { seedIntegrityHandler } from '../handlers/integrity/seed.js';
import { resetIntegrityHandler } from '../handlers/integrity/reset.js';

export function registerIntegrityCommands(program: Command): void {
  const integrityCmd = program.command('integrity').description('Trusted chart hashes');

  const showCmd = integrityCmd
    .command('show')
    .description('Show the trusted hash of a chart')
    .argument('<chartId>', 'Chart id')
    .option('--format <format>', 'Output format (json, table)', 'table');

  defineCommand(showCmd, {
    name: 'show',
    packageName: 'integrity',
    argsToOpts: (args, raw) => ({ ...raw, chartId: args[0] }),
  });

  const listCmd = integrityCmd
    .command('list')
    .description('List every trusted chart')
    .option('--format <format>', 'Output format (json, table)', 'table');

  defineCommand(listCmd, {
    name: 'list',
    packageName: 'integrity',
  });

  const seedCmd = integrityCmd
    .command('seed')
    .description('Pre-trust hashes from a JSON manifest')
    .requiredOption('--manifest <file>', 'JSON object of chart id to SHA-256')
    .option('--format <format>', 'Output format (json, table)', 'table');

  defineCommand(seedCmd, {
    name: 'seed',
    packageName: 'integrity',
  });

  const resetCmd = integrityCmd
    .command('reset')
    .description('Forget the trusted hash of a chart')
    .argument('<chartId>', 'Chart id')
    .option('--format <format>', 'Output format (json, table)', 'table');

  defineCommand(resetCmd, {
    name: 'reset',
    packageName: 'integrity',
    argsToOpts: (args, raw) => ({ ...raw, chartId: args[0] }),
  });
}

const showCommand: CommandDefinition<typeof showIntegritySchema> = {
  name: 'show',
  description: 'Show the trusted hash of a chart',
  schema: showIntegritySchema,
  handler: showIntegrityHandler,
  examples: ['chartlane integrity show US5WA50M --format json'],
};

const listCommand: CommandDefinition<typeof listIntegritySchema> = {
  name: 'list',
  description: 'List every trusted chart',
  schema: listIntegritySchema,
  handler: listIntegrityHandler,
};

const seedCommand: CommandDefinition<typeof seedIntegritySchema> = {
  name: 'seed',
  description: 'Pre-trust hashes from a JSON manifest',
  schema: seedIntegritySchema,
  handler: seedIntegrityHandler,
  examples: ['chartlane integrity seed --manifest ./trusted-hashes.json'],
};

const resetCommand: CommandDefinition<typeof resetIntegritySchema> = {
  name: 'reset',
  description: 'Forget the trusted hash of a chart',
  schema: resetIntegritySchema,
  handler: resetIntegrityHandler,
  examples: ['chartlane integrity reset US5WA50M'],
};

export const integrityModule: PackageCommandModule = {
  packageName: 'integrity',
  description: 'Trusted chart hashes',
  commands: [showCommand, listCommand, seedCommand, resetCommand],
};

commandRegistry.registerPackage(integrityModule);
