/**
 * Standard Command Wrapper
 *
 * - Commander owns flags & parsing
 * - Wrapper owns: canonical option shape (camelCase), value coercion, schema
 *   validation, error formatting, handler invocation
 *
 * The schema of the registered CommandDefinition is the only validation path.
 *
 * Invariant: Normalization never renames keys. Ever.
 */

import type { Command } from 'commander';
import { NotFoundError } from '@chartlane/utils';
import { commandRegistry } from './command-registry.js';
import { execute, reportFailure } from './execute.js';

type RawOptions = Record<string, unknown>;

export type DefineCommandArgs = {
  name: string;
  packageName: string;
  // Merge Commander positional arguments into options before coercion
  argsToOpts?: (args: unknown[], rawOpts: RawOptions) => RawOptions;
  // Value coercion only (numbers), NOT key renaming
  coerce?: (raw: RawOptions) => RawOptions;
};

export function defineCommand(cmd: Command, args: DefineCommandArgs): Command {
  cmd.action(async (...commanderArgs: unknown[]) => {
    try {
      const commandDef = commandRegistry.getCommand(args.packageName, args.name);
      if (!commandDef) {
        throw new NotFoundError('Command', `${args.packageName}.${args.name}`);
      }

      // Commander gives camelCase keys already
      const rawOpts: RawOptions = cmd.opts();
      const merged = args.argsToOpts ? args.argsToOpts(commanderArgs, rawOpts) : rawOpts;
      const coerced = args.coerce ? args.coerce(merged) : merged;

      await execute(commandDef, coerced);
    } catch (error) {
      reportFailure(error, { command: `${args.packageName}.${args.name}` });
    }
  });

  return cmd;
}
