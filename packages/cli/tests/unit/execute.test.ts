/**
 * execute() and defineCommand() wiring
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Command } from 'commander';
import { z } from 'zod';
import { ChartIdSchema } from '@chartlane/core';
import { NotFoundError } from '@chartlane/utils';
import { execute } from '../../src/core/execute.js';
import { defineCommand } from '../../src/core/defineCommand.js';
import { coerceNumber } from '../../src/core/coerce.js';
import { commandRegistry } from '../../src/core/command-registry.js';
import type { CommandDefinition } from '../../src/types/index.js';
import { createTestContext } from '../helpers/context.js';

const echoSchema = z.object({
  chartId: ChartIdSchema,
  limit: z.number().int().positive().optional(),
  format: z.enum(['json', 'table']).default('table'),
});

const echoCommand: CommandDefinition<typeof echoSchema> = {
  name: 'echo',
  description: 'Echo the validated arguments',
  schema: echoSchema,
  handler: async (args) => ({ chartId: args.chartId, limit: args.limit }),
};

const missingCommand: CommandDefinition<typeof echoSchema> = {
  name: 'missing',
  description: 'Always fails',
  schema: echoSchema,
  handler: async (args) => {
    throw new NotFoundError('Integrity record', args.chartId);
  },
};

commandRegistry.registerPackage({
  packageName: 'execute-test',
  description: 'Commands used by the executor tests',
  commands: [echoCommand],
});

afterEach(() => {
  process.exitCode = undefined;
});

describe('execute', () => {
  it('validates, runs the handler and writes formatted output', async () => {
    const out: string[] = [];
    await execute(echoCommand, { chartId: 'US5WA50M', format: 'json' }, {
      context: createTestContext().ctx,
      write: (text) => out.push(text),
    });

    expect(out).toEqual(['{\n  "chartId": "US5WA50M"\n}']);
    expect(process.exitCode).toBeUndefined();
  });

  it('drops unset options so schema defaults apply', async () => {
    const out: string[] = [];
    await execute(echoCommand, { chartId: 'US5WA50M', format: undefined, limit: null }, {
      context: createTestContext().ctx,
      write: (text) => out.push(text),
    });

    expect(out[0]?.split('\n')).toEqual([
      'key     | value   ',
      '--------|---------',
      'chartId | US5WA50M',
      'limit   |         ',
    ]);
  });

  it('reports invalid arguments and sets exit code 1', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const out: string[] = [];

    await execute(echoCommand, { chartId: '../US5WA50M' }, { write: (text) => out.push(text) });

    expect(out).toEqual([]);
    expect(process.exitCode).toBe(1);
    expect(errors).toHaveBeenCalledWith(
      'Error: Invalid arguments:\n  chartId: Chart id must be 1-64 letters, digits, "_" or "-"'
    );
  });

  it('reports handler errors and sets exit code 1', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await execute(missingCommand, { chartId: 'US5WA50M' }, { write: () => undefined });

    expect(process.exitCode).toBe(1);
    expect(errors).toHaveBeenCalledWith("Error: Integrity record with identifier 'US5WA50M' not found");
  });
});

describe('defineCommand', () => {
  function echoCli(): Command {
    const cmd = new Command('echo')
      .argument('<chartId>', 'Chart id')
      .option('--limit <n>', 'Limit')
      .option('--format <format>', 'Output format', 'table');

    return defineCommand(cmd, {
      name: 'echo',
      packageName: 'execute-test',
      argsToOpts: (args, raw) => ({ ...raw, chartId: args[0] }),
      coerce: (raw) => ({ ...raw, limit: coerceNumber(raw.limit, 'limit') }),
    });
  }

  it('merges positional arguments and coerces numeric flags', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await echoCli().parseAsync(['US5WA50M', '--limit', '3', '--format', 'json'], { from: 'user' });

    expect(log).toHaveBeenCalledWith('{\n  "chartId": "US5WA50M",\n  "limit": 3\n}');
  });

  it('keeps numeric-looking chart ids as strings', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await echoCli().parseAsync(['10001', '--format', 'json'], { from: 'user' });

    expect(log).toHaveBeenCalledWith('{\n  "chartId": "10001"\n}');
  });

  it('reports a bad numeric flag', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await echoCli().parseAsync(['US5WA50M', '--limit', 'lots'], { from: 'user' });

    expect(process.exitCode).toBe(1);
    expect(errors).toHaveBeenCalledWith('Error: Invalid number for limit');
  });

  it('reports a command missing from the registry', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const cmd = defineCommand(new Command('ghost'), { name: 'ghost', packageName: 'execute-test' });

    await cmd.parseAsync([], { from: 'user' });

    expect(process.exitCode).toBe(1);
    expect(errors).toHaveBeenCalledWith("Error: Command with identifier 'execute-test.ghost' not found");
  });
});
