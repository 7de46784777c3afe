/**
 * Universal Command Executor
 *
 * Handles the universal steps around a handler:
 * - Normalize options
 * - Parse arguments (Zod validation)
 * - Create the context
 * - Call handler
 * - Format output
 * - Error handling
 */

import { normalizeOptions, parseArguments } from './argument-parser.js';
import { formatOutput } from './output-formatter.js';
import { handleError } from './error-handler.js';
import { CommandContext } from './command-context.js';
import type { CommandDefinition, OutputFormat } from '../types/index.js';

export interface ExecuteOptions {
  /** Prebuilt context; tests pass one with in-memory services */
  context?: CommandContext;
  /** Output sink, stdout by default */
  write?: (text: string) => void;
}

function readFormat(args: Record<string, unknown>): OutputFormat {
  return args.format === 'json' ? 'json' : 'table';
}

/**
 * Print a failure and mark the process as failed without cutting pending I/O short
 */
export function reportFailure(error: unknown, context?: Record<string, unknown>): void {
  const message = handleError(error, context);
  console.error(`Error: ${message}`);
  process.exitCode = 1;
}

/**
 * Execute a command definition with pre-validated arguments
 */
export async function executeValidated(
  commandDef: CommandDefinition,
  validatedArgs: Record<string, unknown>,
  options: ExecuteOptions = {}
): Promise<void> {
  const ctx = options.context ?? new CommandContext();
  const write = options.write ?? ((text: string) => console.log(text));

  const result = await commandDef.handler(validatedArgs, ctx);
  write(formatOutput(result, readFormat(validatedArgs)));
}

/**
 * Execute a command definition from raw Commander options
 *
 * Errors never escape: they are logged, printed and turned into exit code 1.
 */
export async function execute(
  commandDef: CommandDefinition,
  rawOptions: Record<string, unknown>,
  options: ExecuteOptions = {}
): Promise<void> {
  try {
    const args: Record<string, unknown> = parseArguments(commandDef.schema, normalizeOptions(rawOptions));
    await executeValidated(commandDef, args, options);
  } catch (error) {
    reportFailure(error, { command: commandDef.name });
  }
}
