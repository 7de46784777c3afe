/**
 * CLI-specific type definitions
 */

import type { z } from 'zod';
import type { CommandContext } from '../core/command-context.js';

/**
 * Command definition structure
 */
export interface CommandDefinition<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
  /**
   * Command name (e.g., 'load', 'show')
   */
  name: string;

  /**
   * Command description for help text
   */
  description: string;

  /**
   * Zod schema for argument validation
   */
  schema: TSchema;

  /**
   * Pure use-case function; receives arguments that already passed the schema
   */
  handler(args: z.infer<TSchema>, ctx: CommandContext): Promise<unknown>;

  /**
   * Optional examples for help text
   */
  examples?: string[];
}

/**
 * Package command module structure
 */
export interface PackageCommandModule {
  /**
   * Command group name (e.g., 'chart', 'integrity')
   */
  packageName: string;

  description: string;

  commands: CommandDefinition[];
}

/**
 * Output format options
 */
export type OutputFormat = 'json' | 'table';
