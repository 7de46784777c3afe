/**
 * Integrity Seed Handler
 *
 * Reads a JSON manifest of `{ "<chartId>": "<sha256>" }` and pre-trusts every
 * chart that has no record yet. Existing records are left alone.
 */

import { readFile } from 'fs/promises';
import { ValidationError } from '@chartlane/utils';
import type { CommandContext } from '../../core/command-context.js';
import { SeedManifestSchema, type SeedIntegrityArgs } from '../../command-defs/integrity.js';

export interface SeedIntegrityResult {
  manifest: string;
  requested: number;
  inserted: string[];
  skipped: string[];
}

async function readManifest(path: string): Promise<Record<string, string>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ValidationError(`Could not read seed manifest ${path}`, {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const result = SeedManifestSchema.safeParse(parsed);
  if (!result.success) {
    throw new ValidationError(`Invalid seed manifest ${path}`, {
      path,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return result.data;
}

export async function seedIntegrityHandler(
  args: SeedIntegrityArgs,
  ctx: CommandContext
): Promise<SeedIntegrityResult> {
  const entries = await readManifest(args.manifest);
  const registry = await ctx.registry();
  const inserted = await registry.seed(entries);

  return {
    manifest: args.manifest,
    requested: Object.keys(entries).length,
    inserted,
    skipped: Object.keys(entries).filter((chartId) => !inserted.includes(chartId)),
  };
}
