/**
 * Integrity Show Handler
 */

import type { IntegrityRecord } from '@chartlane/core';
import { NotFoundError } from '@chartlane/utils';
import type { CommandContext } from '../../core/command-context.js';
import type { ShowIntegrityArgs } from '../../command-defs/integrity.js';

export async function showIntegrityHandler(args: ShowIntegrityArgs, ctx: CommandContext): Promise<IntegrityRecord> {
  const registry = await ctx.registry();
  const record = registry.lookup(args.chartId);
  if (!record) {
    throw new NotFoundError('Integrity record', args.chartId);
  }
  return record;
}
