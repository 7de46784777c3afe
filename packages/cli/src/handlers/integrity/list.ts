import type { IntegrityRecord } from '@chartlane/core';
import type { CommandContext } from '../../core/command-context.js';
import type { ListIntegrityArgs } from '../../command-defs/integrity.js';

export async function listIntegrityHandler(_args: ListIntegrityArgs, ctx: CommandContext): Promise<IntegrityRecord[]> {
  const registry = await ctx.registry();
  return registry.list();
}
