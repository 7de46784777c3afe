/**
 * Integrity Reset Handler
 *
 * Operator-only: drops the trusted hash so the next load captures the current
 * archive content as a first observation.
 */

import type { CommandContext } from '../../core/command-context.js';
import type { ResetIntegrityArgs } from '../../command-defs/integrity.js';

export interface ResetIntegrityResult {
  chartId: string;
  removed: boolean;
}

export async function resetIntegrityHandler(
  args: ResetIntegrityArgs,
  ctx: CommandContext
): Promise<ResetIntegrityResult> {
  const registry = await ctx.registry();
  const removed = await registry.forget(args.chartId);
  return { chartId: args.chartId, removed };
}
