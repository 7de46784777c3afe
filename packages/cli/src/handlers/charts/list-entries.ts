/**
 * Archive Entries Handler - file entries of a chart archive
 */

import type { ArchiveEntry } from '@chartlane/ingestion';
import type { CommandContext } from '../../core/command-context.js';
import type { ListEntriesArgs } from '../../command-defs/charts.js';

export async function listEntriesHandler(args: ListEntriesArgs, ctx: CommandContext): Promise<ArchiveEntry[]> {
  const bytes = await ctx.archiveSource().read(args.archive);
  return ctx.extractor().listEntries(bytes);
}
