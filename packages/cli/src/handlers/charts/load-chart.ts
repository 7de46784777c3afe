/**
 * Chart Load Handler
 *
 * Queues every requested chart on one ChartLoadQueue, so loads run one at a
 * time in argument order, and reports one row per chart.
 */

import {
  createChartLoadRequest,
  formatLoadErrorSummary,
  isLoadSuccess,
  type LoadResult,
} from '@chartlane/core';
import type { Iso8211Summary, ProgressEvent } from '@chartlane/ingestion';
import type { CommandContext } from '../../core/command-context.js';
import type { LoadChartArgs } from '../../command-defs/charts.js';

export interface LoadChartRow {
  chartId: string;
  status: 'loaded' | 'failed';
  /** first-observation | match on success, the LoadErrorKind on failure */
  outcome: string;
  retries: number;
  durationMs: number;
  message: string;
  /** Only with --verbose */
  detail?: string;
}

function toRow(result: LoadResult<Iso8211Summary>): LoadChartRow {
  if (isLoadSuccess(result)) {
    return {
      chartId: result.chartId,
      status: 'loaded',
      outcome: result.integrity,
      retries: result.retryCount,
      durationMs: result.durationMs,
      message: `${result.entryPath}: ${result.features.recordCount} records, sha256 ${result.contentHash}`,
    };
  }

  const row: LoadChartRow = {
    chartId: result.chartId,
    status: 'failed',
    outcome: result.error.kind,
    retries: result.retryCount,
    durationMs: result.durationMs,
    message: formatLoadErrorSummary(result.error),
  };
  if (result.error.technicalDetail !== undefined) {
    row.detail = result.error.technicalDetail;
  }
  return row;
}

export async function loadChartHandler(args: LoadChartArgs, ctx: CommandContext): Promise<LoadChartRow[]> {
  const loader = await ctx.loader({ verbose: args.verbose, injectFailures: args.injectFailures });

  loader.progress.on('started', (event: ProgressEvent) => {
    ctx.notify(`Still loading ${event.chartId}...`);
  });

  const queue = ctx.queue(loader, args.expectedPath);
  const pending = args.chartIds.map((chartId) =>
    queue.enqueue(createChartLoadRequest({ chartId, archivePath: args.archive }, ctx.clock))
  );

  try {
    const results = await Promise.all(pending);
    return results.map(toRow);
  } finally {
    await queue.close();
  }
}
