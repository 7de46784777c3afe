/**
 * Chart load requests
 *
 * Created by the caller, immutable, consumed once by the load queue.
 */

import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { createSystemClock, type ClockPort } from '../ports/clockPort.js';

/**
 * Chart identifiers are plain cell names (e.g. US5WA50M): no path separators, no dots
 */
export const CHART_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export const ChartIdSchema = z
  .string()
  .regex(CHART_ID_PATTERN, 'Chart id must be 1-64 letters, digits, "_" or "-"');

export const ChartLoadRequestSchema = z.object({
  chartId: ChartIdSchema,
  archivePath: z.string().min(1, 'Archive path is required'),
  enqueuedAt: z.number().int().nonnegative(),
});

export type ChartLoadRequest = Readonly<z.infer<typeof ChartLoadRequestSchema>>;

export interface ChartLoadRequestInput {
  chartId: string;
  archivePath: string;
}

/**
 * Validate a chart id, throwing ValidationError when it is unusable
 */
export function assertChartId(chartId: string): void {
  const result = ChartIdSchema.safeParse(chartId);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? 'Invalid chart id', { chartId });
  }
}

/**
 * Build a frozen, validated request stamped with the clock's current time
 */
export function createChartLoadRequest(
  input: ChartLoadRequestInput,
  clock: ClockPort = createSystemClock()
): ChartLoadRequest {
  const result = ChartLoadRequestSchema.safeParse({ ...input, enqueuedAt: clock.nowMs() });
  if (!result.success) {
    throw new ValidationError('Invalid chart load request', {
      chartId: input.chartId,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return Object.freeze(result.data);
}
