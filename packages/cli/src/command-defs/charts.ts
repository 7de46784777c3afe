/**
 * Chart Command Definitions
 */

import { z } from 'zod';
import { ChartIdSchema } from '@chartlane/core';

export const loadChartSchema = z.object({
  chartIds: z.array(ChartIdSchema).min(1),
  archive: z.string().min(1),
  expectedPath: z.string().min(1).optional(),
  verbose: z.boolean().optional(),
  injectFailures: z.number().int().min(0).max(10).optional(),
  format: z.enum(['json', 'table']).default('table'),
});

export const listEntriesSchema = z.object({
  archive: z.string().min(1),
  format: z.enum(['json', 'table']).default('table'),
});

export type LoadChartArgs = z.infer<typeof loadChartSchema>;
export type ListEntriesArgs = z.infer<typeof listEntriesSchema>;
