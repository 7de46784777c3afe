/**
 * Integrity Command Definitions
 */

import { z } from 'zod';
import { ChartIdSchema } from '@chartlane/core';

export const showIntegritySchema = z.object({
  chartId: ChartIdSchema,
  format: z.enum(['json', 'table']).default('table'),
});

export const listIntegritySchema = z.object({
  format: z.enum(['json', 'table']).default('table'),
});

export const seedIntegritySchema = z.object({
  manifest: z.string().min(1),
  format: z.enum(['json', 'table']).default('table'),
});

export const resetIntegritySchema = z.object({
  chartId: ChartIdSchema,
  format: z.enum(['json', 'table']).default('table'),
});

/**
 * Seed manifest: chart id to lowercase or uppercase hex SHA-256
 */
export const SeedManifestSchema = z.record(
  ChartIdSchema,
  z.string().regex(/^[0-9a-fA-F]{64}$/, 'Expected a hex SHA-256 digest')
);

export type ShowIntegrityArgs = z.infer<typeof showIntegritySchema>;
export type ListIntegrityArgs = z.infer<typeof listIntegritySchema>;
export type SeedIntegrityArgs = z.infer<typeof seedIntegritySchema>;
export type ResetIntegrityArgs = z.infer<typeof resetIntegritySchema>;
