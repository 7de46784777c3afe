/**
 * Integrity records
 *
 * One record per chart id holding the first content hash ever observed for it.
 */

import { z } from 'zod';
import { ChartIdSchema } from './chart-load-request.js';

/**
 * Lowercase hex SHA-256 digest
 */
export const SHA256_HEX_PATTERN = /^[0-9a-f]{64}$/;

export const ContentHashSchema = z
  .string()
  .regex(SHA256_HEX_PATTERN, 'Content hash must be 64 lowercase hex characters');

export const IntegrityRecordSchema = z.object({
  chartId: ChartIdSchema,
  contentHash: ContentHashSchema,
  firstObservedAt: z.string().datetime({ offset: true }),
  lastVerifiedAt: z.string().datetime({ offset: true }).optional(),
});

export type IntegrityRecord = z.infer<typeof IntegrityRecordSchema>;

/**
 * Result of comparing a freshly computed hash against the registry
 */
export type IntegrityClassification =
  | { kind: 'first-observation'; chartId: string; computedHash: string }
  | { kind: 'match'; chartId: string; record: IntegrityRecord }
  | { kind: 'mismatch'; chartId: string; expectedHash: string; computedHash: string };

export type IntegrityClassificationKind = IntegrityClassification['kind'];
