import type { IntegrityClassification, IntegrityRecord } from '../domain/integrity-record.js';

/**
 * Integrity Registry Port
 *
 * First-use trust store for dataset hashes. Implementations must serialize
 * classify/commit for the same chart id.
 */
export interface IntegrityRegistryPort {
  lookup(chartId: string): IntegrityRecord | null;
  classify(chartId: string, computedHash: string): Promise<IntegrityClassification>;
  commit(chartId: string, hash: string): Promise<IntegrityRecord>;
  /**
   * classify, then commit when the hash was seen for the first time, without
   * letting another caller interleave for the same chart id
   */
  verifyAndCapture(chartId: string, computedHash: string): Promise<IntegrityClassification>;
}
