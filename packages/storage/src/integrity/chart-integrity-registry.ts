/**
 * Chart Integrity Registry
 *
 * Persistent map from chart id to the content hash first observed for it
 * (trust on first use). Backed by an in-memory cache hydrated from the
 * key-value store when the registry is opened. A mutation reaches the cache
 * only after the store has accepted it.
 *
 * Invariants:
 * - A trusted hash is never replaced by a different one. A mismatch is
 *   reported, not healed; only an explicit `forget` removes trust.
 * - classify/commit for the same chart id are serialized, so two concurrent
 *   first observations cannot both win.
 */

import { z } from 'zod';
import {
  IntegrityRecordSchema,
  assertChartId,
  createSystemClock,
  normalizeContentHash,
  toIsoTimestamp,
  type ClockPort,
  type IntegrityClassification,
  type IntegrityRecord,
  type IntegrityRegistryPort,
  type KeyValueStorePort,
} from '@chartlane/core';
import { IntegrityConflictError, KeyedMutex, StorageError, createLogger } from '@chartlane/utils';

const logger = createLogger('storage');

/**
 * Store key of the registry snapshot. Records are kept as a single blob.
 */
export const INTEGRITY_STORE_KEY = 'chart-integrity.v1';

// Not a valid chart id, so it never collides with a per-chart lock
const PERSIST_LOCK = ':persist';

const RegistrySnapshotSchema = z.object({
  version: z.literal(1),
  records: z.array(IntegrityRecordSchema),
});

type RegistrySnapshot = z.infer<typeof RegistrySnapshotSchema>;

export interface ChartIntegrityRegistryOptions {
  clock?: ClockPort;
  storeKey?: string;
}

export class ChartIntegrityRegistry implements IntegrityRegistryPort {
  private readonly store: KeyValueStorePort;
  private readonly clock: ClockPort;
  private readonly storeKey: string;
  private readonly records: Map<string, IntegrityRecord>;
  private readonly mutex = new KeyedMutex();

  private constructor(
    store: KeyValueStorePort,
    records: Map<string, IntegrityRecord>,
    options: ChartIntegrityRegistryOptions
  ) {
    this.store = store;
    this.records = records;
    this.clock = options.clock ?? createSystemClock();
    this.storeKey = options.storeKey ?? INTEGRITY_STORE_KEY;
  }

  /**
   * Open a registry, loading every stored record into memory
   */
  static async open(
    store: KeyValueStorePort,
    options: ChartIntegrityRegistryOptions = {}
  ): Promise<ChartIntegrityRegistry> {
    const storeKey = options.storeKey ?? INTEGRITY_STORE_KEY;
    const raw = await store.get(storeKey);
    const records = new Map<string, IntegrityRecord>();

    if (raw !== null) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(new TextDecoder().decode(raw));
      } catch (error) {
        throw new StorageError('Integrity registry snapshot is not valid JSON', 'open', {
          storeKey,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      const result = RegistrySnapshotSchema.safeParse(parsed);
      if (!result.success) {
        throw new StorageError('Integrity registry snapshot failed validation', 'open', {
          storeKey,
          issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
      }

      for (const record of result.data.records) {
        records.set(record.chartId, Object.freeze({ ...record }));
      }
    }

    logger.debug('Integrity registry opened', { storeKey, records: records.size });
    return new ChartIntegrityRegistry(store, records, options);
  }

  /**
   * Record for `chartId`, or null when the chart was never observed
   */
  lookup(chartId: string): IntegrityRecord | null {
    return this.records.get(chartId) ?? null;
  }

  /**
   * All records, sorted by chart id
   */
  list(): IntegrityRecord[] {
    return sortByChartId(this.records);
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Compare a freshly computed hash against the trusted one.
   *
   * - no record: first-observation, nothing written (call `commit` next)
   * - same hash: match, lastVerifiedAt bumped and persisted
   * - different hash: mismatch, nothing written
   */
  async classify(chartId: string, computedHash: string): Promise<IntegrityClassification> {
    assertChartId(chartId);
    const hash = normalizeContentHash(computedHash);
    return this.mutex.runExclusive(chartId, () => this.classifyLocked(chartId, hash));
  }

  /**
   * Trust `hash` for a chart that has no record yet.
   *
   * Idempotent: committing the hash already trusted returns the existing record
   * untouched. Committing a different hash throws IntegrityConflictError.
   */
  async commit(chartId: string, hash: string): Promise<IntegrityRecord> {
    assertChartId(chartId);
    const normalized = normalizeContentHash(hash);
    return this.mutex.runExclusive(chartId, () => this.commitLocked(chartId, normalized));
  }

  /**
   * classify followed by commit on first observation, as one step per chart id
   */
  async verifyAndCapture(chartId: string, computedHash: string): Promise<IntegrityClassification> {
    assertChartId(chartId);
    const hash = normalizeContentHash(computedHash);

    return this.mutex.runExclusive(chartId, async () => {
      const classification = await this.classifyLocked(chartId, hash);
      if (classification.kind === 'first-observation') {
        await this.commitLocked(chartId, hash);
      }
      return classification;
    });
  }

  /**
   * Pre-trust hashes from a manifest. Charts that already have a record keep it.
   *
   * @returns chart ids that were inserted
   */
  async seed(entries: Record<string, string>): Promise<string[]> {
    const normalized = Object.entries(entries).map(([chartId, hash]) => {
      assertChartId(chartId);
      return [chartId, normalizeContentHash(hash)] as const;
    });

    const inserted: string[] = [];
    for (const [chartId, hash] of normalized) {
      const added = await this.mutex.runExclusive(chartId, async () => {
        if (this.records.has(chartId)) {
          return false;
        }
        await this.write(chartId, this.newRecord(chartId, hash));
        return true;
      });
      if (added) {
        inserted.push(chartId);
      }
    }

    logger.info('Integrity registry seeded', { requested: normalized.length, inserted: inserted.length });
    return inserted;
  }

  /**
   * Drop trust for a chart so the next load captures a new hash.
   * Never called by the pipeline itself.
   *
   * @returns whether a record existed
   */
  async forget(chartId: string): Promise<boolean> {
    assertChartId(chartId);
    return this.mutex.runExclusive(chartId, async () => {
      if (!this.records.has(chartId)) {
        return false;
      }
      await this.write(chartId, null);
      logger.warn('Integrity record removed', { chartId });
      return true;
    });
  }

  private async classifyLocked(chartId: string, hash: string): Promise<IntegrityClassification> {
    const existing = this.records.get(chartId);

    if (!existing) {
      return { kind: 'first-observation', chartId, computedHash: hash };
    }

    if (existing.contentHash !== hash) {
      logger.warn('Integrity mismatch', { chartId });
      return {
        kind: 'mismatch',
        chartId,
        expectedHash: existing.contentHash,
        computedHash: hash,
      };
    }

    const verified: IntegrityRecord = Object.freeze({
      ...existing,
      lastVerifiedAt: toIsoTimestamp(this.clock.nowMs()),
    });
    await this.write(chartId, verified);
    return { kind: 'match', chartId, record: verified };
  }

  private async commitLocked(chartId: string, hash: string): Promise<IntegrityRecord> {
    const existing = this.records.get(chartId);

    if (existing) {
      if (existing.contentHash === hash) {
        return existing;
      }
      throw new IntegrityConflictError(chartId);
    }

    const record = this.newRecord(chartId, hash);
    await this.write(chartId, record);
    logger.info('Captured first-use integrity hash', { chartId });
    return record;
  }

  private newRecord(chartId: string, hash: string): IntegrityRecord {
    return Object.freeze({
      chartId,
      contentHash: hash,
      firstObservedAt: toIsoTimestamp(this.clock.nowMs()),
    });
  }

  /**
   * Write the snapshot with one change applied, then apply it to the cache.
   *
   * Snapshots are built from committed records only, one at a time, so a
   * rejected write leaves both the store and the cache as they were.
   */
  private async write(chartId: string, next: IntegrityRecord | null): Promise<void> {
    try {
      await this.mutex.runExclusive(PERSIST_LOCK, async () => {
        const committed = new Map(this.records);
        applyChange(committed, chartId, next);
        await this.persist(committed);
        applyChange(this.records, chartId, next);
      });
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      throw new StorageError('Failed to persist integrity registry', 'put', {
        chartId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async persist(records: Map<string, IntegrityRecord>): Promise<void> {
    const snapshot: RegistrySnapshot = { version: 1, records: sortByChartId(records) };
    const bytes = new TextEncoder().encode(JSON.stringify(snapshot));
    await this.store.put(this.storeKey, bytes);
  }
}

function applyChange(
  records: Map<string, IntegrityRecord>,
  chartId: string,
  next: IntegrityRecord | null
): void {
  if (next) {
    records.set(chartId, next);
  } else {
    records.delete(chartId);
  }
}

function sortByChartId(records: Map<string, IntegrityRecord>): IntegrityRecord[] {
  return Array.from(records.values()).sort((a, b) => a.chartId.localeCompare(b.chartId));
}
