/**
 * Key-Value Store Port
 *
 * Durable byte-oriented storage consumed by the integrity registry.
 * Adapters (file system, in-memory) live in @chartlane/storage.
 */

/**
 * Key-Value Store Port Interface
 *
 * Contract: a value written with `put` is returned byte-for-byte by a later `get`
 * for the same key, including across process restarts for durable adapters.
 */
export interface KeyValueStorePort {
  /**
   * Read the value stored under `key`, or null when absent
   */
  get(key: string): Promise<Uint8Array | null>;

  /**
   * Write `value` under `key`, replacing any previous value. Resolves once durable.
   */
  put(key: string, value: Uint8Array): Promise<void>;
}
