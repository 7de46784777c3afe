/**
 * In-memory key-value store
 *
 * Non-durable; used by tests and by callers that do not need trust to survive
 * a restart. Values are copied on the way in and out so callers cannot mutate
 * stored bytes.
 */

import type { KeyValueStorePort } from '@chartlane/core';

export class InMemoryKeyValueStore implements KeyValueStorePort {
  private entries: Map<string, Uint8Array> = new Map();

  async get(key: string): Promise<Uint8Array | null> {
    const value = this.entries.get(key);
    return value ? value.slice() : null;
  }

  async put(key: string, value: Uint8Array): Promise<void> {
    this.entries.set(key, value.slice());
  }

  /**
   * Keys currently stored
   */
  keys(): string[] {
    return Array.from(this.entries.keys());
  }
}
