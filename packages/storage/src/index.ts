/**
 * @chartlane/storage - key-value stores and the chart integrity registry
 */

export { InMemoryKeyValueStore } from './kv/in-memory-kv-store.js';
export { FileKeyValueStore } from './kv/file-kv-store.js';
export {
  ChartIntegrityRegistry,
  INTEGRITY_STORE_KEY,
} from './integrity/chart-integrity-registry.js';
export type { ChartIntegrityRegistryOptions } from './integrity/chart-integrity-registry.js';
