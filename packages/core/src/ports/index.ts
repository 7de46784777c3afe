/**
 * Ports Barrel Export
 *
 * All port interfaces are exported from here.
 */

export type { ClockPort } from './clockPort.js';
export { createSystemClock, createSteppingClock } from './clockPort.js';
export type { KeyValueStorePort } from './keyValueStorePort.js';
export type { ArchiveSourcePort } from './archiveSourcePort.js';
export type { IntegrityRegistryPort } from './integrityRegistryPort.js';
export type { DatasetDecoderPort, DecodeOutcome } from './datasetDecoderPort.js';
export { decoded, retryableFailure, permanentFailure } from './datasetDecoderPort.js';
