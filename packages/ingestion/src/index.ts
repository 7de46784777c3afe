/**
 * @chartlane/ingestion - archive extraction, decoders and the retrying chart loader
 */

export {
  ArchiveExtractor,
  listArchiveEntries,
  selectDatasetEntry,
  normalizeEntryPath,
  DATASET_EXTENSION,
  STANDARD_ROOT_DIR,
} from './archive/ArchiveExtractor.js';
export type {
  ArchiveEntry,
  DatasetLayout,
  DatasetLocation,
  ExtractedDataset,
  ExtractOptions,
} from './archive/ArchiveExtractor.js';
export { FileArchiveSource } from './archive/FileArchiveSource.js';

export { Iso8211LeaderDecoder, parseLeader, ISO8211_LEADER_LENGTH } from './decoders/Iso8211LeaderDecoder.js';
export type { Iso8211Leader, Iso8211Summary } from './decoders/Iso8211LeaderDecoder.js';
export { FaultInjectingDecoder } from './decoders/FaultInjectingDecoder.js';
export type { FaultInjectionOptions, InjectedFaultKind } from './decoders/FaultInjectingDecoder.js';

export { ProgressSignal, PROGRESS_SIGNAL_THRESHOLD_MS } from './loading/ProgressSignal.js';
export type { ProgressEvent, ProgressStop } from './loading/ProgressSignal.js';
export {
  ChartLoadingService,
  DecodeAttemptError,
  DEFAULT_MAX_DECODE_RETRIES,
  DEFAULT_INITIAL_BACKOFF_MS,
} from './loading/ChartLoadingService.js';
export type {
  ChartLoadingDependencies,
  ChartLoadingOptions,
  LoadOptions,
  StageEvent,
} from './loading/ChartLoadingService.js';
