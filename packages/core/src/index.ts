/**
 * @chartlane/core - domain types, load error taxonomy and ports
 *
 * No dependencies on other @chartlane packages.
 */

export * from './ports/index.js';
export { ValidationError } from './errors.js';

export {
  CHART_ID_PATTERN,
  ChartIdSchema,
  ChartLoadRequestSchema,
  assertChartId,
  createChartLoadRequest,
} from './domain/chart-load-request.js';
export type { ChartLoadRequest, ChartLoadRequestInput } from './domain/chart-load-request.js';

export {
  SHA256_HEX_PATTERN,
  ContentHashSchema,
  IntegrityRecordSchema,
} from './domain/integrity-record.js';
export type {
  IntegrityRecord,
  IntegrityClassification,
  IntegrityClassificationKind,
} from './domain/integrity-record.js';

export {
  LoadErrorKind,
  MAX_LOAD_ERROR_MESSAGE_LENGTH,
  createLoadError,
  truncateMessage,
  getGuidance,
  formatLoadErrorSummary,
  formatLoadErrorDetail,
} from './domain/load-error.js';
export type { LoadError, LoadErrorInput, LoadErrorOptions } from './domain/load-error.js';

export { isLoadSuccess, isLoadFailure } from './domain/load-result.js';
export type { LoadResult, LoadSuccess, LoadFailure, LoadStage } from './domain/load-result.js';

export { IDLE_QUEUE_STATUS } from './domain/queue-status.js';
export type { QueueStatus } from './domain/queue-status.js';

export { computeDatasetHash, isContentHash, normalizeContentHash } from './hashing/dataset-hash.js';
export { toIsoTimestamp, fromIsoTimestamp } from './time/timestamps.js';
