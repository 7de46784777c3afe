/**
 * @chartlane/utils - Shared utilities package
 *
 * Exports only:
 * - Logger utilities
 * - Configuration loading
 * - Error classes and handling
 * - Retry and mutual-exclusion helpers
 */

export { logger, Logger, LogLevel, winstonLogger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

export * from './config/index.js';

export * from './errors.js';
export { handleError, retryWithBackoff, backoffDelayMs, delay } from './error-handler.js';
export type { ErrorHandlerResult, RetryOptions, RetryOutcome } from './error-handler.js';

export { KeyedMutex } from './keyed-mutex.js';
