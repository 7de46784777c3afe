/**
 * Error Handler
 * =============
 * Centralized error handling and retry utilities.
 */

import { AppError, isRetryableError } from './errors.js';
import { logger } from './logger.js';

/**
 * Error handler result
 */
export interface ErrorHandlerResult {
  handled: boolean;
  message: string;
  shouldRetry: boolean;
}

/**
 * Handle and log error appropriately
 */
export function handleError(error: unknown, context?: Record<string, unknown>): ErrorHandlerResult {
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AppError) {
    if (err.isOperational) {
      logger.warn('Operational error occurred', {
        ...err.context,
        ...context,
        error: {
          name: err.name,
          message: err.message,
          code: err.code,
          statusCode: err.statusCode,
        },
      });
    } else {
      logger.error('Application error occurred', err, {
        ...err.context,
        ...context,
      });
    }
  } else {
    logger.error('Unknown error occurred', err, context);
  }

  return {
    handled: true,
    message: err.message,
    shouldRetry: isRetryableError(err),
  };
}

/**
 * Sleep for the given number of milliseconds
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Options for retryWithBackoff
 */
export interface RetryOptions {
  /**
   * Retries after the first attempt
   * @default 3
   */
  maxRetries?: number;

  /**
   * Delay before the first retry; doubles on every further retry
   * @default 1000
   */
  initialDelayMs?: number;

  /**
   * Decides whether a failure may be retried. Non-retryable failures stop the loop.
   * @default isRetryableError
   */
  isRetryable?: (error: unknown) => boolean;

  /**
   * Injectable wait, for tests
   */
  sleep?: (ms: number) => Promise<void>;

  /**
   * Called before each backoff wait
   */
  onRetry?: (info: { retry: number; delayMs: number; error: unknown }) => void;

  context?: Record<string, unknown>;
}

/**
 * Outcome of a retry loop. `retries` counts the attempts made after the first one.
 */
export type RetryOutcome<T> =
  | { ok: true; value: T; retries: number }
  | { ok: false; error: unknown; retries: number; exhausted: boolean };

/**
 * Backoff delay before retry `retry` (1-based): initialDelayMs * 2^(retry-1), no jitter
 */
export function backoffDelayMs(retry: number, initialDelayMs: number): number {
  return initialDelayMs * Math.pow(2, retry - 1);
}

/**
 * Retry with exponential backoff
 *
 * The attempt function either resolves with a value or throws; thrown values are
 * classified with `isRetryable`. Unlike a throwing wrapper, the outcome tells the
 * caller how many retries were spent and whether the budget ran out.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryOutcome<T>> {
  const maxRetries = options.maxRetries ?? 3;
  const initialDelayMs = options.initialDelayMs ?? 1000;
  const isRetryable = options.isRetryable ?? isRetryableError;
  const sleep = options.sleep ?? delay;

  for (let attempt = 0; ; attempt++) {
    try {
      const value = await fn(attempt);
      return { ok: true, value, retries: attempt };
    } catch (error) {
      if (!isRetryable(error)) {
        return { ok: false, error, retries: attempt, exhausted: false };
      }

      if (attempt === maxRetries) {
        return { ok: false, error, retries: attempt, exhausted: true };
      }

      const delayMs = backoffDelayMs(attempt + 1, initialDelayMs);
      logger.debug('Retrying after error', {
        retry: attempt + 1,
        maxRetries,
        delayMs,
        ...options.context,
      });
      options.onRetry?.({ retry: attempt + 1, delayMs, error });

      await sleep(delayMs);
    }
  }
}
