import { describe, it, expect, vi, beforeEach } from 'vitest';
import { handleError, retryWithBackoff, backoffDelayMs } from '../../src/error-handler.js';
import { ValidationError, StorageError, AppError } from '../../src/errors.js';
import { logger } from '../../src/logger.js';

vi.mock('../../src/logger.js', () => ({
  logger: {
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
  },
}));

describe('error-handler', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('handleError', () => {
    it('should log operational AppErrors as warnings', () => {
      const error = new ValidationError('Invalid chart id', { field: 'chartId' });
      const result = handleError(error, { requestId: 'req-1' });

      expect(result).toEqual({
        handled: true,
        message: 'Invalid chart id',
        shouldRetry: false,
      });
      expect(logger.warn).toHaveBeenCalledWith(
        'Operational error occurred',
        expect.objectContaining({
          field: 'chartId',
          requestId: 'req-1',
          error: expect.objectContaining({
            name: 'ValidationError',
            code: 'VALIDATION_ERROR',
            statusCode: 400,
          }),
        })
      );
    });

    it('should log non-operational AppErrors as errors', () => {
      const error = new AppError('Broken invariant', 'BROKEN', 500, undefined, false);
      handleError(error);

      expect(logger.error).toHaveBeenCalledWith('Application error occurred', error, {});
    });

    it('should wrap non-Error values', () => {
      const result = handleError('plain failure');

      expect(result.message).toBe('plain failure');
      expect(result.shouldRetry).toBe(false);
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it('should mark storage errors as retryable', () => {
      const result = handleError(new StorageError('disk busy', 'put'));

      expect(result.shouldRetry).toBe(true);
    });
  });

  describe('backoffDelayMs', () => {
    it('should double the delay on every retry', () => {
      expect([1, 2, 3, 4].map((retry) => backoffDelayMs(retry, 100))).toEqual([100, 200, 400, 800]);
    });
  });

  describe('retryWithBackoff', () => {
    const sleep = vi.fn(async (_ms: number) => undefined);

    it('should return the value on first attempt', async () => {
      const fn = vi.fn().mockResolvedValue('decoded');
      const outcome = await retryWithBackoff(fn, { sleep });

      expect(outcome).toEqual({ ok: true, value: 'decoded', retries: 0 });
      expect(fn).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should retry retryable failures with doubling delays', async () => {
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new StorageError('busy'))
        .mockRejectedValueOnce(new StorageError('busy'))
        .mockResolvedValue('decoded');

      const outcome = await retryWithBackoff(fn, { maxRetries: 4, initialDelayMs: 100, sleep });

      expect(outcome).toEqual({ ok: true, value: 'decoded', retries: 2 });
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
    });

    it('should stop immediately on a non-retryable failure', async () => {
      const error = new ValidationError('malformed');
      const fn = vi.fn().mockRejectedValue(error);

      const outcome = await retryWithBackoff(fn, { maxRetries: 4, sleep });

      expect(outcome).toEqual({ ok: false, error, retries: 0, exhausted: false });
      expect(fn).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should report exhaustion after maxRetries retries', async () => {
      const error = new StorageError('busy');
      const fn = vi.fn().mockRejectedValue(error);

      const outcome = await retryWithBackoff(fn, { maxRetries: 4, initialDelayMs: 100, sleep });

      expect(outcome).toEqual({ ok: false, error, retries: 4, exhausted: true });
      expect(fn).toHaveBeenCalledTimes(5);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200, 400, 800]);
    });

    it('should use a custom classifier and pass the attempt index', async () => {
      const attempts: number[] = [];
      const onRetry = vi.fn();
      const outcome = await retryWithBackoff(
        async (attempt) => {
          attempts.push(attempt);
          if (attempt < 1) {
            throw new Error('transient');
          }
          return attempt;
        },
        { isRetryable: () => true, initialDelayMs: 5, sleep, onRetry }
      );

      expect(outcome).toEqual({ ok: true, value: 1, retries: 1 });
      expect(attempts).toEqual([0, 1]);
      expect(onRetry).toHaveBeenCalledWith(
        expect.objectContaining({ retry: 1, delayMs: 5 })
      );
    });
  });
});
