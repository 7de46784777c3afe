/**
 * Unit tests for Error Handler
 */

import { describe, it, expect, vi } from 'vitest';
import { StorageError, ValidationError, logger } from '@chartlane/utils';
import { formatError, handleError, logError } from '../../src/core/error-handler.js';

const GENERIC = 'An error occurred. Please check your configuration and try again.';

describe('formatError', () => {
  it('uses the message of Error objects', () => {
    expect(formatError(new Error('Archive not found'))).toBe('Archive not found');
  });

  it('passes strings through', () => {
    expect(formatError('String error')).toBe('String error');
  });

  it('falls back for unknown values', () => {
    expect(formatError({ unexpected: 'object' })).toBe('An unexpected error occurred');
  });

  it('hides messages that mention credentials', () => {
    expect(formatError(new Error('api-key is invalid: test-secret'))).toBe(GENERIC);
    expect(formatError(new Error('Bearer token expired'))).toBe(GENERIC);
    expect(formatError('Invalid password')).toBe(GENERIC);
  });
});

describe('logError', () => {
  it('logs operational errors at warn', () => {
    const warn = vi.spyOn(logger, 'warn');
    const error = vi.spyOn(logger, 'error');

    logError(new ValidationError('Invalid arguments'), { command: 'load' });

    expect(warn).toHaveBeenCalledWith('CLI error', {
      code: 'VALIDATION_ERROR',
      message: 'Invalid arguments',
      context: { command: 'load' },
    });
    expect(error).not.toHaveBeenCalled();
  });

  it('logs unexpected errors at error and redacts sensitive context', () => {
    const error = vi.spyOn(logger, 'error');
    const failure = new Error('boom');

    logError(failure, { command: 'seed', header: 'Authorization: test-secret' });

    expect(error).toHaveBeenCalledWith('CLI error', failure, { command: 'seed', header: '[REDACTED]' });
  });
});

describe('handleError', () => {
  it('logs and returns the display message', () => {
    const warn = vi.spyOn(logger, 'warn');

    expect(handleError(new StorageError('Failed to persist integrity registry', 'put'))).toBe(
      'Failed to persist integrity registry'
    );
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
