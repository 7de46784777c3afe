/**
 * Custom Error Classes
 * ====================
 * Standardized error classes for the exceptional paths of the pipeline.
 *
 * Expected load failures are NOT modelled here: they travel as `LoadError`
 * values inside a `LoadResult` (see @chartlane/core).
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - for input validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

/**
 * Not found error - for missing resources
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, context?: Record<string, unknown>) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404, { resource, identifier, ...context });
  }
}

/**
 * Configuration error - for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 500, { configKey, ...context });
  }
}

/**
 * Storage error - durable key-value store could not be read or written
 */
export class StorageError extends AppError {
  constructor(message: string, operation?: string, context?: Record<string, unknown>) {
    super(message, 'STORAGE_ERROR', 500, { operation, ...context });
  }
}

/**
 * Archive corrupt error - the container cannot be opened at all
 *
 * Distinct from "dataset not in archive", which is an absent value, not an error.
 */
export class ArchiveCorruptError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ARCHIVE_CORRUPT', 422, context);
  }
}

/**
 * Integrity conflict error - an attempt to overwrite a trusted hash with a different one
 */
export class IntegrityConflictError extends AppError {
  public readonly chartId: string;

  constructor(chartId: string, context?: Record<string, unknown>) {
    super(
      `Chart '${chartId}' already has a different trusted hash`,
      'INTEGRITY_CONFLICT',
      409,
      { chartId, ...context }
    );
    this.chartId = chartId;
  }
}

/**
 * Queue closed error - a request was offered to a queue that no longer accepts work
 */
export class QueueClosedError extends AppError {
  constructor(context?: Record<string, unknown>) {
    super('Load queue is closed', 'QUEUE_CLOSED', 503, context);
  }
}

/**
 * Check if error is an operational error (expected errors that should be handled)
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

/**
 * Check if error is a retryable error
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof StorageError;
}
