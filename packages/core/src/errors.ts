/**
 * Core Error Classes
 *
 * @chartlane/core has no dependency on other @chartlane packages, so the one
 * error it throws is defined here rather than imported from @chartlane/utils.
 */

/**
 * Validation error - for malformed identifiers, hashes and timestamps
 *
 * Carries the same `code` as the @chartlane/utils ValidationError so callers
 * can classify both the same way.
 */
export class ValidationError extends Error {
  public readonly code = 'VALIDATION_ERROR';
  public readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}
