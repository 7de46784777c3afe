/**
 * Load Error Taxonomy
 * ===================
 * Closed set of terminal chart-load failures. A LoadError is a frozen value
 * built once, at the point of terminal failure, and carried inside a
 * LoadResult. It is never thrown.
 *
 * `message` and `guidance` are always safe to show an end user.
 * `technicalDetail` (paths, hashes, underlying error text) is only populated
 * when the caller opted into verbose diagnostics.
 */

import { createSystemClock, type ClockPort } from '../ports/clockPort.js';

export enum LoadErrorKind {
  IntegrityMismatch = 'IntegrityMismatch',
  DecodeFailed = 'DecodeFailed',
  ExtractionFailed = 'ExtractionFailed',
  DatasetNotFound = 'DatasetNotFound',
}

export const MAX_LOAD_ERROR_MESSAGE_LENGTH = 200;

export interface LoadError {
  readonly kind: LoadErrorKind;
  readonly chartId: string;
  /** User-safe summary, at most 200 characters */
  readonly message: string;
  /** Primary actionable advice */
  readonly guidance: string;
  /** Ordered follow-up hints after the guidance */
  readonly suggestions: readonly string[];
  /** Whether re-enqueueing a fresh request may help */
  readonly retryable: boolean;
  readonly technicalDetail?: string;
  readonly retryCount: number;
  /** Epoch milliseconds */
  readonly occurredAt: number;
}

interface LoadErrorProfile {
  guidance: string;
  suggestions: readonly string[];
  retryable: boolean;
}

const PROFILES: Record<LoadErrorKind, LoadErrorProfile> = {
  [LoadErrorKind.IntegrityMismatch]: {
    guidance: 'Re-acquire the source archive; the chart content differs from the copy trusted earlier.',
    suggestions: [
      'Compare the computed SHA-256 with the published hash for this edition.',
      'Re-download the chart in case the archive is partial or corrupted.',
      'If a new edition was installed on purpose, reset the trusted hash for this chart.',
    ],
    retryable: false,
  },
  [LoadErrorKind.DecodeFailed]: {
    guidance: 'Verify the dataset format and edition are supported, then try loading again.',
    suggestions: [
      'Check the logs for the first decoder error.',
      'Validate the cell for truncated records.',
      'Confirm the decoder supports this dataset edition.',
    ],
    retryable: true,
  },
  [LoadErrorKind.ExtractionFailed]: {
    guidance: 'Check that the archive exists and is a valid ZIP file, then try again.',
    suggestions: [
      'Try opening the archive with another ZIP tool.',
      'Re-download the archive if it may be truncated.',
      'Check read permissions on the archive path.',
    ],
    retryable: true,
  },
  [LoadErrorKind.DatasetNotFound]: {
    guidance: 'Confirm the chart id and that this archive contains the chart.',
    suggestions: [
      'List the archive entries and look for a <chartId>.000 file.',
      'Check whether the chart ships in a different archive.',
    ],
    retryable: false,
  },
};

export interface LoadErrorInput {
  kind: LoadErrorKind;
  chartId: string;
  retryCount?: number;
  /** Overrides the default message for the kind */
  message?: string;
  /** Raw diagnostic text; dropped unless `verbose` is set */
  technicalDetail?: string;
}

export interface LoadErrorOptions {
  verbose?: boolean;
  clock?: ClockPort;
}

function defaultMessage(kind: LoadErrorKind, chartId: string, retryCount: number): string {
  switch (kind) {
    case LoadErrorKind.IntegrityMismatch:
      return `Chart ${chartId} failed its integrity check.`;
    case LoadErrorKind.DecodeFailed:
      return retryCount > 0
        ? `Chart ${chartId} could not be decoded after ${retryCount} retries.`
        : `Chart ${chartId} could not be decoded.`;
    case LoadErrorKind.ExtractionFailed:
      return `The archive for chart ${chartId} could not be read.`;
    case LoadErrorKind.DatasetNotFound:
      return `Chart ${chartId} was not found in the archive.`;
  }
}

/**
 * Clamp a message to the user-facing limit, ending with an ellipsis when cut
 */
export function truncateMessage(message: string, max: number = MAX_LOAD_ERROR_MESSAGE_LENGTH): string {
  if (message.length <= max) {
    return message;
  }
  return `${message.slice(0, max - 1)}…`;
}

/**
 * Build a frozen LoadError
 */
export function createLoadError(input: LoadErrorInput, options: LoadErrorOptions = {}): LoadError {
  const profile = PROFILES[input.kind];
  const retryCount = input.retryCount ?? 0;
  const clock = options.clock ?? createSystemClock();

  const error: LoadError = {
    kind: input.kind,
    chartId: input.chartId,
    message: truncateMessage(input.message ?? defaultMessage(input.kind, input.chartId, retryCount)),
    guidance: profile.guidance,
    suggestions: Object.freeze([...profile.suggestions]),
    retryable: profile.retryable,
    retryCount,
    occurredAt: clock.nowMs(),
    ...(options.verbose && input.technicalDetail !== undefined
      ? { technicalDetail: input.technicalDetail }
      : {}),
  };

  return Object.freeze(error);
}

export function getGuidance(kind: LoadErrorKind): string {
  return PROFILES[kind].guidance;
}

/**
 * User-facing summary: message and guidance, never the technical detail
 */
export function formatLoadErrorSummary(error: LoadError): string {
  return `${error.message} ${error.guidance}`;
}

/**
 * Full diagnostic rendering for verbose output
 */
export function formatLoadErrorDetail(error: LoadError): string {
  const lines = [
    `${error.kind}: ${error.message}`,
    `Guidance: ${error.guidance}`,
    ...error.suggestions.map((suggestion) => `  - ${suggestion}`),
    `Retries: ${error.retryCount}`,
  ];
  if (error.technicalDetail !== undefined) {
    lines.push(`Detail: ${error.technicalDetail}`);
  }
  return lines.join('\n');
}
