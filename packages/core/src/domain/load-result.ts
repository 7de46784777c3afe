/**
 * Load results
 *
 * Exactly one arm is populated: a success carries the verified bytes and their
 * provenance, a failure carries exactly one LoadError.
 */

import type { LoadError } from './load-error.js';

export type LoadStage = 'extracting' | 'hashing' | 'verifying' | 'decoding' | 'succeeded' | 'failed';

export interface LoadSuccess<F = unknown> {
  readonly status: 'success';
  readonly chartId: string;
  readonly bytes: Uint8Array;
  readonly features: F;
  readonly retryCount: number;
  /** Archive entry the dataset was read from */
  readonly entryPath: string;
  readonly contentHash: string;
  readonly integrity: 'first-observation' | 'match';
  readonly durationMs: number;
}

export interface LoadFailure {
  readonly status: 'failure';
  readonly chartId: string;
  readonly error: LoadError;
  readonly retryCount: number;
  readonly durationMs: number;
}

export type LoadResult<F = unknown> = LoadSuccess<F> | LoadFailure;

export function isLoadSuccess<F>(result: LoadResult<F>): result is LoadSuccess<F> {
  return result.status === 'success';
}

export function isLoadFailure<F>(result: LoadResult<F>): result is LoadFailure {
  return result.status === 'failure';
}
