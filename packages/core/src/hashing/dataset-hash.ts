/**
 * Dataset content hashing
 *
 * SHA-256 over the extracted dataset bytes (never the compressed archive),
 * hex-encoded lowercase.
 */

import { createHash } from 'crypto';
import { SHA256_HEX_PATTERN } from '../domain/integrity-record.js';
import { ValidationError } from '../errors.js';

export function computeDatasetHash(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

export function isContentHash(value: string): boolean {
  return SHA256_HEX_PATTERN.test(value);
}

/**
 * Lowercase a hash and check it is a SHA-256 hex digest
 */
export function normalizeContentHash(value: string): string {
  const normalized = value.trim().toLowerCase();
  if (!isContentHash(normalized)) {
    throw new ValidationError('Content hash must be 64 hex characters', { value });
  }
  return normalized;
}
