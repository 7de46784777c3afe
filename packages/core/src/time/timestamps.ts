import { DateTime } from 'luxon';
import { ValidationError } from '../errors.js';

/**
 * Convert epoch milliseconds to an ISO-8601 UTC timestamp
 */
export function toIsoTimestamp(epochMs: number): string {
  const iso = DateTime.fromMillis(epochMs, { zone: 'utc' }).toISO();
  if (iso === null) {
    throw new ValidationError(`Invalid timestamp: ${epochMs}`, { epochMs });
  }
  return iso;
}

/**
 * Parse an ISO-8601 timestamp back to epoch milliseconds
 */
export function fromIsoTimestamp(iso: string): number {
  const parsed = DateTime.fromISO(iso, { zone: 'utc' });
  if (!parsed.isValid) {
    throw new ValidationError(`Invalid ISO timestamp: ${iso}`, { iso });
  }
  return parsed.toMillis();
}
