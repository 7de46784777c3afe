/**
 * Iso8211LeaderDecoder - structural probe for ISO/IEC 8211 datasets
 *
 * S-57 cells are ISO 8211 files: a Data Descriptive Record (DDR) followed by
 * Data Records (DR), each starting with a 24-byte leader:
 *
 *   0-4    record length (5 ASCII digits)
 *   5      interchange level
 *   6      leader identifier ('L' = DDR, 'D' or 'R' = DR)
 *   10-11  field control length (DDR only)
 *   12-16  base address of field area (5 ASCII digits)
 *
 * This decoder walks the leaders only. It checks that the record chain
 * covers the dataset exactly and reports what it saw; field contents are
 * left to a real S-57 decoder.
 */

import { decoded, permanentFailure, type DatasetDecoderPort, type DecodeOutcome } from '@chartlane/core';

export const ISO8211_LEADER_LENGTH = 24;

export interface Iso8211Leader {
  recordLength: number;
  interchangeLevel: string;
  leaderIdentifier: string;
  fieldControlLength: number | null;
  fieldAreaBaseAddress: number;
}

export interface Iso8211Summary {
  ddr: Iso8211Leader;
  /** DDR plus data records */
  recordCount: number;
  byteLength: number;
}

const DIGITS = /^\d+$/;

function readAscii(data: Uint8Array, offset: number, length: number): string {
  return String.fromCharCode(...data.subarray(offset, offset + length));
}

function readAsciiInt(data: Uint8Array, offset: number, length: number): number | null {
  const text = readAscii(data, offset, length);
  return DIGITS.test(text) ? parseInt(text, 10) : null;
}

type LeaderResult = { ok: true; leader: Iso8211Leader } | { ok: false; reason: string };

/**
 * Parse and sanity-check the leader at `offset`
 */
export function parseLeader(data: Uint8Array, offset: number): LeaderResult {
  if (data.byteLength - offset < ISO8211_LEADER_LENGTH) {
    return { ok: false, reason: `Truncated record leader at offset ${offset}` };
  }

  const recordLength = readAsciiInt(data, offset, 5);
  const fieldAreaBaseAddress = readAsciiInt(data, offset + 12, 5);

  if (recordLength === null) {
    return { ok: false, reason: `Record length at offset ${offset} is not numeric` };
  }
  if (fieldAreaBaseAddress === null) {
    return { ok: false, reason: `Field area base address at offset ${offset} is not numeric` };
  }
  if (recordLength < ISO8211_LEADER_LENGTH || offset + recordLength > data.byteLength) {
    return { ok: false, reason: `Record at offset ${offset} has invalid length ${recordLength}` };
  }
  if (fieldAreaBaseAddress < ISO8211_LEADER_LENGTH || fieldAreaBaseAddress > recordLength) {
    return {
      ok: false,
      reason: `Record at offset ${offset} has field area outside the record (${fieldAreaBaseAddress})`,
    };
  }

  return {
    ok: true,
    leader: {
      recordLength,
      interchangeLevel: readAscii(data, offset + 5, 1),
      leaderIdentifier: readAscii(data, offset + 6, 1),
      fieldControlLength: readAsciiInt(data, offset + 10, 2),
      fieldAreaBaseAddress,
    },
  };
}

export class Iso8211LeaderDecoder implements DatasetDecoderPort<Iso8211Summary> {
  async decode(bytes: Uint8Array): Promise<DecodeOutcome<Iso8211Summary>> {
    if (bytes.byteLength === 0) {
      return permanentFailure('Dataset is empty');
    }

    const first = parseLeader(bytes, 0);
    if (!first.ok) {
      return permanentFailure(first.reason);
    }
    if (first.leader.leaderIdentifier !== 'L') {
      return permanentFailure(
        `First record is not a data descriptive record (leader identifier '${first.leader.leaderIdentifier}')`
      );
    }

    let offset = first.leader.recordLength;
    let recordCount = 1;
    while (offset < bytes.byteLength) {
      const next = parseLeader(bytes, offset);
      if (!next.ok) {
        return permanentFailure(next.reason);
      }
      offset += next.leader.recordLength;
      recordCount++;
    }

    return decoded({ ddr: first.leader, recordCount, byteLength: bytes.byteLength });
  }
}
