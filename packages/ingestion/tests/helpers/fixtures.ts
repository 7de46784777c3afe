/**
 * In-process fixtures for ingestion tests: ZIP archives built with fflate,
 * small ISO 8211 datasets and an in-memory archive source.
 */

import { strToU8, zipSync } from 'fflate';
import { decoded, type ArchiveSourcePort, type DatasetDecoderPort } from '@chartlane/core';

export function buildArchive(entries: Record<string, string | Uint8Array>): Uint8Array {
  const files: Record<string, Uint8Array> = {};
  for (const [path, contents] of Object.entries(entries)) {
    files[path] = typeof contents === 'string' ? strToU8(contents) : contents;
  }
  return zipSync(files);
}

function leader(recordLength: number, identifier: string): string {
  const length = String(recordLength).padStart(5, '0');
  return `${length}3${identifier}E1 0600024 ! 3404`;
}

function record(identifier: string, bodyLength: number): string {
  return leader(24 + bodyLength, identifier) + 'x'.repeat(bodyLength);
}

/**
 * A DDR of 64 bytes followed by `dataRecords` records of 54 bytes each
 */
export function buildIso8211Dataset(dataRecords = 2): Uint8Array {
  let text = record('L', 40);
  for (let i = 0; i < dataRecords; i++) {
    text += record('D', 30);
  }
  return strToU8(text);
}

export class InMemoryArchiveSource implements ArchiveSourcePort {
  private archives: Map<string, Uint8Array> = new Map();

  set(archivePath: string, bytes: Uint8Array): this {
    this.archives.set(archivePath, bytes);
    return this;
  }

  async read(archivePath: string): Promise<Uint8Array> {
    const bytes = this.archives.get(archivePath);
    if (!bytes) {
      throw new Error(`ENOENT: no such file '${archivePath}'`);
    }
    return bytes;
  }
}

/**
 * Decoder whose features are the dataset length
 */
export const byteLengthDecoder: DatasetDecoderPort<number> = {
  decode: async (bytes) => decoded(bytes.byteLength),
};
