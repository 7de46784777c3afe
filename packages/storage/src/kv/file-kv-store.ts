/**
 * File-system key-value store
 *
 * One file per key under a root directory. Writes go to a temporary file that is
 * then renamed over the target, so a crash leaves either the old or the new value.
 */

import { existsSync } from 'fs';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { join } from 'path';
import type { KeyValueStorePort } from '@chartlane/core';
import { StorageError, createLogger } from '@chartlane/utils';

const logger = createLogger('storage');

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileKeyValueStore implements KeyValueStorePort {
  private readonly rootDir: string;
  private writeSeq = 0;

  constructor(rootDir: string) {
    this.rootDir = rootDir;
  }

  /**
   * File that holds `key`; keys are URI-encoded so they never escape the root
   */
  pathFor(key: string): string {
    return join(this.rootDir, `${encodeURIComponent(key)}.bin`);
  }

  async get(key: string): Promise<Uint8Array | null> {
    try {
      const buffer = await readFile(this.pathFor(key));
      return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw new StorageError(`Failed to read key '${key}'`, 'get', {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async put(key: string, value: Uint8Array): Promise<void> {
    const target = this.pathFor(key);
    const temp = `${target}.${process.pid}.${++this.writeSeq}.tmp`;

    try {
      if (!existsSync(this.rootDir)) {
        await mkdir(this.rootDir, { recursive: true });
      }
      await writeFile(temp, value);
      await rename(temp, target);
    } catch (error) {
      throw new StorageError(`Failed to write key '${key}'`, 'put', {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    logger.debug('Key written', { key, bytes: value.byteLength });
  }
}
