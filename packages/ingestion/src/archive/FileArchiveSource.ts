/**
 * FileArchiveSource - reads chart archives from the local file system
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import type { ArchiveSourcePort } from '@chartlane/core';

export class FileArchiveSource implements ArchiveSourcePort {
  /**
   * @param baseDir - directory relative archive paths resolve against (default: cwd)
   */
  constructor(private readonly baseDir: string = process.cwd()) {}

  async read(archivePath: string): Promise<Uint8Array> {
    const buffer = await readFile(resolve(this.baseDir, archivePath));
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  }
}
