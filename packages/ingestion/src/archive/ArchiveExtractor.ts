/**
 * ArchiveExtractor - locate and extract one chart dataset from a ZIP archive
 *
 * Archives come from different producers and wrap the dataset differently.
 * Layouts are tried in a fixed order and the first hit wins:
 *
 *   1. expected path hint (when the caller knows the entry name)
 *   2. ENC_ROOT/{chartId}/{chartId}.000
 *   3. {chartId}.000 at the archive root
 *   4. {chartId}/{chartId}.000
 *   5. any deeper path ending in {chartId}/{chartId}.000 (shallowest first)
 *
 * A namespaced standard layout beats a root file with a coincidental name.
 * Matching ignores case and path separator style.
 *
 * "Not found" is a null result. An archive whose central directory cannot be
 * read (or whose entry cannot be inflated) throws ArchiveCorruptError.
 */

import { unzipSync, type UnzipFileInfo } from 'fflate';
import { ArchiveCorruptError, createLogger } from '@chartlane/utils';

const logger = createLogger('ingestion');

export const DATASET_EXTENSION = '.000';
export const STANDARD_ROOT_DIR = 'ENC_ROOT';

// Size of the end-of-central-directory record; nothing shorter can be a ZIP
const MIN_ARCHIVE_LENGTH = 22;

export type DatasetLayout = 'expected-path' | 'enc-root' | 'root-flat' | 'nested' | 'deep-nested';

export interface ArchiveEntry {
  path: string;
  /** Uncompressed size in bytes */
  size: number;
  compressedSize: number;
}

export interface DatasetLocation {
  /** Entry name exactly as stored in the archive */
  path: string;
  layout: DatasetLayout;
}

export interface ExtractedDataset extends DatasetLocation {
  bytes: Uint8Array;
}

export interface ExtractOptions {
  /** Entry to try before the standard layouts */
  expectedPath?: string;
}

/**
 * Canonical form used for matching: forward slashes, no leading ./ or /, lowercase
 */
export function normalizeEntryPath(name: string): string {
  return name
    .replace(/\\/g, '/')
    .replace(/^(\.\/|\/)+/, '')
    .toLowerCase();
}

function isDirectoryEntry(name: string): boolean {
  return name.endsWith('/') || name.endsWith('\\');
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function readCentralDirectory(bytes: Uint8Array): UnzipFileInfo[] {
  if (bytes.byteLength < MIN_ARCHIVE_LENGTH) {
    throw new ArchiveCorruptError('Archive is too short to be a ZIP file', {
      byteLength: bytes.byteLength,
    });
  }

  const entries: UnzipFileInfo[] = [];
  try {
    unzipSync(bytes, {
      filter: (file) => {
        entries.push(file);
        return false;
      },
    });
  } catch (error) {
    throw new ArchiveCorruptError('Archive central directory could not be read', {
      byteLength: bytes.byteLength,
      error: describeError(error),
    });
  }
  return entries;
}

/**
 * File entries of an archive, in archive order. Directory entries are skipped.
 */
export function listArchiveEntries(bytes: Uint8Array): ArchiveEntry[] {
  return readCentralDirectory(bytes)
    .filter((entry) => !isDirectoryEntry(entry.name))
    .map((entry) => ({
      path: entry.name,
      size: entry.originalSize,
      compressedSize: entry.size,
    }));
}

/**
 * Pick the dataset entry for `chartId` from a list of entry names
 */
export function selectDatasetEntry(
  entryNames: readonly string[],
  chartId: string,
  options: ExtractOptions = {}
): DatasetLocation | null {
  const files = entryNames
    .filter((name) => !isDirectoryEntry(name))
    .map((name) => ({ name, key: normalizeEntryPath(name) }));

  const id = chartId.toLowerCase();
  const fileName = `${id}${DATASET_EXTENSION}`;
  const nestedSuffix = `${id}/${fileName}`;

  const exact = (key: string, layout: DatasetLayout): DatasetLocation | null => {
    const hit = files.find((file) => file.key === key);
    return hit ? { path: hit.name, layout } : null;
  };

  if (options.expectedPath) {
    const hinted = exact(normalizeEntryPath(options.expectedPath), 'expected-path');
    if (hinted) {
      return hinted;
    }
  }

  const layered =
    exact(`${STANDARD_ROOT_DIR.toLowerCase()}/${nestedSuffix}`, 'enc-root') ??
    exact(fileName, 'root-flat') ??
    exact(nestedSuffix, 'nested');
  if (layered) {
    return layered;
  }

  let shallowest: { name: string; depth: number } | null = null;
  for (const file of files) {
    if (!file.key.endsWith(`/${nestedSuffix}`)) {
      continue;
    }
    const depth = file.key.split('/').length;
    if (shallowest === null || depth < shallowest.depth) {
      shallowest = { name: file.name, depth };
    }
  }
  return shallowest ? { path: shallowest.name, layout: 'deep-nested' } : null;
}

export class ArchiveExtractor {
  /**
   * Where the dataset for `chartId` lives, or null
   */
  locateDataset(bytes: Uint8Array, chartId: string, options: ExtractOptions = {}): DatasetLocation | null {
    const names = readCentralDirectory(bytes).map((entry) => entry.name);
    return selectDatasetEntry(names, chartId, options);
  }

  /**
   * Dataset bytes plus the entry they came from, or null when the chart is absent
   */
  extract(bytes: Uint8Array, chartId: string, options: ExtractOptions = {}): ExtractedDataset | null {
    const location = this.locateDataset(bytes, chartId, options);
    if (!location) {
      logger.debug('No dataset entry for chart', { chartId, expectedPath: options.expectedPath });
      return null;
    }

    let contents: Uint8Array | undefined;
    try {
      contents = unzipSync(bytes, { filter: (file) => file.name === location.path })[location.path];
    } catch (error) {
      throw new ArchiveCorruptError('Archive entry could not be inflated', {
        chartId,
        entry: location.path,
        error: describeError(error),
      });
    }
    if (contents === undefined) {
      throw new ArchiveCorruptError('Archive entry disappeared while extracting', {
        chartId,
        entry: location.path,
      });
    }

    logger.debug('Dataset entry extracted', {
      chartId,
      entry: location.path,
      layout: location.layout,
      bytes: contents.byteLength,
    });
    return { ...location, bytes: contents };
  }

  /**
   * Dataset bytes for `chartId`, or null when the archive does not contain it
   */
  extractDataset(bytes: Uint8Array, chartId: string, options: ExtractOptions = {}): Uint8Array | null {
    return this.extract(bytes, chartId, options)?.bytes ?? null;
  }

  listEntries(bytes: Uint8Array): ArchiveEntry[] {
    return listArchiveEntries(bytes);
  }
}
