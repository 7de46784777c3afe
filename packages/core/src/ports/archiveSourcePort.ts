/**
 * Archive Source Port
 *
 * Resolves an archive path from a ChartLoadRequest to raw ZIP bytes.
 */
export interface ArchiveSourcePort {
  /**
   * Read the whole archive. Rejects when the archive cannot be read.
   */
  read(archivePath: string): Promise<Uint8Array>;
}
