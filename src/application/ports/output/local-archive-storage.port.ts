/**
 * Local Archive Storage Port (Driven Port)
 * Working directory holding the retrieved compressed archives
 */
export interface LocalArchiveStoragePort {
  /**
   * Names of the archives already on disk (suffix-filtered, sorted)
   */
  listArchives(): Promise<string[]>;

  /**
   * Whether the named archive is on disk
   */
  exists(fileName: string): Promise<boolean>;

  /**
   * Remove an archive; a missing file is not an error
   */
  remove(fileName: string): Promise<void>;

  /**
   * Absolute path the archive is stored at
   */
  pathFor(fileName: string): string;

  /**
   * Decompressed content as lines with their terminators kept.
   * Decoding failures surface as CorruptArchiveError.
   */
  readLines(fileName: string, signal?: AbortSignal): AsyncIterable<string>;
}

export interface LocalArchiveStorageFactoryPort {
  forDirectory(workDir: string): LocalArchiveStoragePort;
}
