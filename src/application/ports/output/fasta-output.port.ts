/**
 * FASTA Output Port (Driven Port)
 * Append-only merge target of the normalized records
 */
export interface FastaOutputPort {
  exists(): Promise<boolean>;

  /**
   * Delete a stale output file; a missing file is not an error
   */
  remove(): Promise<void>;

  /**
   * Open for appending and remember the current size as the committed mark
   */
  open(): Promise<void>;

  append(text: string): Promise<void>;

  /**
   * Write everything buffered and sync it to durable storage
   */
  flush(): Promise<void>;

  /**
   * Move the committed mark to the current end of the file
   */
  commit(): Promise<void>;

  /**
   * Discard everything written after the committed mark
   */
  rollback(): Promise<void>;

  close(): Promise<void>;

  describe(): string;
}

export interface FastaOutputFactoryPort {
  forFile(outputPath: string): FastaOutputPort;
}
