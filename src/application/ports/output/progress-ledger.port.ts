/**
 * Progress Ledger Port (Driven Port)
 * Durable, append-only record of the collections a run has fully processed
 */
export interface ProgressLedgerPort {
  /**
   * Whether a ledger from a previous run is on disk
   */
  exists(): Promise<boolean>;

  /**
   * Collections recorded so far; empty when there is no ledger
   */
  load(): Promise<Set<string>>;

  /**
   * Append one collection and force it to durable storage before resolving
   */
  record(collectionId: string): Promise<void>;

  /**
   * Delete the ledger; a missing ledger is not an error
   */
  clear(): Promise<void>;

  /**
   * Release the underlying handle, if any
   */
  close(): Promise<void>;

  /**
   * Location of the ledger, for messages
   */
  describe(): string;
}

/**
 * Progress Ledger Factory Port (Driven Port)
 * The ledger location is only known once the taxon selection is parsed
 */
export interface ProgressLedgerFactoryPort {
  forFile(ledgerPath: string): ProgressLedgerPort;
}
