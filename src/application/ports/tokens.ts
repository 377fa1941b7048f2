/**
 * Injection tokens (string symbols for DI) binding output ports to adapters
 */
export const COLLECTION_DISCOVERY_PORT = 'CollectionDiscoveryPort';
export const PROGRESS_LEDGER_FACTORY = 'ProgressLedgerFactory';
export const TRANSFER_SESSION_FACTORY_PORT = 'TransferSessionFactoryPort';
export const LOCAL_ARCHIVE_STORAGE_FACTORY = 'LocalArchiveStorageFactory';
export const FASTA_OUTPUT_FACTORY = 'FastaOutputFactory';
export const EVENT_PUBLISHER_PORT = 'EventPublisherPort';
export const RETRY_SCHEDULE = 'RetrySchedule';
export const RETRY_SLEEPER = 'RetrySleeper';
