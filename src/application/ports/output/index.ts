/**
 * Output Ports (Driven Ports) Barrel Export
 * These are interfaces that the infrastructure layer must implement
 */
export type { CollectionDiscoveryPort } from './collection-discovery.port';
export type { ProgressLedgerPort, ProgressLedgerFactoryPort } from './progress-ledger.port';
export type {
  TransferSessionPort,
  TransferSessionFactoryPort,
  RetrievalResult,
} from './transfer-session.port';
export type {
  LocalArchiveStoragePort,
  LocalArchiveStorageFactoryPort,
} from './local-archive-storage.port';
export type { FastaOutputPort, FastaOutputFactoryPort } from './fasta-output.port';
export type { EventPublisherPort } from './event-publisher.port';
