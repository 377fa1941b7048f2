// Export all in-memory adapters for easy import
export { InMemoryDisk } from './in-memory-disk';
export { InMemoryEventPublisherAdapter } from './in-memory-event-publisher.adapter';
export { InMemoryCollectionDiscoveryAdapter } from './in-memory-collection-discovery.adapter';
export { InMemoryProgressLedger, InMemoryProgressLedgerFactory } from './in-memory-progress-ledger.adapter';
export { InMemoryArchiveStorage, InMemoryArchiveStorageFactory } from './in-memory-archive-storage.adapter';
export { InMemoryFastaOutput, InMemoryFastaOutputFactory } from './in-memory-fasta-output.adapter';
export {
  InMemoryTransferSession,
  InMemoryTransferSessionFactory,
  type RemoteCatalog,
} from './in-memory-transfer-session.adapter';
export { FakeFtpServer, type FakeFtpServerOptions } from './fake-ftp-server';
