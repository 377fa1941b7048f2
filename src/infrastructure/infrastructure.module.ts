import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { SharedModule } from '../shared/shared.module';
import {
  COLLECTION_DISCOVERY_PORT,
  EVENT_PUBLISHER_PORT,
  FASTA_OUTPUT_FACTORY,
  LOCAL_ARCHIVE_STORAGE_FACTORY,
  PROGRESS_LEDGER_FACTORY,
  TRANSFER_SESSION_FACTORY_PORT,
} from '../application/ports/tokens';

// Adapters (implementations)
import { NcbiWgsDiscoveryAdapter } from './adapters/discovery/ncbi-wgs-discovery.adapter';
import { FtpTransferSessionFactory } from './adapters/transfer/ftp-transfer-session.adapter';
import { FileProgressLedgerFactory } from './adapters/filesystem/file-progress-ledger.adapter';
import { LocalArchiveStorageFactory } from './adapters/filesystem/local-archive-storage.adapter';
import { LocalFastaOutputFactory } from './adapters/filesystem/local-fasta-output.adapter';
import { ConsoleProgressReporterAdapter } from './adapters/events/console-progress-reporter.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 *
 * This module:
 * 1. Imports shared infrastructure (logging, HTTP client, configuration)
 * 2. Binds adapters to the port tokens
 * 3. Exports the tokens so they can be injected into use cases
 */
@Module({
  imports: [ConfigModule, SharedModule],
  providers: [
    // Discovery over HTTP
    {
      provide: COLLECTION_DISCOVERY_PORT,
      useClass: NcbiWgsDiscoveryAdapter,
    },

    // Archive transfers over FTP
    {
      provide: TRANSFER_SESSION_FACTORY_PORT,
      useClass: FtpTransferSessionFactory,
    },

    // Work directory files
    {
      provide: PROGRESS_LEDGER_FACTORY,
      useClass: FileProgressLedgerFactory,
    },
    {
      provide: LOCAL_ARCHIVE_STORAGE_FACTORY,
      useClass: LocalArchiveStorageFactory,
    },
    {
      provide: FASTA_OUTPUT_FACTORY,
      useClass: LocalFastaOutputFactory,
    },

    // Progress rendering
    {
      provide: EVENT_PUBLISHER_PORT,
      useClass: ConsoleProgressReporterAdapter,
    },
  ],
  exports: [
    COLLECTION_DISCOVERY_PORT,
    TRANSFER_SESSION_FACTORY_PORT,
    PROGRESS_LEDGER_FACTORY,
    LOCAL_ARCHIVE_STORAGE_FACTORY,
    FASTA_OUTPUT_FACTORY,
    EVENT_PUBLISHER_PORT,
  ],
})
export class InfrastructureModule {}
