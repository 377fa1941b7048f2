import {
  RetrievalResult,
  TransferSessionFactoryPort,
  TransferSessionPort,
} from '../../src/application/ports/output/transfer-session.port';
import { CollectionIdVO } from '../../src/domain/value-objects/collection-id.vo';
import { TransientTransferError } from '../../src/domain/errors/pipeline.errors';
import { InMemoryDisk } from './in-memory-disk';

/** Remote archive: collection id → file name → decompressed content */
export type RemoteCatalog = Record<string, Record<string, string>>;

/**
 * In-Memory Transfer Session Adapter
 * Serves a RemoteCatalog; failures are scripted per collection or per file
 */
export class InMemoryTransferSession implements TransferSessionPort {
  private collectionId?: string;

  constructor(private readonly factory: InMemoryTransferSessionFactory) {}

  isOpen(): boolean {
    return this.collectionId !== undefined;
  }

  async open(collectionId: CollectionIdVO): Promise<string[]> {
    this.factory.opened.push(collectionId.value);
    if (this.factory.takeFailure(`open:${collectionId.value}`)) {
      throw new TransientTransferError(`Connection to the archive reset while listing ${collectionId.value}`, 'open');
    }
    this.collectionId = collectionId.value;
    return Object.keys(this.factory.catalog[collectionId.value] ?? {});
  }

  async retrieve(fileName: string, destinationPath: string): Promise<RetrievalResult> {
    const collectionId = this.collectionId;
    if (collectionId === undefined) {
      throw new TransientTransferError(`Cannot retrieve ${fileName}: session is not open`, 'retrieve');
    }
    this.factory.retrieved.push(fileName);

    const content = this.factory.catalog[collectionId]?.[fileName];
    if (content === undefined) {
      throw new Error(`550 ${fileName}: No such file`);
    }

    if (this.factory.takeFailure(`retrieve:${fileName}`)) {
      // A dropped transfer leaves a partial file behind
      this.factory.disk.write(destinationPath, content.slice(0, Math.floor(content.length / 2)));
      this.collectionId = undefined;
      throw new TransientTransferError(`Transfer of ${fileName} interrupted`, 'retrieve');
    }

    this.factory.disk.write(destinationPath, content);
    return { fileName, localPath: destinationPath, sizeBytes: Buffer.byteLength(content) };
  }

  async close(): Promise<void> {
    if (this.collectionId !== undefined) {
      this.factory.closed++;
    }
    this.collectionId = undefined;
  }
}

export class InMemoryTransferSessionFactory implements TransferSessionFactoryPort {
  readonly opened: string[] = [];
  readonly retrieved: string[] = [];
  closed = 0;
  sessionsCreated = 0;
  private readonly failures = new Map<string, number>();

  constructor(
    readonly catalog: RemoteCatalog,
    readonly disk: InMemoryDisk,
  ) {}

  createSession(): TransferSessionPort {
    this.sessionsCreated++;
    return new InMemoryTransferSession(this);
  }

  // Test helper methods

  failOpen(collectionId: string, times: number): void {
    this.failures.set(`open:${collectionId}`, times);
  }

  failRetrieve(fileName: string, times: number): void {
    this.failures.set(`retrieve:${fileName}`, times);
  }

  /** Consumes one scripted failure for the key */
  takeFailure(key: string): boolean {
    const remaining = this.failures.get(key) ?? 0;
    if (remaining === 0) return false;
    this.failures.set(key, remaining - 1);
    return true;
  }
}
