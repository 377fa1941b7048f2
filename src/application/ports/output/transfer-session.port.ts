import { CollectionIdVO } from '../../../domain/value-objects/collection-id.vo';

/**
 * Result of a completed retrieval
 */
export interface RetrievalResult {
  fileName: string;
  localPath: string;
  sizeBytes: number;
}

/**
 * Transfer Session Port (Driven Port)
 * One stateful connection to the archive, scoped to a single collection
 */
export interface TransferSessionPort {
  /**
   * Connect, authenticate and move to the collection's directory.
   * Returns the retrieval candidates (compressed archives) listed there.
   */
  open(collectionId: CollectionIdVO, signal?: AbortSignal): Promise<string[]>;

  /**
   * Stream one remote file to local disk in binary mode while keeping the
   * control channel alive. A failed retrieval leaves no local file behind.
   */
  retrieve(fileName: string, destinationPath: string, signal?: AbortSignal): Promise<RetrievalResult>;

  /**
   * Terminate gracefully, or abruptly if that fails. Never rejects.
   */
  close(): Promise<void>;

  isOpen(): boolean;
}

/**
 * Transfer Session Factory Port (Driven Port)
 * Sessions hold a connection, so each collection gets a fresh one
 */
export interface TransferSessionFactoryPort {
  createSession(): TransferSessionPort;
}
