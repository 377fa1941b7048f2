import {
  ProgressLedgerFactoryPort,
  ProgressLedgerPort,
} from '../../src/application/ports/output/progress-ledger.port';
import { InMemoryDisk } from './in-memory-disk';

/**
 * In-Memory Progress Ledger Adapter
 * Same line format as the file ledger, kept on an InMemoryDisk
 */
export class InMemoryProgressLedger implements ProgressLedgerPort {
  constructor(
    private readonly disk: InMemoryDisk,
    private readonly ledgerPath: string,
    private readonly failClear: () => boolean,
  ) {}

  async exists(): Promise<boolean> {
    return this.disk.has(this.ledgerPath);
  }

  async load(): Promise<Set<string>> {
    if (!this.disk.has(this.ledgerPath)) return new Set();
    return new Set(
      this.disk
        .read(this.ledgerPath)
        .split('\n')
        .filter((line) => line.length > 0),
    );
  }

  async record(collectionId: string): Promise<void> {
    this.disk.append(this.ledgerPath, `${collectionId}\n`);
  }

  async clear(): Promise<void> {
    if (this.failClear()) {
      throw new Error(`EACCES: permission denied, unlink '${this.ledgerPath}'`);
    }
    this.disk.delete(this.ledgerPath);
  }

  async close(): Promise<void> {}

  describe(): string {
    return this.ledgerPath;
  }
}

export class InMemoryProgressLedgerFactory implements ProgressLedgerFactoryPort {
  private clearFails = false;

  constructor(private readonly disk: InMemoryDisk) {}

  forFile(ledgerPath: string): ProgressLedgerPort {
    return new InMemoryProgressLedger(this.disk, ledgerPath, () => this.clearFails);
  }

  // Test helper methods

  failOnClear(): void {
    this.clearFails = true;
  }
}
