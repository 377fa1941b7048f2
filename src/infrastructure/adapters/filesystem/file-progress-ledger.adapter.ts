import { Injectable } from '@nestjs/common';
import { FileHandle, open, readFile, stat, unlink } from 'fs/promises';
import {
  ProgressLedgerFactoryPort,
  ProgressLedgerPort,
} from '../../../application/ports/output/progress-ledger.port';
import { isNotFound } from './fs-errors';

/**
 * File Progress Ledger Adapter
 * One collection id per line, appended and synced as each collection completes
 */
export class FileProgressLedger implements ProgressLedgerPort {
  private handle?: FileHandle;

  constructor(private readonly ledgerPath: string) {}

  async exists(): Promise<boolean> {
    try {
      return (await stat(this.ledgerPath)).isFile();
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async load(): Promise<Set<string>> {
    let content: string;
    try {
      content = await readFile(this.ledgerPath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) return new Set();
      throw error;
    }

    return new Set(
      content
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0),
    );
  }

  async record(collectionId: string): Promise<void> {
    if (!this.handle) {
      this.handle = await open(this.ledgerPath, 'a');
    }
    await this.handle.write(`${collectionId}\n`);
    await this.handle.datasync();
  }

  async clear(): Promise<void> {
    await this.close();
    try {
      await unlink(this.ledgerPath);
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = undefined;
    if (handle) {
      await handle.close();
    }
  }

  describe(): string {
    return this.ledgerPath;
  }
}

@Injectable()
export class FileProgressLedgerFactory implements ProgressLedgerFactoryPort {
  forFile(ledgerPath: string): ProgressLedgerPort {
    return new FileProgressLedger(ledgerPath);
  }
}
