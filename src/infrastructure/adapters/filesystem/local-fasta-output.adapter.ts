import { Injectable } from '@nestjs/common';
import { FileHandle, open, stat, unlink } from 'fs/promises';
import {
  FastaOutputFactoryPort,
  FastaOutputPort,
} from '../../../application/ports/output/fasta-output.port';
import { isNotFound } from './fs-errors';

const FLUSH_THRESHOLD_BYTES = 1024 * 1024;

/**
 * Local FASTA Output Adapter
 * Buffered append-only writer that can roll back to the last committed size
 */
export class LocalFastaOutput implements FastaOutputPort {
  private handle?: FileHandle;
  private buffer: string[] = [];
  private bufferedBytes = 0;
  private writtenBytes = 0;
  private committedBytes = 0;

  constructor(private readonly outputPath: string) {}

  async exists(): Promise<boolean> {
    try {
      return (await stat(this.outputPath)).isFile();
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async remove(): Promise<void> {
    try {
      await unlink(this.outputPath);
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
  }

  async open(): Promise<void> {
    if (this.handle) return;
    this.handle = await open(this.outputPath, 'a');
    const { size } = await this.handle.stat();
    this.writtenBytes = size;
    this.committedBytes = size;
  }

  async append(text: string): Promise<void> {
    this.requireHandle();
    this.buffer.push(text);
    this.bufferedBytes += Buffer.byteLength(text);
    if (this.bufferedBytes >= FLUSH_THRESHOLD_BYTES) {
      await this.writeBuffer();
    }
  }

  async flush(): Promise<void> {
    const handle = this.requireHandle();
    await this.writeBuffer();
    await handle.datasync();
  }

  async commit(): Promise<void> {
    if (this.bufferedBytes > 0) {
      await this.flush();
    }
    this.committedBytes = this.writtenBytes;
  }

  async rollback(): Promise<void> {
    const handle = this.requireHandle();
    this.buffer = [];
    this.bufferedBytes = 0;
    await handle.truncate(this.committedBytes);
    await handle.datasync();
    this.writtenBytes = this.committedBytes;
  }

  async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) return;
    try {
      await this.flush();
    } finally {
      this.handle = undefined;
      await handle.close();
    }
  }

  describe(): string {
    return this.outputPath;
  }

  private async writeBuffer(): Promise<void> {
    const handle = this.requireHandle();
    if (this.buffer.length === 0) return;

    const data = this.buffer.join('');
    this.buffer = [];
    this.bufferedBytes = 0;
    await handle.write(data);
    this.writtenBytes += Buffer.byteLength(data);
  }

  private requireHandle(): FileHandle {
    if (!this.handle) {
      throw new Error(`Output ${this.outputPath} is not open`);
    }
    return this.handle;
  }
}

@Injectable()
export class LocalFastaOutputFactory implements FastaOutputFactoryPort {
  forFile(outputPath: string): FastaOutputPort {
    return new LocalFastaOutput(outputPath);
  }
}
