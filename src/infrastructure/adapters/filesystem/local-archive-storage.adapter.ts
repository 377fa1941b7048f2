import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createReadStream } from 'fs';
import { readdir, stat, unlink } from 'fs/promises';
import { join } from 'path';
import { pipeline } from 'stream';
import { StringDecoder } from 'string_decoder';
import { createGunzip } from 'zlib';
import {
  LocalArchiveStorageFactoryPort,
  LocalArchiveStoragePort,
} from '../../../application/ports/output/local-archive-storage.port';
import { CorruptArchiveError, InterruptedError } from '../../../domain/errors/pipeline.errors';
import { AppConfig } from '../../../config/configuration';
import { isErrnoException, isNotFound } from './fs-errors';

/**
 * Local Archive Storage Adapter
 * Gzip archives kept in the work directory under their remote names
 */
export class LocalArchiveStorage implements LocalArchiveStoragePort {
  private readonly logger = new Logger(LocalArchiveStorage.name);

  constructor(
    private readonly workDir: string,
    private readonly archiveSuffix: string,
  ) {}

  async listArchives(): Promise<string[]> {
    const entries = await readdir(this.workDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(this.archiveSuffix))
      .map((entry) => entry.name)
      .sort();
  }

  async exists(fileName: string): Promise<boolean> {
    try {
      return (await stat(this.pathFor(fileName))).isFile();
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async remove(fileName: string): Promise<void> {
    try {
      await unlink(this.pathFor(fileName));
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
  }

  pathFor(fileName: string): string {
    return join(this.workDir, fileName);
  }

  /**
   * Split on `\n` only, so `\r\n` files come through unchanged
   */
  async *readLines(fileName: string, signal?: AbortSignal): AsyncGenerator<string> {
    const decompressed = pipeline(createReadStream(this.pathFor(fileName), { signal }), createGunzip(), (error) => {
      if (error) this.logger.debug(`Reading ${fileName} stopped: ${error.message}`);
    });
    const chunks: AsyncIterable<Buffer> = decompressed;
    const decoder = new StringDecoder('utf8');
    let pending = '';

    try {
      for await (const chunk of chunks) {
        pending += decoder.write(chunk);
        let newline = pending.indexOf('\n');
        while (newline !== -1) {
          yield pending.slice(0, newline + 1);
          pending = pending.slice(newline + 1);
          newline = pending.indexOf('\n');
        }
      }
      pending += decoder.end();
      if (pending.length > 0) {
        yield pending;
      }
    } catch (error) {
      throw this.classify(error, fileName, signal);
    } finally {
      decompressed.destroy();
    }
  }

  private classify(error: unknown, fileName: string, signal?: AbortSignal): unknown {
    if (signal?.aborted) {
      return new InterruptedError(undefined, { cause: error });
    }
    if (isErrnoException(error) && typeof error.code === 'string' && error.code.startsWith('Z_')) {
      return new CorruptArchiveError(`Unexpected end of file or invalid gzip data: ${error.message}`, fileName, undefined, {
        cause: error,
      });
    }
    return error;
  }
}

@Injectable()
export class LocalArchiveStorageFactory implements LocalArchiveStorageFactoryPort {
  private readonly archiveSuffix: string;

  constructor(configService: ConfigService<AppConfig, true>) {
    this.archiveSuffix = configService.get('ftp.archiveSuffix', { infer: true });
  }

  forDirectory(workDir: string): LocalArchiveStoragePort {
    return new LocalArchiveStorage(workDir, this.archiveSuffix);
  }
}
