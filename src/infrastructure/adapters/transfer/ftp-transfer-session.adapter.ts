import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createWriteStream } from 'fs';
import { rm, stat } from 'fs/promises';
import { Socket, connect } from 'net';
import { Writable } from 'stream';
import { pipeline } from 'stream/promises';
import {
  RetrievalResult,
  TransferSessionFactoryPort,
  TransferSessionPort,
} from '../../../application/ports/output/transfer-session.port';
import { CollectionIdVO } from '../../../domain/value-objects/collection-id.vo';
import {
  InterruptedError,
  TransientTransferError,
  isPipelineError,
} from '../../../domain/errors/pipeline.errors';
import { AppConfig } from '../../../config/configuration';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import { FtpControlChannel } from './ftp-control-channel';
import { runWithKeepAlive } from './keep-alive';

export interface FtpSessionSettings {
  host: string;
  port: number;
  baseDir: string;
  timeoutMs: number;
  keepAliveIntervalMs: number;
  archiveSuffix: string;
  user: string;
  password: string;
}

/**
 * FTP Transfer Session Adapter
 * Implements TransferSessionPort over one anonymous FTP control connection
 *
 * Retrieval is binary and passive; the data flows on its own socket while
 * NOOPs keep the control connection from idling out.
 */
export class FtpTransferSession implements TransferSessionPort {
  private channel?: FtpControlChannel;
  private collectionId?: CollectionIdVO;

  constructor(
    private readonly settings: FtpSessionSettings,
    private readonly logger: PinoLoggerService,
  ) {}

  isOpen(): boolean {
    return this.channel?.isConnected() ?? false;
  }

  async open(collectionId: CollectionIdVO, signal?: AbortSignal): Promise<string[]> {
    await this.close();
    this.collectionId = collectionId;

    const channel = new FtpControlChannel({
      host: this.settings.host,
      port: this.settings.port,
      timeoutMs: this.settings.timeoutMs,
      trace: (line) => this.logger.verbose(line),
    });
    this.channel = channel;
    const directory = collectionId.remoteDirectory(this.settings.baseDir);

    return this.guard('open', `Listing ${directory}`, signal, async () => {
      await channel.connect();
      await channel.login(this.settings.user, this.settings.password);
      await channel.command(`CWD ${directory}`);

      const names = await this.list(channel, signal);
      const candidates = names.filter((name) => name.endsWith(this.settings.archiveSuffix));
      this.logger.debug(
        { collectionId: collectionId.value, listed: names.length, candidates: candidates.length },
        `Listed ${directory}`,
      );
      return candidates;
    });
  }

  async retrieve(fileName: string, destinationPath: string, signal?: AbortSignal): Promise<RetrievalResult> {
    const channel = this.channel;
    if (!channel || !channel.isConnected()) {
      throw new TransientTransferError(`Cannot retrieve ${fileName}: session is not open`, 'retrieve');
    }

    const startedAt = Date.now();
    try {
      await this.guard('retrieve', `Retrieving ${fileName}`, signal, async () => {
        await channel.command('TYPE I');
        const data = await this.openDataConnection(channel, signal);
        const transfer = channel.startTransfer(`RETR ${fileName}`);

        try {
          await transfer.preliminary();
          await runWithKeepAlive(
            () => pipeline(data, createWriteStream(destinationPath), { signal }),
            () =>
              channel.keepAlive((error) => this.logger.warn({ fileName, error: error.message }, 'Keepalive NOOP rejected')),
            this.settings.keepAliveIntervalMs,
          );
        } finally {
          data.destroy();
        }

        await this.withReplyTimeout(channel, transfer.completion(), `RETR ${fileName} was not confirmed`);
      });
    } catch (error) {
      await rm(destinationPath, { force: true });
      throw error;
    }

    const { size } = await stat(destinationPath);
    this.logger.debug(
      { collectionId: this.collectionId?.value, fileName, sizeBytes: size, durationMs: Date.now() - startedAt },
      'Retrieved file',
    );
    return { fileName, localPath: destinationPath, sizeBytes: size };
  }

  async close(): Promise<void> {
    const channel = this.channel;
    this.channel = undefined;
    if (channel) {
      await channel.quit();
    }
  }

  /**
   * NLST in ASCII mode; servers may answer with paths, only names are kept
   */
  private async list(channel: FtpControlChannel, signal?: AbortSignal): Promise<string[]> {
    await channel.command('TYPE A');
    const data = await this.openDataConnection(channel, signal);
    const transfer = channel.startTransfer('NLST');
    const chunks: Buffer[] = [];

    try {
      await transfer.preliminary();
      await pipeline(
        data,
        new Writable({
          write(chunk: Buffer, _encoding, callback) {
            chunks.push(chunk);
            callback();
          },
        }),
        { signal },
      );
    } finally {
      data.destroy();
    }
    await this.withReplyTimeout(channel, transfer.completion(), 'NLST was not confirmed');

    return Buffer.concat(chunks)
      .toString('utf8')
      .split(/\r?\n/)
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
      .map((entry) => entry.slice(entry.lastIndexOf('/') + 1));
  }

  private async openDataConnection(channel: FtpControlChannel, signal?: AbortSignal): Promise<Socket> {
    const { host, port } = await channel.enterPassiveMode();
    const socket = connect({ host, port, signal });

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        socket.destroy();
        reject(new Error(`Data connection to ${host}:${port} timed out`));
      }, this.settings.timeoutMs);
      socket.once('connect', () => {
        clearTimeout(timer);
        resolve();
      });
      socket.once('error', (error) => {
        clearTimeout(timer);
        reject(error);
      });
    });

    socket.setTimeout(this.settings.timeoutMs, () => {
      socket.destroy(new Error(`Data connection idle for ${this.settings.timeoutMs} ms`));
    });
    return socket;
  }

  private async withReplyTimeout<T>(channel: FtpControlChannel, promise: Promise<T>, message: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    try {
      return await Promise.race([
        promise,
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => {
            channel.destroy();
            reject(new Error(message));
          }, this.settings.timeoutMs);
        }),
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Runs one protocol exchange: abort tears both sockets down, any failure
   * leaves the session closed and is reported as transient
   */
  private async guard<T>(
    operation: 'open' | 'retrieve',
    description: string,
    signal: AbortSignal | undefined,
    exchange: () => Promise<T>,
  ): Promise<T> {
    const channel = this.channel;
    if (signal?.aborted) {
      throw new InterruptedError();
    }
    const onAbort = () => channel?.destroy(new InterruptedError());
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await exchange();
    } catch (error) {
      channel?.destroy();
      if (this.channel === channel) this.channel = undefined;

      if (signal?.aborted) {
        throw error instanceof InterruptedError ? error : new InterruptedError(undefined, { cause: error });
      }
      if (isPipelineError(error)) throw error;

      const message = error instanceof Error ? error.message : String(error);
      throw new TransientTransferError(`${description} failed: ${message}`, operation, { cause: error });
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Builds one session per collection from the FTP configuration
 */
@Injectable()
export class FtpTransferSessionFactory implements TransferSessionFactoryPort {
  private readonly settings: FtpSessionSettings;
  private readonly logger: PinoLoggerService;

  constructor(configService: ConfigService<AppConfig, true>, logger: PinoLoggerService) {
    const ftp = configService.get('ftp', { infer: true });
    this.settings = {
      ...ftp,
      user: 'anonymous',
      password: 'anonymous@',
    };
    this.logger = logger.forContext(FtpTransferSession.name);
  }

  createSession(): TransferSessionPort {
    return new FtpTransferSession(this.settings, this.logger);
  }
}
