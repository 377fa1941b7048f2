import { Inject, Injectable, Logger } from '@nestjs/common';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { RunPipelineCommand, RunPipelinePort, RunPipelineResult } from '../ports/input';
import type {
  CollectionDiscoveryPort,
  EventPublisherPort,
  FastaOutputFactoryPort,
  FastaOutputPort,
  LocalArchiveStorageFactoryPort,
  LocalArchiveStoragePort,
  ProgressLedgerFactoryPort,
  ProgressLedgerPort,
  RetrievalResult,
  TransferSessionFactoryPort,
  TransferSessionPort,
} from '../ports/output';
import {
  COLLECTION_DISCOVERY_PORT,
  EVENT_PUBLISHER_PORT,
  FASTA_OUTPUT_FACTORY,
  LOCAL_ARCHIVE_STORAGE_FACTORY,
  PROGRESS_LEDGER_FACTORY,
  TRANSFER_SESSION_FACTORY_PORT,
} from '../ports/tokens';
import { FailedAttempt, RetryPolicyService } from '../services/retry-policy.service';
import { HeaderParser, RecordNormalizerService } from '../services/record-normalizer.service';
import { reconcileStartup } from '../services/startup-reconciler';
import { FetchRunEntity } from '../../domain/entities/fetch-run.entity';
import { CollectionTaskEntity } from '../../domain/entities/collection-task.entity';
import { CollectionIdVO } from '../../domain/value-objects/collection-id.vo';
import { RunModeVO } from '../../domain/value-objects/run-mode.vo';
import {
  ConfigurationConflictError,
  InterruptedError,
  LedgerCleanupError,
  exitCodeFor,
  isPipelineError,
} from '../../domain/errors/pipeline.errors';
import {
  AttemptFailedEvent,
  CollectionCompletedEvent,
  CollectionStartedEvent,
  FileRetrievedEvent,
  FileSkippedEvent,
  RunCompletedEvent,
  RunFailedEvent,
  RunStartedEvent,
} from '../../domain/events';

/**
 * Resources of one run; the use case owns them from reconciliation to exit
 */
interface RunResources {
  ledger: ProgressLedgerPort;
  output: FastaOutputPort;
  storage: LocalArchiveStoragePort;
  signal?: AbortSignal;
}

/** Collection and file in flight, reported when the run fails */
interface RunPosition {
  collectionId?: string;
  fileName?: string;
}

/**
 * Run Pipeline Use Case
 * Drives discovery, then the sequential per-collection / per-file loop
 *
 * Durability boundary: a collection enters the ledger only after all of its
 * records were flushed to the output, and the output is rolled back to the
 * last recorded collection on any fatal exit.
 */
@Injectable()
export class RunPipelineUseCase implements RunPipelinePort {
  private readonly logger = new Logger(RunPipelineUseCase.name);

  constructor(
    @Inject(COLLECTION_DISCOVERY_PORT)
    private readonly discovery: CollectionDiscoveryPort,
    @Inject(TRANSFER_SESSION_FACTORY_PORT)
    private readonly sessions: TransferSessionFactoryPort,
    @Inject(PROGRESS_LEDGER_FACTORY)
    private readonly ledgers: ProgressLedgerFactoryPort,
    @Inject(LOCAL_ARCHIVE_STORAGE_FACTORY)
    private readonly storages: LocalArchiveStorageFactoryPort,
    @Inject(FASTA_OUTPUT_FACTORY)
    private readonly outputs: FastaOutputFactoryPort,
    @Inject(EVENT_PUBLISHER_PORT)
    private readonly eventPublisher: EventPublisherPort,
    private readonly retryPolicy: RetryPolicyService,
    private readonly normalizer: RecordNormalizerService,
  ) {}

  async execute(command: RunPipelineCommand): Promise<RunPipelineResult> {
    const { selection, mode, signal, workDir } = command;
    const outputPath = join(workDir, selection.outputFileName);
    const resources: RunResources = {
      ledger: this.ledgers.forFile(join(workDir, selection.ledgerFileName)),
      output: this.outputs.forFile(outputPath),
      storage: this.storages.forDirectory(workDir),
      signal,
    };
    const position: RunPosition = {};
    let run = FetchRunEntity.create({ runId: command.runId ?? uuidv4(), selection, mode });
    let outputOpened = false;

    this.logger.debug(`Starting run ${run.runId} for ${selection.toString()}`);

    try {
      const completed = await this.reconcile(resources, mode, selection.ledgerFileName, selection.outputFileName);
      const localArchives = await resources.storage.listArchives();
      run = run.withLedger(completed.size);

      if (mode.force) this.logger.debug('Previous ledger and output cleared by the force flag');
      if (mode.downloadOnly) this.logger.debug('Download-only mode enabled');
      if (mode.reverse) this.logger.debug('Reverse order enabled');

      await this.eventPublisher.publish(
        new RunStartedEvent({
          runId: run.runId,
          selection: selection.toString(),
          outputFileName: selection.outputFileName,
          ...mode.toJSON(),
          localArchives: localArchives.length,
          previouslyCompleted: completed.size,
        }),
      );

      const discovered = await this.retryPolicy.execute(() => this.discovery.listCollectionIds(selection, signal), {
        operation: 'Collection discovery',
        signal,
        onFailedAttempt: (failure) => this.publishAttemptFailed('Collection discovery', failure, {}),
      });
      const pending = this.selectPending(discovered, completed, mode.reverse);
      run = run.withDiscovery(discovered.length, pending.length);

      if (pending.length === 0) {
        run = run.markCompleted();
        await this.publishRunCompleted(run, selection.outputFileName);
        await resources.ledger.close();
        return { run, nothingToDo: true, outputPath: mode.writesOutput() ? outputPath : undefined };
      }

      this.logger.debug(`${pending.length} of ${discovered.length} discovered collections are pending`);

      if (mode.writesOutput()) {
        await resources.output.open();
        outputOpened = true;
      }

      for (const [index, collectionId] of pending.entries()) {
        this.throwIfAborted(signal);
        position.collectionId = collectionId.value;
        position.fileName = undefined;

        const task = await this.processCollection(collectionId, index, pending.length, localArchives, run, mode, resources, position);
        run = run.markCollectionCompleted();

        await this.eventPublisher.publish(
          new CollectionCompletedEvent({
            runId: run.runId,
            collectionId: collectionId.value,
            processed: run.processed,
            discoveredTotal: run.discoveredTotal,
            progressRatio: run.progressRatio(),
            retrievedFiles: task.retrievedFiles.length,
            skippedFiles: task.skippedFiles.length,
            normalizedFiles: task.normalizedFiles.length,
            downloadOnly: mode.downloadOnly,
            durationMs: task.durationMs ?? 0,
          }),
        );
      }

      run = run.markCompleted();
      let cleanupError: LedgerCleanupError | undefined;

      await resources.ledger.close();
      if (mode.writesOutput()) {
        outputOpened = false;
        await resources.output.close();
        cleanupError = await this.removeLedger(resources.ledger);
      }

      await this.publishRunCompleted(run, selection.outputFileName);
      return {
        run,
        nothingToDo: false,
        outputPath: mode.writesOutput() ? outputPath : undefined,
        cleanupError,
      };
    } catch (error) {
      const failure = signal?.aborted && !isPipelineError(error) ? new InterruptedError(undefined, { cause: error }) : error;
      await this.releaseAfterFailure(resources, outputOpened);
      run = run.markFailed(failure instanceof Error ? failure.message : String(failure));

      await this.eventPublisher.publish(
        new RunFailedEvent({
          runId: run.runId,
          kind: isPipelineError(failure) ? failure.kind : 'INTERNAL',
          exitCode: exitCodeFor(failure),
          errorMessage: run.errorMessage ?? 'Unknown error',
          resumable: isPipelineError(failure) && failure.resumable,
          ...position,
        }),
      );
      throw failure;
    }
  }

  /**
   * Applies the startup plan and returns the collections to skip
   */
  private async reconcile(
    resources: RunResources,
    mode: RunModeVO,
    ledgerName: string,
    outputName: string,
  ): Promise<Set<string>> {
    const { ledger, output } = resources;
    const ledgerExists = await ledger.exists();
    const completed = ledgerExists ? await ledger.load() : new Set<string>();
    const outputExists = await output.exists();

    const plan = reconcileStartup(
      { ledgerExists, ledgerEntries: completed.size, outputExists, mode },
      ledgerName,
      outputName,
    );

    switch (plan.kind) {
      case 'conflict':
        throw new ConfigurationConflictError(plan.message, plan.exitCode);
      case 'fresh':
        if (plan.clearLedger) {
          await ledger.clear();
          completed.clear();
        }
        if (plan.removeOutput) {
          await output.remove();
        }
        return completed;
      case 'resume':
        return completed;
    }
  }

  /**
   * Drops recorded and invalid ids, then orders the rest by code point
   */
  private selectPending(discovered: string[], completed: Set<string>, reverse: boolean): CollectionIdVO[] {
    const pending = new Map<string, CollectionIdVO>();

    for (const raw of discovered) {
      if (completed.has(raw) || pending.has(raw)) continue;
      try {
        pending.set(raw, CollectionIdVO.create(raw));
      } catch (error) {
        this.logger.warn(`Ignoring discovered id: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    const ids = [...pending.values()].sort((a, b) => (a.value < b.value ? -1 : a.value > b.value ? 1 : 0));
    return reverse ? ids.reverse() : ids;
  }

  private async processCollection(
    collectionId: CollectionIdVO,
    index: number,
    pendingTotal: number,
    localArchives: string[],
    run: FetchRunEntity,
    mode: RunModeVO,
    resources: RunResources,
    position: RunPosition,
  ): Promise<CollectionTaskEntity> {
    const { storage, output, ledger, signal } = resources;
    const session = this.sessions.createSession();
    let task = CollectionTaskEntity.create(collectionId);

    try {
      const onDisk = mode.resume ? localArchives.filter((file) => collectionId.ownsFile(file)) : [];

      if (onDisk.length > 0) {
        this.logger.debug(`Collection ${collectionId.value} is on disk, skipping the listing`);
        task = task.withFiles(onDisk, 'local');
      } else {
        this.logger.debug(`${index + 1} of ${pendingTotal}: listing collection ${collectionId.value}`);
        const operation = `Listing ${collectionId.value}`;
        const candidates = await this.retryPolicy.execute(() => session.open(collectionId, signal), {
          operation,
          signal,
          onFailedAttempt: async (failure) => {
            await session.close();
            await this.publishAttemptFailed(operation, failure, { collectionId: collectionId.value });
          },
        });
        task = task.withFiles(candidates, 'listing');
      }

      await this.eventPublisher.publish(
        new CollectionStartedEvent({
          runId: run.runId,
          collectionId: collectionId.value,
          position: index + 1,
          pendingTotal,
          source: task.source ?? 'listing',
          fileCount: task.files.length,
        }),
      );

      const parser = this.normalizer.createHeaderParser(collectionId);

      for (const fileName of task.files) {
        this.throwIfAborted(signal);
        position.fileName = fileName;

        if (mode.reusesLocalArchives() && (await storage.exists(fileName))) {
          this.logger.debug(`[${fileName} already downloaded]`);
          task = task.markSkipped(fileName);
          await this.eventPublisher.publish(new FileSkippedEvent({ collectionId: collectionId.value, fileName }));
        } else {
          await this.retrieveFile(session, collectionId, fileName, storage, signal);
          task = task.markRetrieved(fileName);
        }

        if (mode.writesOutput()) {
          await this.normalizeInto(output, storage, parser, fileName, signal);
          task = task.markNormalized(fileName);
        }
      }
      position.fileName = undefined;

      if (mode.writesOutput()) {
        await output.flush();
        await ledger.record(collectionId.value);
        await output.commit();
      }

      return task.markCompleted();
    } finally {
      await session.close();
    }
  }

  private async retrieveFile(
    session: TransferSessionPort,
    collectionId: CollectionIdVO,
    fileName: string,
    storage: LocalArchiveStoragePort,
    signal?: AbortSignal,
  ): Promise<RetrievalResult> {
    const operation = `Retrieving ${fileName}`;
    const startedAt = Date.now();
    let attempts = 0;

    try {
      const result = await this.retryPolicy.execute(
        async ({ attempt }) => {
          attempts = attempt;
          if (!session.isOpen()) {
            await session.open(collectionId, signal);
          }
          return session.retrieve(fileName, storage.pathFor(fileName), signal);
        },
        {
          operation,
          signal,
          onFailedAttempt: async (failure) => {
            await storage.remove(fileName);
            await session.close();
            await this.publishAttemptFailed(operation, failure, { collectionId: collectionId.value, fileName });
          },
        },
      );

      await this.eventPublisher.publish(
        new FileRetrievedEvent({
          collectionId: collectionId.value,
          fileName,
          sizeBytes: result.sizeBytes,
          attempts,
          durationMs: Date.now() - startedAt,
        }),
      );
      return result;
    } catch (error) {
      // A partial archive would pass for a complete one on the next resume
      await storage.remove(fileName);
      throw error;
    }
  }

  private async normalizeInto(
    output: FastaOutputPort,
    storage: LocalArchiveStoragePort,
    parser: HeaderParser,
    fileName: string,
    signal?: AbortSignal,
  ): Promise<void> {
    for await (const chunk of this.normalizer.normalize(storage.readLines(fileName, signal), parser, fileName)) {
      await output.append(chunk);
    }
  }

  private async removeLedger(ledger: ProgressLedgerPort): Promise<LedgerCleanupError | undefined> {
    try {
      await ledger.clear();
      return undefined;
    } catch (error) {
      const cleanupError = new LedgerCleanupError(ledger.describe(), { cause: error });
      this.logger.warn(cleanupError.message);
      return cleanupError;
    }
  }

  /**
   * Leaves ledger and output consistent for a later --resume
   */
  private async releaseAfterFailure(resources: RunResources, outputOpened: boolean): Promise<void> {
    if (outputOpened) {
      try {
        await resources.output.rollback();
        await resources.output.close();
      } catch (error) {
        this.logger.error(
          `Failed to roll back ${resources.output.describe()}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    try {
      await resources.ledger.close();
    } catch (error) {
      this.logger.error(
        `Failed to close ${resources.ledger.describe()}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private async publishAttemptFailed(
    operation: string,
    failure: FailedAttempt,
    context: { collectionId?: string; fileName?: string },
  ): Promise<void> {
    await this.eventPublisher.publish(
      new AttemptFailedEvent({
        operation,
        attempt: failure.attempt,
        maxAttempts: failure.maxAttempts,
        nextDelayMs: failure.nextDelayMs,
        errorMessage: failure.error.message,
        ...context,
      }),
    );
  }

  private async publishRunCompleted(run: FetchRunEntity, outputFileName: string): Promise<void> {
    await this.eventPublisher.publish(
      new RunCompletedEvent({
        runId: run.runId,
        processed: run.processed,
        discoveredTotal: run.discoveredTotal,
        pendingTotal: run.pendingTotal,
        downloadOnly: run.mode.downloadOnly,
        outputFileName: run.mode.writesOutput() ? outputFileName : undefined,
        durationMs: run.durationMs,
      }),
    );
  }

  private throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new InterruptedError();
    }
  }
}
