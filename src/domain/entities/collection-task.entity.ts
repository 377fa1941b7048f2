import { produce } from 'immer';
import { CollectionIdVO } from '../value-objects/collection-id.vo';

/**
 * Collection Task Entity - Progress of one collection within a run
 *
 * Status Transitions:
 * PENDING → RETRIEVING → COMPLETED
 * A fatal error ends the whole run, so a collection never records a failure.
 *
 * Same hybrid approach as the rest of the domain:
 * - Data stored in a plain readonly interface
 * - Logic in namespace functions returning new instances via Immer
 */

export type CollectionTaskStatus = 'pending' | 'retrieving' | 'completed';

/**
 * Where the candidate file names came from: a fresh remote listing, or the
 * archives already on local disk (resume mode).
 */
export type CollectionFileSource = 'listing' | 'local';

export interface CollectionTaskEntityData {
  readonly collectionId: CollectionIdVO;
  readonly status: CollectionTaskStatus;
  readonly source?: CollectionFileSource;
  readonly files: readonly string[];
  readonly retrievedFiles: readonly string[];
  readonly skippedFiles: readonly string[];
  readonly normalizedFiles: readonly string[];
  readonly startedAt?: Date;
  readonly completedAt?: Date;
}

export interface CollectionTaskEntity extends CollectionTaskEntityData {
  readonly durationMs: number | undefined;

  isCompleted(): boolean;
  pendingFiles(): string[];

  withFiles(files: readonly string[], source: CollectionFileSource): CollectionTaskEntity;
  markRetrieved(fileName: string): CollectionTaskEntity;
  markSkipped(fileName: string): CollectionTaskEntity;
  markNormalized(fileName: string): CollectionTaskEntity;
  markCompleted(): CollectionTaskEntity;

  toJSON(): ReturnType<typeof CollectionTaskEntity.toJSON>;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace CollectionTaskEntity {
  export function create(collectionId: CollectionIdVO): CollectionTaskEntity {
    return attachMethods({
      collectionId,
      status: 'pending',
      files: [],
      retrievedFiles: [],
      skippedFiles: [],
      normalizedFiles: [],
    });
  }

  function attachMethods(data: CollectionTaskEntityData): CollectionTaskEntity {
    return {
      ...data,

      get durationMs() {
        return getDurationMs(data);
      },

      isCompleted: () => data.status === 'completed',
      pendingFiles: () => pendingFiles(data),

      withFiles: (files: readonly string[], source: CollectionFileSource) => withFiles(data, files, source),
      markRetrieved: (fileName: string) => markRetrieved(data, fileName),
      markSkipped: (fileName: string) => markSkipped(data, fileName),
      markNormalized: (fileName: string) => markNormalized(data, fileName),
      markCompleted: () => markCompleted(data),

      toJSON: () => toJSON(data),
    };
  }

  export function getDurationMs(task: CollectionTaskEntityData): number | undefined {
    if (!task.startedAt) return undefined;
    const endTime = task.completedAt ?? new Date();
    return endTime.getTime() - task.startedAt.getTime();
  }

  /** Files neither retrieved nor skipped yet */
  export function pendingFiles(task: CollectionTaskEntityData): string[] {
    return task.files.filter(
      (file) => !task.retrievedFiles.includes(file) && !task.skippedFiles.includes(file),
    );
  }

  function assertKnownFile(task: CollectionTaskEntityData, fileName: string): void {
    if (!task.files.includes(fileName)) {
      throw new Error(`File ${fileName} does not belong to collection ${task.collectionId.value}`);
    }
  }

  export function withFiles(
    task: CollectionTaskEntityData,
    files: readonly string[],
    source: CollectionFileSource,
  ): CollectionTaskEntity {
    if (task.status !== 'pending') {
      throw new Error(`Collection ${task.collectionId.value} already has its file list`);
    }

    const updated = produce(task, (draft) => {
      draft.status = 'retrieving';
      draft.source = source;
      draft.files = [...files];
      draft.startedAt = draft.startedAt ?? new Date();
    });
    return attachMethods(updated);
  }

  export function markRetrieved(task: CollectionTaskEntityData, fileName: string): CollectionTaskEntity {
    assertKnownFile(task, fileName);
    const updated = produce(task, (draft) => {
      draft.retrievedFiles = [...draft.retrievedFiles, fileName];
    });
    return attachMethods(updated);
  }

  export function markSkipped(task: CollectionTaskEntityData, fileName: string): CollectionTaskEntity {
    assertKnownFile(task, fileName);
    const updated = produce(task, (draft) => {
      draft.skippedFiles = [...draft.skippedFiles, fileName];
    });
    return attachMethods(updated);
  }

  export function markNormalized(task: CollectionTaskEntityData, fileName: string): CollectionTaskEntity {
    assertKnownFile(task, fileName);
    const updated = produce(task, (draft) => {
      draft.normalizedFiles = [...draft.normalizedFiles, fileName];
    });
    return attachMethods(updated);
  }

  export function markCompleted(task: CollectionTaskEntityData): CollectionTaskEntity {
    if (task.status !== 'retrieving') {
      throw new Error('Can only complete a collection whose files are being retrieved');
    }
    const outstanding = pendingFiles(task);
    if (outstanding.length > 0) {
      throw new Error(
        `Collection ${task.collectionId.value} still has ${outstanding.length} pending file(s)`,
      );
    }

    const updated = produce(task, (draft) => {
      draft.status = 'completed';
      draft.completedAt = new Date();
    });
    return attachMethods(updated);
  }

  export function toJSON(task: CollectionTaskEntityData) {
    return {
      collectionId: task.collectionId.value,
      status: task.status,
      source: task.source,
      files: [...task.files],
      retrievedFiles: [...task.retrievedFiles],
      skippedFiles: [...task.skippedFiles],
      normalizedFiles: [...task.normalizedFiles],
      durationMs: getDurationMs(task),
    };
  }
}
