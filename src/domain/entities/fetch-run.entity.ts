import { produce } from 'immer';
import { RunModeVO } from '../value-objects/run-mode.vo';
import { TaxonSelectionVO } from '../value-objects/taxon-selection.vo';

/**
 * Fetch Run Entity - One invocation of the pipeline for a taxon selection
 *
 * Status Transitions:
 * RECONCILING → DISCOVERING → FETCHING → COMPLETED
 * any non-terminal status → FAILED
 */

export type FetchRunStatus = 'reconciling' | 'discovering' | 'fetching' | 'completed' | 'failed';

export interface FetchRunEntityData {
  readonly runId: string;
  readonly selection: TaxonSelectionVO;
  readonly mode: RunModeVO;
  readonly status: FetchRunStatus;
  /** Collections listed in the ledger of a previous run */
  readonly previouslyCompleted: number;
  /** Raw size of the discovery answer, before ledger filtering */
  readonly discoveredTotal: number;
  readonly pendingTotal: number;
  /** Counts resumed collections too, so it starts at `previouslyCompleted` */
  readonly processed: number;
  readonly startedAt: Date;
  readonly completedAt?: Date;
  readonly errorMessage?: string;
}

export interface FetchRunProps {
  runId: string;
  selection: TaxonSelectionVO;
  mode: RunModeVO;
  startedAt?: Date;
}

export interface FetchRunEntity extends FetchRunEntityData {
  readonly durationMs: number;

  progressRatio(): number;

  withLedger(previouslyCompleted: number): FetchRunEntity;
  withDiscovery(discoveredTotal: number, pendingTotal: number): FetchRunEntity;
  markCollectionCompleted(): FetchRunEntity;
  markCompleted(): FetchRunEntity;
  markFailed(errorMessage: string): FetchRunEntity;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace FetchRunEntity {
  export function create(props: FetchRunProps): FetchRunEntity {
    if (!props.runId || props.runId.trim().length === 0) {
      throw new Error('Run ID is required');
    }

    return attachMethods({
      runId: props.runId,
      selection: props.selection,
      mode: props.mode,
      status: 'reconciling',
      previouslyCompleted: 0,
      discoveredTotal: 0,
      pendingTotal: 0,
      processed: 0,
      startedAt: props.startedAt ?? new Date(),
    });
  }

  function attachMethods(data: FetchRunEntityData): FetchRunEntity {
    return {
      ...data,

      get durationMs() {
        return ((data.completedAt ?? new Date()).getTime() - data.startedAt.getTime());
      },

      progressRatio: () => progressRatio(data),

      withLedger: (previouslyCompleted: number) => withLedger(data, previouslyCompleted),
      withDiscovery: (discoveredTotal: number, pendingTotal: number) =>
        withDiscovery(data, discoveredTotal, pendingTotal),
      markCollectionCompleted: () => markCollectionCompleted(data),
      markCompleted: () => markCompleted(data),
      markFailed: (errorMessage: string) => markFailed(data, errorMessage),
    };
  }

  /**
   * Display-only progress: processed collections (including those resumed
   * from the ledger) over the raw discovery count.
   */
  export function progressRatio(run: FetchRunEntityData): number {
    if (run.discoveredTotal === 0) return 0;
    return run.processed / run.discoveredTotal;
  }

  export function withLedger(run: FetchRunEntityData, previouslyCompleted: number): FetchRunEntity {
    if (run.status !== 'reconciling') {
      throw new Error(`Cannot load the ledger while ${run.status}`);
    }
    if (previouslyCompleted < 0) {
      throw new Error('Completed collection count cannot be negative');
    }

    const updated = produce(run, (draft) => {
      draft.status = 'discovering';
      draft.previouslyCompleted = previouslyCompleted;
      draft.processed = previouslyCompleted;
    });
    return attachMethods(updated);
  }

  export function withDiscovery(
    run: FetchRunEntityData,
    discoveredTotal: number,
    pendingTotal: number,
  ): FetchRunEntity {
    if (run.status !== 'discovering') {
      throw new Error(`Cannot record discovery results while ${run.status}`);
    }
    if (pendingTotal > discoveredTotal) {
      throw new Error('Pending collections cannot exceed discovered collections');
    }

    const updated = produce(run, (draft) => {
      draft.status = 'fetching';
      draft.discoveredTotal = discoveredTotal;
      draft.pendingTotal = pendingTotal;
    });
    return attachMethods(updated);
  }

  export function markCollectionCompleted(run: FetchRunEntityData): FetchRunEntity {
    if (run.status !== 'fetching') {
      throw new Error(`Cannot complete a collection while ${run.status}`);
    }

    const updated = produce(run, (draft) => {
      draft.processed = draft.processed + 1;
    });
    return attachMethods(updated);
  }

  export function markCompleted(run: FetchRunEntityData): FetchRunEntity {
    if (run.status !== 'fetching' && run.status !== 'discovering') {
      throw new Error(`Cannot complete a run while ${run.status}`);
    }

    const updated = produce(run, (draft) => {
      draft.status = 'completed';
      draft.completedAt = new Date();
    });
    return attachMethods(updated);
  }

  export function markFailed(run: FetchRunEntityData, errorMessage: string): FetchRunEntity {
    const updated = produce(run, (draft) => {
      draft.status = 'failed';
      draft.errorMessage = errorMessage;
      draft.completedAt = new Date();
    });
    return attachMethods(updated);
  }
}
