import { DomainEvent } from './base.event';

/**
 * Collection Completed Event
 * Emitted after the collection was recorded in the progress ledger
 */
export interface CollectionCompletedEventPayload {
  runId: string;
  collectionId: string;
  processed: number;
  discoveredTotal: number;
  progressRatio: number;
  retrievedFiles: number;
  skippedFiles: number;
  normalizedFiles: number;
  downloadOnly: boolean;
  durationMs: number;
}

export class CollectionCompletedEvent extends DomainEvent {
  constructor(public readonly payload: CollectionCompletedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'collection.completed';
  }

  get collectionId(): string {
    return this.payload.collectionId;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
