import { DomainEvent } from './base.event';
import { CollectionFileSource } from '../entities/collection-task.entity';

/**
 * Collection Started Event
 * Emitted when the candidate files of a collection are known
 */
export interface CollectionStartedEventPayload {
  runId: string;
  collectionId: string;
  position: number;
  pendingTotal: number;
  source: CollectionFileSource;
  fileCount: number;
}

export class CollectionStartedEvent extends DomainEvent {
  constructor(public readonly payload: CollectionStartedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'collection.started';
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
