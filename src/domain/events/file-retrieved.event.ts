import { DomainEvent } from './base.event';

/**
 * File Retrieved Event
 * Emitted after a remote file was fully written to local disk
 */
export interface FileRetrievedEventPayload {
  collectionId: string;
  fileName: string;
  sizeBytes: number;
  attempts: number;
  durationMs: number;
}

export class FileRetrievedEvent extends DomainEvent {
  constructor(public readonly payload: FileRetrievedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'file.retrieved';
  }

  get fileName(): string {
    return this.payload.fileName;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
