import { DomainEvent } from './base.event';

/**
 * File Skipped Event
 * Emitted when a remote file is already present on local disk
 */
export interface FileSkippedEventPayload {
  collectionId: string;
  fileName: string;
}

export class FileSkippedEvent extends DomainEvent {
  constructor(public readonly payload: FileSkippedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'file.skipped';
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
