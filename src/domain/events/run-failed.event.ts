import { DomainEvent } from './base.event';

/**
 * Run Failed Event
 * Emitted before the process terminates on a fatal condition
 */
export interface RunFailedEventPayload {
  runId: string;
  kind: string;
  exitCode: number;
  errorMessage: string;
  resumable: boolean;
  collectionId?: string;
  fileName?: string;
}

export class RunFailedEvent extends DomainEvent {
  constructor(public readonly payload: RunFailedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'run.failed';
  }

  get exitCode(): number {
    return this.payload.exitCode;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
