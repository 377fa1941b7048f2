import { DomainEvent } from './base.event';

/**
 * Attempt Failed Event
 * Emitted when one attempt of a retryable operation hits a transient fault
 */
export interface AttemptFailedEventPayload {
  operation: string;
  attempt: number;
  maxAttempts: number;
  /** Undefined when this was the last attempt of the schedule */
  nextDelayMs?: number;
  errorMessage: string;
  collectionId?: string;
  fileName?: string;
}

export class AttemptFailedEvent extends DomainEvent {
  constructor(public readonly payload: AttemptFailedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'attempt.failed';
  }

  get willRetry(): boolean {
    return this.payload.nextDelayMs !== undefined;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
