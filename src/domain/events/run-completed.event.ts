import { DomainEvent } from './base.event';

/**
 * Run Completed Event
 * Emitted when every pending collection was processed, or none was pending
 */
export interface RunCompletedEventPayload {
  runId: string;
  processed: number;
  discoveredTotal: number;
  pendingTotal: number;
  downloadOnly: boolean;
  outputFileName?: string;
  durationMs: number;
}

export class RunCompletedEvent extends DomainEvent {
  constructor(public readonly payload: RunCompletedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'run.completed';
  }

  get nothingToDo(): boolean {
    return this.payload.pendingTotal === 0;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
