import { DomainEvent } from './base.event';

/**
 * Run Started Event
 * Emitted once startup reconciliation succeeded, before discovery
 */
export interface RunStartedEventPayload {
  runId: string;
  selection: string;
  outputFileName: string;
  downloadOnly: boolean;
  force: boolean;
  resume: boolean;
  reverse: boolean;
  localArchives: number;
  previouslyCompleted: number;
}

export class RunStartedEvent extends DomainEvent {
  constructor(public readonly payload: RunStartedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'run.started';
  }

  get runId(): string {
    return this.payload.runId;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
