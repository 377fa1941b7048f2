/**
 * Domain Events Barrel Export
 */
export { DomainEvent } from './base.event';
export { RunStartedEvent, type RunStartedEventPayload } from './run-started.event';
export {
  CollectionStartedEvent,
  type CollectionStartedEventPayload,
} from './collection-started.event';
export { AttemptFailedEvent, type AttemptFailedEventPayload } from './attempt-failed.event';
export { FileSkippedEvent, type FileSkippedEventPayload } from './file-skipped.event';
export { FileRetrievedEvent, type FileRetrievedEventPayload } from './file-retrieved.event';
export {
  CollectionCompletedEvent,
  type CollectionCompletedEventPayload,
} from './collection-completed.event';
export { RunCompletedEvent, type RunCompletedEventPayload } from './run-completed.event';
export { RunFailedEvent, type RunFailedEventPayload } from './run-failed.event';
