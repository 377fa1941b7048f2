import { Injectable } from '@nestjs/common';
import { EventPublisherPort } from '../../../application/ports/output/event-publisher.port';
import { DomainEvent } from '../../../domain/events/base.event';
import {
  AttemptFailedEvent,
  CollectionCompletedEvent,
  CollectionStartedEvent,
  FileRetrievedEvent,
  FileSkippedEvent,
  RunStartedEvent,
} from '../../../domain/events';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import { formatProgressEvent } from './progress-formatter';

function collectionIdOf(event: DomainEvent): string | undefined {
  if (
    event instanceof CollectionStartedEvent ||
    event instanceof CollectionCompletedEvent ||
    event instanceof FileRetrievedEvent ||
    event instanceof FileSkippedEvent ||
    event instanceof AttemptFailedEvent
  ) {
    return event.payload.collectionId;
  }
  return undefined;
}

/**
 * Console Progress Reporter Adapter
 * Implements EventPublisherPort by rendering events as progress lines.
 * Lines after `run.started` carry the run id, collection events their id.
 */
@Injectable()
export class ConsoleProgressReporterAdapter implements EventPublisherPort {
  private readonly logger: PinoLoggerService;
  private runLogger?: PinoLoggerService;

  constructor(logger: PinoLoggerService) {
    this.logger = logger.forContext('Progress');
  }

  async publish(event: DomainEvent): Promise<void> {
    if (event instanceof RunStartedEvent) {
      this.runLogger = this.logger.withRunId(event.payload.runId);
    }
    const collectionId = collectionIdOf(event);
    const runLogger = this.runLogger ?? this.logger;
    const logger = collectionId ? runLogger.withCollectionId(collectionId) : runLogger;

    const fields = { event: event.eventName, eventId: event.eventId };
    for (const line of formatProgressEvent(event)) {
      switch (line.level) {
        case 'debug':
          logger.debug(fields, line.message);
          break;
        case 'info':
          logger.info(fields, line.message);
          break;
        case 'warn':
          logger.warn(fields, line.message);
          break;
        case 'error':
          logger.error(fields, line.message);
          break;
      }
    }
  }
}
