import { DomainEvent } from '../../../domain/events/base.event';
import {
  AttemptFailedEvent,
  CollectionCompletedEvent,
  CollectionStartedEvent,
  FileRetrievedEvent,
  FileSkippedEvent,
  RunCompletedEvent,
  RunFailedEvent,
  RunStartedEvent,
} from '../../../domain/events';
import { RESUME_HINT } from '../../../domain/errors/pipeline.errors';

export type ProgressLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ProgressLine {
  level: ProgressLevel;
  message: string;
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

function formatSeconds(ms: number): string {
  return `${ms / 1000} seconds`;
}

/**
 * Human readable rendering of pipeline events; unknown events render nothing
 */
export function formatProgressEvent(event: DomainEvent): ProgressLine[] {
  if (event instanceof RunStartedEvent) {
    const { payload } = event;
    const lines: ProgressLine[] = [
      { level: 'info', message: `Collecting WGS projects for ${payload.selection} into ${payload.outputFileName}` },
    ];
    if (payload.resume || (payload.downloadOnly && !payload.force)) {
      lines.push({ level: 'info', message: `${payload.localArchives} archive files already in the work directory` });
      lines.push({ level: 'info', message: `${payload.previouslyCompleted} projects already processed` });
    }
    return lines;
  }

  if (event instanceof CollectionStartedEvent) {
    const { payload } = event;
    const origin = payload.source === 'local' ? 'on disk' : 'listed';
    return [
      {
        level: 'debug',
        message: `${payload.position} of ${payload.pendingTotal}: WGS project ${payload.collectionId} (${payload.fileCount} files ${origin})`,
      },
    ];
  }

  if (event instanceof AttemptFailedEvent) {
    const { payload } = event;
    const head = `PROBLEM! ${payload.operation} failed on attempt ${payload.attempt}/${payload.maxAttempts}: ${payload.errorMessage}`;
    return [
      {
        level: 'warn',
        message:
          payload.nextDelayMs === undefined
            ? `${head}. Exceeded number of attempts!`
            : `${head}. Retrying in ${formatSeconds(payload.nextDelayMs)}...`,
      },
    ];
  }

  if (event instanceof FileSkippedEvent) {
    return [{ level: 'debug', message: `[${event.payload.fileName} already downloaded]` }];
  }

  if (event instanceof FileRetrievedEvent) {
    const { payload } = event;
    return [
      {
        level: 'debug',
        message: `Retrieved ${payload.fileName} (${payload.sizeBytes} bytes in ${payload.attempts} attempt(s))`,
      },
    ];
  }

  if (event instanceof CollectionCompletedEvent) {
    const { payload } = event;
    let activity: string;
    if (payload.downloadOnly) activity = 'Just downloading';
    else if (payload.retrievedFiles === 0) activity = 'Skipping download. Parsing';
    else activity = 'Downloading and parsing';
    return [
      {
        level: 'info',
        message: `[${formatPercent(payload.progressRatio)}] ${payload.collectionId} OK! ${activity}...`,
      },
    ];
  }

  if (event instanceof RunCompletedEvent) {
    const { payload } = event;
    let message: string;
    if (event.nothingToDo) message = 'No projects to process! All done!';
    else if (payload.downloadOnly) message = 'All downloaded!';
    else message = `All OK! ${payload.processed} projects in ${payload.outputFileName ?? 'the output file'}`;
    return [{ level: 'info', message }];
  }

  if (event instanceof RunFailedEvent) {
    const { payload } = event;
    const lines: ProgressLine[] = [{ level: 'error', message: `FAILED! ${payload.errorMessage}` }];
    if (payload.resumable) {
      lines.push({ level: 'info', message: `NOTE: ${RESUME_HINT}` });
    }
    return lines;
  }

  return [];
}
