import { describe, it, expect, beforeEach } from 'vitest';
import { ConsoleProgressReporterAdapter } from '../../../src/infrastructure/adapters/events/console-progress-reporter.adapter';
import { FileSkippedEvent, RunFailedEvent, RunStartedEvent } from '../../../src/domain/events';
import { CapturedLog, createTestLogger } from '../helpers/mock-factories';

describe('ConsoleProgressReporterAdapter', () => {
  let logs: CapturedLog[];
  let reporter: ConsoleProgressReporterAdapter;

  beforeEach(() => {
    logs = [];
    reporter = new ConsoleProgressReporterAdapter(createTestLogger(logs));
  });

  it('should log every line of an event at its level', async () => {
    const event = new RunFailedEvent({
      runId: 'run-1',
      kind: 'INTERRUPTED',
      exitCode: 9,
      errorMessage: 'Interrupted by user',
      resumable: true,
    });

    await reporter.publish(event);

    expect(logs.map(({ level, msg, context, event: name }) => ({ level, msg, context, name }))).toEqual([
      { level: 50, msg: 'FAILED! Interrupted by user', context: 'Progress', name: 'run.failed' },
      {
        level: 30,
        msg: 'NOTE: You can fix the issue and resume the process with the --resume flag.',
        context: 'Progress',
        name: 'run.failed',
      },
    ]);
    expect(logs[0].eventId).toBe(event.eventId);
  });

  it('should log skipped files at debug level', async () => {
    await reporter.publish(new FileSkippedEvent({ collectionId: 'AAAA01', fileName: 'AAAA01.1.fsa_nt.gz' }));

    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({ level: 20, msg: '[AAAA01.1.fsa_nt.gz already downloaded]' });
  });

  it('should tag lines with the run id once the run has started', async () => {
    await reporter.publish(
      new RunStartedEvent({
        runId: 'run-7',
        selection: 'taxid 548681',
        outputFileName: 'WGS4taxid548681.fa',
        downloadOnly: false,
        force: false,
        resume: false,
        reverse: false,
        localArchives: 0,
        previouslyCompleted: 0,
      }),
    );
    await reporter.publish(new FileSkippedEvent({ collectionId: 'BBBB01', fileName: 'BBBB01.1.fsa_nt.gz' }));

    expect(logs.map(({ msg, runId, collectionId }) => ({ msg, runId, collectionId }))).toEqual([
      { msg: 'Collecting WGS projects for taxid 548681 into WGS4taxid548681.fa', runId: 'run-7', collectionId: undefined },
      { msg: '[BBBB01.1.fsa_nt.gz already downloaded]', runId: 'run-7', collectionId: 'BBBB01' },
    ]);
  });
});
