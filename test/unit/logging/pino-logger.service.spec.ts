import { describe, it, expect, beforeEach } from 'vitest';
import { CapturedLog, createTestLogger } from '../helpers/mock-factories';
import { PinoLoggerService } from '../../../src/shared/logging/pino-logger.service';

describe('PinoLoggerService', () => {
  let lines: CapturedLog[];
  let logger: PinoLoggerService;

  beforeEach(() => {
    lines = [];
    logger = createTestLogger(lines);
  });

  it('should write string messages with the current context', () => {
    logger.setContext('Pipeline');
    logger.log('started');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 30, msg: 'started', context: 'Pipeline' });
  });

  it('should merge structured fields', () => {
    logger.info({ collectionId: 'AAAA01', files: 2 }, 'Collection done');

    expect(lines[0]).toMatchObject({ level: 30, msg: 'Collection done', collectionId: 'AAAA01', files: 2 });
  });

  it('should map verbose to trace and keep the error trace', () => {
    logger.verbose('> NOOP');
    logger.error('failed', 'stack here');

    expect(lines.map((line) => line.level)).toEqual([10, 50]);
    expect(lines[1]).toMatchObject({ msg: 'failed', trace: 'stack here' });
  });

  it('should give forContext children their own context', () => {
    logger.setContext('Parent');
    const child = logger.forContext('Child');

    child.warn('from child');
    logger.warn('from parent');

    expect(lines.map((line) => line.context)).toEqual(['Child', 'Parent']);
  });

  it('should bind run and collection ids on children', () => {
    logger.withRunId('run-1').withCollectionId('BBBB02').debug('bound');

    expect(lines[0]).toMatchObject({ level: 20, msg: 'bound', runId: 'run-1', collectionId: 'BBBB02' });
  });
});
