import { describe, it, expect } from 'vitest';
import { FetchRunEntity } from '../../../src/domain/entities/fetch-run.entity';
import { RunModeVO } from '../../../src/domain/value-objects/run-mode.vo';
import { TaxonSelectionVO } from '../../../src/domain/value-objects/taxon-selection.vo';

/**
 * FetchRunEntity: status transitions and progress accounting
 * Every operation returns a new instance and leaves the original untouched
 */
describe('FetchRunEntity', () => {
  const createTestRun = () =>
    FetchRunEntity.create({
      runId: 'run-123',
      selection: TaxonSelectionVO.create({ includeTaxid: '548681' }),
      mode: RunModeVO.create({ resume: true }),
      startedAt: new Date('2025-01-01T00:00:00.000Z'),
    });

  it('should start in the reconciling status with empty counters', () => {
    const run = createTestRun();

    expect(run.status).toBe('reconciling');
    expect(run.processed).toBe(0);
    expect(run.progressRatio()).toBe(0);
  });

  it('should reject an empty run id', () => {
    expect(() =>
      FetchRunEntity.create({
        runId: '  ',
        selection: TaxonSelectionVO.create({ includeTaxid: '9606' }),
        mode: RunModeVO.default(),
      }),
    ).toThrow('Run ID is required');
  });

  it('should count resumed collections as processed', () => {
    const run = createTestRun().withLedger(2).withDiscovery(5, 3);

    expect(run.status).toBe('fetching');
    expect(run.processed).toBe(2);
    expect(run.pendingTotal).toBe(3);
    expect(run.progressRatio()).toBe(0.4);

    const next = run.markCollectionCompleted();
    expect(next.processed).toBe(3);
    expect(next.progressRatio()).toBe(0.6);
    expect(run.processed).toBe(2);
  });

  it('should complete directly after discovery when nothing is pending', () => {
    const run = createTestRun().withLedger(3).withDiscovery(3, 0).markCompleted();

    expect(run.status).toBe('completed');
    expect(run.completedAt).toBeInstanceOf(Date);
  });

  it('should keep the failure message', () => {
    const run = createTestRun().withLedger(0).markFailed('Discovery failed after 6 attempts');

    expect(run.status).toBe('failed');
    expect(run.errorMessage).toBe('Discovery failed after 6 attempts');
  });

  describe('Invalid transitions', () => {
    it('should not load the ledger twice', () => {
      expect(() => createTestRun().withLedger(1).withLedger(1)).toThrow('Cannot load the ledger while discovering');
    });

    it('should not accept more pending than discovered collections', () => {
      expect(() => createTestRun().withLedger(0).withDiscovery(2, 3)).toThrow(
        'Pending collections cannot exceed discovered collections',
      );
    });

    it('should not complete a collection before discovery', () => {
      expect(() => createTestRun().withLedger(0).markCollectionCompleted()).toThrow(
        'Cannot complete a collection while discovering',
      );
    });
  });
});
