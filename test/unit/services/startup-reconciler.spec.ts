import { describe, it, expect } from 'vitest';
import { StartupState, reconcileStartup } from '../../../src/application/services/startup-reconciler';
import { RunModeVO, RunModeProps } from '../../../src/domain/value-objects/run-mode.vo';
import { ExitCode } from '../../../src/domain/errors/pipeline.errors';

describe('reconcileStartup', () => {
  const state = (overrides: Partial<Omit<StartupState, 'mode'>>, mode: RunModeProps = {}): StartupState => ({
    ledgerExists: false,
    ledgerEntries: 0,
    outputExists: false,
    mode: RunModeVO.create(mode),
    ...overrides,
  });

  const plan = (startup: StartupState) => reconcileStartup(startup, 'WGS4taxid548681.tmp', 'WGS4taxid548681.fa');

  it('should start fresh when nothing is on disk', () => {
    expect(plan(state({}))).toEqual({ kind: 'fresh', clearLedger: false, removeOutput: false });
  });

  describe('With a progress ledger', () => {
    it('should resume when asked to and the output exists', () => {
      expect(plan(state({ ledgerExists: true, ledgerEntries: 3, outputExists: true }, { resume: true }))).toEqual({
        kind: 'resume',
      });
    });

    it('should resume an empty ledger without output', () => {
      expect(plan(state({ ledgerExists: true, ledgerEntries: 0 }, { resume: true }))).toEqual({ kind: 'resume' });
    });

    it('should refuse to resume when the output is gone', () => {
      const result = plan(state({ ledgerExists: true, ledgerEntries: 2 }, { resume: true }));

      expect(result).toEqual({
        kind: 'conflict',
        exitCode: ExitCode.LEDGER_WITHOUT_OUTPUT,
        message:
          'Progress ledger WGS4taxid548681.tmp exists but not the corresponding FASTA file WGS4taxid548681.fa. ' +
          'Please correct this or run with the force flag.',
      });
    });

    it('should refuse to run without a mode flag', () => {
      const result = plan(state({ ledgerExists: true, ledgerEntries: 2, outputExists: true }));

      expect(result).toMatchObject({ kind: 'conflict', exitCode: ExitCode.AMBIGUOUS_RESUME });
    });

    it('should clear ledger and output when forced', () => {
      expect(plan(state({ ledgerExists: true, ledgerEntries: 2, outputExists: true }, { force: true }))).toEqual({
        kind: 'fresh',
        clearLedger: true,
        removeOutput: true,
      });
    });

    it('should keep using the ledger in download-only mode', () => {
      expect(plan(state({ ledgerExists: true, ledgerEntries: 2 }, { downloadOnly: true }))).toEqual({
        kind: 'resume',
      });
    });

    it('should let force win over download-only', () => {
      expect(plan(state({ ledgerExists: true, ledgerEntries: 2 }, { downloadOnly: true, force: true }))).toEqual({
        kind: 'fresh',
        clearLedger: true,
        removeOutput: false,
      });
    });
  });

  describe('With an output file and no ledger', () => {
    it('should refuse to overwrite it', () => {
      const result = plan(state({ outputExists: true }, { resume: true }));

      expect(result).toMatchObject({ kind: 'conflict', exitCode: ExitCode.OUTPUT_WITHOUT_LEDGER });
    });

    it('should remove it when forced', () => {
      expect(plan(state({ outputExists: true }, { force: true }))).toEqual({
        kind: 'fresh',
        clearLedger: false,
        removeOutput: true,
      });
    });
  });
});
