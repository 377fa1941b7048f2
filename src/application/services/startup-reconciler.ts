import { RunModeVO } from '../../domain/value-objects/run-mode.vo';
import { ExitCode } from '../../domain/errors/pipeline.errors';

/**
 * What is on disk before a run touches the network
 */
export interface StartupState {
  ledgerExists: boolean;
  /** Entries in the ledger; 0 when it does not exist */
  ledgerEntries: number;
  outputExists: boolean;
  mode: RunModeVO;
}

export type StartupPlan =
  | { kind: 'fresh'; clearLedger: boolean; removeOutput: boolean }
  | { kind: 'resume' }
  | {
      kind: 'conflict';
      exitCode: ExitCode.LEDGER_WITHOUT_OUTPUT | ExitCode.AMBIGUOUS_RESUME | ExitCode.OUTPUT_WITHOUT_LEDGER;
      message: string;
    };

/**
 * Decide how a run treats the ledger and output left by a previous one.
 *
 * A ledger wins over the output file: force clears both, download-only and
 * resume reuse the ledger, anything else is ambiguous. Without a ledger an
 * existing output can only be replaced by force.
 */
export function reconcileStartup(state: StartupState, ledgerName: string, outputName: string): StartupPlan {
  const { mode } = state;

  if (state.ledgerExists) {
    if (mode.force) {
      return { kind: 'fresh', clearLedger: true, removeOutput: state.outputExists };
    }
    if (mode.downloadOnly) {
      return { kind: 'resume' };
    }
    if (mode.resume) {
      if (state.ledgerEntries > 0 && !state.outputExists) {
        return {
          kind: 'conflict',
          exitCode: ExitCode.LEDGER_WITHOUT_OUTPUT,
          message:
            `Progress ledger ${ledgerName} exists but not the corresponding FASTA file ${outputName}. ` +
            'Please correct this or run with the force flag.',
        };
      }
      return { kind: 'resume' };
    }
    return {
      kind: 'conflict',
      exitCode: ExitCode.AMBIGUOUS_RESUME,
      message:
        `Progress ledger ${ledgerName} exists but the resume flag is not set. ` +
        'Please correct this or run with the download, resume or force flag.',
    };
  }

  if (state.outputExists) {
    if (mode.force) {
      return { kind: 'fresh', clearLedger: false, removeOutput: true };
    }
    return {
      kind: 'conflict',
      exitCode: ExitCode.OUTPUT_WITHOUT_LEDGER,
      message:
        `FASTA file ${outputName} exists but its progress ledger is missing. ` +
        'Please correct this or run with the force flag.',
    };
  }

  return { kind: 'fresh', clearLedger: false, removeOutput: false };
}
