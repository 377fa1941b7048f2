import { FetchRunEntity } from '../../../domain/entities/fetch-run.entity';
import { LedgerCleanupError } from '../../../domain/errors/pipeline.errors';
import { RunModeVO } from '../../../domain/value-objects/run-mode.vo';
import { TaxonSelectionVO } from '../../../domain/value-objects/taxon-selection.vo';

/**
 * Run Pipeline Command
 */
export interface RunPipelineCommand {
  selection: TaxonSelectionVO;
  mode: RunModeVO;
  /** Directory holding the archives, the ledger and the output file */
  workDir: string;
  /** Aborting stops the run at the next attempt boundary, wait or transfer chunk */
  signal?: AbortSignal;
  runId?: string;
}

/**
 * Run Pipeline Result
 */
export interface RunPipelineResult {
  run: FetchRunEntity;
  nothingToDo: boolean;
  outputPath?: string;
  /** Set when the run succeeded but the ledger could not be removed */
  cleanupError?: LedgerCleanupError;
}

/**
 * Run Pipeline Port (Driving Port / Use Case Interface)
 * Fetches, normalizes and merges every pending collection of a taxon selection
 */
export interface RunPipelinePort {
  /**
   * Execute the pipeline. Fatal conditions reject with a PipelineError.
   */
  execute(command: RunPipelineCommand): Promise<RunPipelineResult>;
}
