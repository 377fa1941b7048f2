/**
 * Pipeline error taxonomy.
 *
 * Every fatal condition of a run is one of these classes. The `exitCode` is the
 * process termination code scripting callers rely on, so the values must stay
 * distinct and stable.
 */
export enum ExitCode {
  SUCCESS = 0,
  LEDGER_WITHOUT_OUTPUT = 1,
  AMBIGUOUS_RESUME = 2,
  OUTPUT_WITHOUT_LEDGER = 3,
  CORRUPT_ARCHIVE = 4,
  RETRIES_EXHAUSTED = 5,
  LEDGER_CLEANUP_FAILED = 6,
  INTERRUPTED = 9,
  INVALID_ARGUMENTS = 64,
  INTERNAL_ERROR = 70,
}

export enum PipelineErrorKind {
  TRANSIENT = 'TRANSIENT',
  CORRUPTION = 'CORRUPTION',
  CONFIGURATION = 'CONFIGURATION',
  INTERRUPTED = 'INTERRUPTED',
  RETRIES_EXHAUSTED = 'RETRIES_EXHAUSTED',
  CLEANUP = 'CLEANUP',
  INVALID_ARGUMENTS = 'INVALID_ARGUMENTS',
}

export const RESUME_HINT = 'You can fix the issue and resume the process with the --resume flag.';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  abstract readonly exitCode: ExitCode;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  get retryable(): boolean {
    return this.kind === PipelineErrorKind.TRANSIENT;
  }

  /** Whether rerunning with --resume is a sensible next step. */
  get resumable(): boolean {
    return [
      PipelineErrorKind.CORRUPTION,
      PipelineErrorKind.INTERRUPTED,
      PipelineErrorKind.RETRIES_EXHAUSTED,
    ].includes(this.kind);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      exitCode: this.exitCode,
      message: this.message,
      ...(this.cause instanceof Error && { cause: this.cause.message }),
    };
  }
}

/**
 * Network or protocol fault while talking to the discovery service or the
 * archive. Retried by the RetryPolicy, never fatal on its own.
 */
export class TransientTransferError extends PipelineError {
  readonly kind = PipelineErrorKind.TRANSIENT;
  readonly exitCode = ExitCode.RETRIES_EXHAUSTED;

  constructor(
    message: string,
    public readonly operation: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class CorruptArchiveError extends PipelineError {
  readonly kind = PipelineErrorKind.CORRUPTION;
  readonly exitCode = ExitCode.CORRUPT_ARCHIVE;

  constructor(
    message: string,
    public readonly fileName: string,
    public readonly lineNumber?: number,
    options?: { cause?: unknown },
  ) {
    super(
      lineNumber === undefined ? `${message} (${fileName})` : `${message} (${fileName}, line ${lineNumber})`,
      options,
    );
  }
}

export class ConfigurationConflictError extends PipelineError {
  readonly kind = PipelineErrorKind.CONFIGURATION;

  constructor(
    message: string,
    public readonly exitCode: ExitCode.LEDGER_WITHOUT_OUTPUT | ExitCode.AMBIGUOUS_RESUME | ExitCode.OUTPUT_WITHOUT_LEDGER,
  ) {
    super(message);
  }
}

export class InterruptedError extends PipelineError {
  readonly kind = PipelineErrorKind.INTERRUPTED;
  readonly exitCode = ExitCode.INTERRUPTED;

  constructor(message = 'Interrupted by user', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class RetriesExhaustedError extends PipelineError {
  readonly kind = PipelineErrorKind.RETRIES_EXHAUSTED;
  readonly exitCode = ExitCode.RETRIES_EXHAUSTED;

  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(
      `${operation} failed after ${attempts} attempts: ${lastError instanceof Error ? lastError.message : String(lastError)}`,
      { cause: lastError },
    );
  }
}

export class LedgerCleanupError extends PipelineError {
  readonly kind = PipelineErrorKind.CLEANUP;
  readonly exitCode = ExitCode.LEDGER_CLEANUP_FAILED;

  constructor(
    public readonly ledgerPath: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to remove progress ledger ${ledgerPath}`, options);
  }
}

export class InvalidArgumentsError extends PipelineError {
  readonly kind = PipelineErrorKind.INVALID_ARGUMENTS;
  readonly exitCode = ExitCode.INVALID_ARGUMENTS;

  constructor(message: string) {
    super(message);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function exitCodeFor(error: unknown): ExitCode {
  return isPipelineError(error) ? error.exitCode : ExitCode.INTERNAL_ERROR;
}
