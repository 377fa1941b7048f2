import { Inject, Injectable, Logger } from '@nestjs/common';
import { setTimeout as delay } from 'timers/promises';
import { RETRY_SCHEDULE, RETRY_SLEEPER } from '../ports/tokens';
import { RetryScheduleVO } from '../../domain/value-objects/retry-schedule.vo';
import {
  InterruptedError,
  PipelineError,
  RetriesExhaustedError,
  isPipelineError,
} from '../../domain/errors/pipeline.errors';

/**
 * Waits the given time; rejects when the signal aborts
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const timerSleeper: Sleeper = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface AttemptContext {
  attempt: number;
  maxAttempts: number;
}

export interface FailedAttempt extends AttemptContext {
  error: PipelineError;
  /** Undefined when no attempt is left */
  nextDelayMs?: number;
}

export interface RetryOptions {
  /** Human readable name used in logs and in the exhaustion error */
  operation: string;
  signal?: AbortSignal;
  /**
   * Runs after every transient failure, before the next wait. Used to drop
   * partial files and stale sessions.
   */
  onFailedAttempt?: (failure: FailedAttempt) => Promise<void> | void;
}

/**
 * Retry Policy Service
 * Runs an operation under a fixed escalating delay schedule
 *
 * - attempt n waits schedule[n] first (the first entry is normally 0)
 * - only retryable pipeline errors advance to the next attempt
 * - abort at any point becomes InterruptedError
 */
@Injectable()
export class RetryPolicyService {
  private readonly logger = new Logger(RetryPolicyService.name);

  constructor(
    @Inject(RETRY_SCHEDULE) private readonly schedule: RetryScheduleVO,
    @Inject(RETRY_SLEEPER) private readonly sleeper: Sleeper,
  ) {}

  get maxAttempts(): number {
    return this.schedule.attempts;
  }

  async execute<T>(task: (context: AttemptContext) => Promise<T>, options: RetryOptions): Promise<T> {
    const { operation, signal } = options;
    const maxAttempts = this.schedule.attempts;
    let lastError: PipelineError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const waitMs = this.schedule.delayBefore(attempt);
      this.throwIfAborted(signal);

      if (waitMs > 0) {
        this.logger.log(`Retrying ${operation} in ${waitMs / 1000} seconds (attempt ${attempt}/${maxAttempts})`);
        await this.wait(waitMs, signal);
      }

      try {
        return await task({ attempt, maxAttempts });
      } catch (error) {
        if (error instanceof InterruptedError) throw error;
        if (signal?.aborted) {
          throw new InterruptedError(undefined, { cause: error });
        }
        if (!isPipelineError(error) || !error.retryable) {
          throw error;
        }

        lastError = error;
        const nextDelayMs = attempt < maxAttempts ? this.schedule.delayBefore(attempt + 1) : undefined;
        this.logger.warn(`${operation} failed on attempt ${attempt}/${maxAttempts}: ${error.message}`);

        if (options.onFailedAttempt) {
          await options.onFailedAttempt({ attempt, maxAttempts, error, nextDelayMs });
        }
      }
    }

    throw new RetriesExhaustedError(operation, maxAttempts, lastError);
  }

  private async wait(ms: number, signal?: AbortSignal): Promise<void> {
    try {
      await this.sleeper(ms, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new InterruptedError(undefined, { cause: error });
      }
      throw error;
    }
    this.throwIfAborted(signal);
  }

  private throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new InterruptedError();
    }
  }
}
