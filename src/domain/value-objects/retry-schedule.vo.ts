/**
 * Retry Schedule Value Object
 *
 * Ordered delays applied before each attempt of a retryable operation. The
 * number of entries is the number of attempts; the first entry is normally 0
 * so the first attempt starts immediately.
 */
export class RetryScheduleVO {
  static readonly DEFAULT_SECONDS: readonly number[] = [0, 5, 15, 30, 60, 120];

  private constructor(private readonly _delaysMs: readonly number[]) {}

  static fromMilliseconds(delaysMs: readonly number[]): RetryScheduleVO {
    if (delaysMs.length === 0) {
      throw new Error('Retry schedule needs at least one attempt');
    }
    for (const delay of delaysMs) {
      if (!Number.isFinite(delay) || delay < 0) {
        throw new Error(`Invalid retry delay: ${delay}`);
      }
    }
    return new RetryScheduleVO(Object.freeze([...delaysMs]));
  }

  static fromSeconds(delaysSeconds: readonly number[]): RetryScheduleVO {
    return RetryScheduleVO.fromMilliseconds(delaysSeconds.map((seconds) => seconds * 1000));
  }

  static default(): RetryScheduleVO {
    return RetryScheduleVO.fromSeconds(RetryScheduleVO.DEFAULT_SECONDS);
  }

  get attempts(): number {
    return this._delaysMs.length;
  }

  get delaysMs(): readonly number[] {
    return this._delaysMs;
  }

  /** Delay before the given 1-based attempt */
  delayBefore(attempt: number): number {
    const delay = this._delaysMs[attempt - 1];
    if (delay === undefined) {
      throw new Error(`Attempt ${attempt} is outside a schedule of ${this.attempts} attempts`);
    }
    return delay;
  }

  toString(): string {
    return this._delaysMs.map((ms) => `${ms / 1000}s`).join(', ');
  }
}
