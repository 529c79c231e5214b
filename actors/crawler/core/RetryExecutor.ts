import { AllAttemptsFailedError, isAbortError } from '../../../shared/errors';
import { logger } from '../../../shared/logger';
import { type Sleep, throwIfAborted, waitFor } from '../crawlerUtils';

const log = logger.child('retry');

export interface RetryExecutorOptions {
  /** Duration of one backoff unit; attempt `i` waits `i² × unit` */
  backoffUnitMs: number;
  sleep?: Sleep;
  signal?: AbortSignal;
}

export type RetryableOperation<T> = (attempt: number) => Promise<T>;

export class RetryExecutor {
  private readonly backoffUnitMs: number;
  private readonly sleep: Sleep;
  private readonly signal?: AbortSignal;

  constructor(options: RetryExecutorOptions) {
    this.backoffUnitMs = options.backoffUnitMs;
    this.sleep = options.sleep ?? waitFor;
    this.signal = options.signal;
  }

  /** Delay before 0-indexed `attempt`; attempt 0 never waits */
  static backoff(attempt: number, unitMs: number): number {
    return attempt * attempt * unitMs;
  }

  /**
   * Run `operation` up to `maxAttempts` times. Aborts are never retried.
   *
   * @throws AllAttemptsFailedError wrapping the last failure
   */
  async run<T>(
    maxAttempts: number,
    operation: RetryableOperation<T>
  ): Promise<T> {
    const attempts = Math.max(1, Math.floor(maxAttempts));
    let lastError: unknown;

    for (let attempt = 0; attempt < attempts; attempt++) {
      throwIfAborted(this.signal);

      if (attempt > 0) {
        const delay = RetryExecutor.backoff(attempt, this.backoffUnitMs);
        log.warn(
          `Retrying (attempt ${attempt + 1}/${attempts}) after ${delay}ms...`
        );
        await this.sleep(delay, this.signal);
      }

      try {
        return await operation(attempt);
      } catch (error) {
        if (isAbortError(error)) {
          throw error;
        }
        lastError = error;
        log.warn(`Attempt ${attempt + 1}/${attempts} failed:`, error);
      }
    }

    throw new AllAttemptsFailedError(attempts, lastError);
  }
}
