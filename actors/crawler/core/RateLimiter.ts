import { type Clock, type Sleep, throwIfAborted, waitFor } from '../crawlerUtils';

export interface RateLimiterOptions {
  sleep?: Sleep;
  now?: Clock;
}

/**
 * Global minimum interval between outbound fetches.
 *
 * Callers queue on a promise chain, so concurrent workers are served one at a
 * time and each `wait()` resolves at least `delayMs` after the previous one
 * resolved. The first call never blocks.
 */
export class RateLimiter {
  private readonly delayMs: number;
  private readonly sleep: Sleep;
  private readonly now: Clock;
  private lastCall: number | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(delayMs: number, options: RateLimiterOptions = {}) {
    this.delayMs = Math.max(0, delayMs);
    this.sleep = options.sleep ?? waitFor;
    this.now = options.now ?? Date.now;
  }

  wait(signal?: AbortSignal): Promise<void> {
    const turn = this.tail.then(async () => {
      throwIfAborted(signal);
      if (this.lastCall !== null) {
        const remaining = this.lastCall + this.delayMs - this.now();
        if (remaining > 0) {
          await this.sleep(remaining, signal);
        }
      }
      this.lastCall = this.now();
    });
    // An aborted waiter must not stall the ones queued behind it
    this.tail = turn.catch(() => undefined);
    return turn;
  }
}
