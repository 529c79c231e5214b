import { CrawlAbortedError } from '../../shared/errors';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type Clock = () => number;

/**
 * Suspend for `ms`, rejecting with `CrawlAbortedError` as soon as `signal`
 * aborts.
 */
export const waitFor: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });

export function abortReason(signal?: AbortSignal): CrawlAbortedError {
  const reason: unknown = signal?.reason;
  if (reason instanceof CrawlAbortedError) {
    return reason;
  }
  if (reason instanceof Error) {
    return new CrawlAbortedError(reason.message);
  }
  return new CrawlAbortedError();
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

/**
 * Settle `promise`, or reject with `CrawlAbortedError` if `signal` aborts
 * first. The underlying work is not cancelled.
 */
export function raceAbort<T>(
  promise: Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  if (!signal) {
    return promise;
  }
  throwIfAborted(signal);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Build full URL from a possibly relative href
 */
export function buildUrl(baseUrl: string, path: string): string {
  if (path.startsWith('http')) {
    return path;
  }
  const base = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  if (path.startsWith('/')) {
    return `${base}${path}`;
  }
  return `${base}/${path}`;
}

/**
 * Keep the first `limit` items; `limit` may be `Infinity`
 */
export function takeFirst<T>(items: readonly T[], limit: number): T[] {
  return Number.isFinite(limit) ? items.slice(0, limit) : [...items];
}
