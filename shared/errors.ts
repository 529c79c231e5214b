// ================================================
// ERROR TAXONOMY
// ================================================

export class HarvestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The rendering session could not load a URL */
export class NavigationError extends HarvestError {
  readonly url: string;

  constructor(url: string, cause?: unknown) {
    super(`Navigation to ${url} failed`, { cause });
    this.url = url;
  }
}

/** A page function threw or returned something unusable */
export class EvaluationError extends HarvestError {}

/** `waitForVisible` gave up; callers treat this as non-fatal */
export class WaitTimeoutError extends HarvestError {
  readonly selector: string;

  constructor(selector: string, timeoutMs: number, cause?: unknown) {
    super(`Selector ${selector} not visible after ${timeoutMs}ms`, { cause });
    this.selector = selector;
  }
}

/** The entry page could not be loaded at all */
export class DiscoveryError extends HarvestError {}

export class AllAttemptsFailedError extends HarvestError {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    const detail =
      lastError instanceof Error ? lastError.message : String(lastError);
    super(`All ${attempts} attempts failed, last error: ${detail}`, {
      cause: lastError,
    });
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/** Raised at a suspension point once the run deadline expired or the run was cancelled */
export class CrawlAbortedError extends HarvestError {
  constructor(reason = 'Crawl aborted') {
    super(reason);
  }
}

export class SinkWriteError extends HarvestError {}

/** The whole run produced zero raw listings */
export class NoListingsError extends HarvestError {}

export class ConfigError extends HarvestError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export function isAbortError(error: unknown): error is CrawlAbortedError {
  return error instanceof CrawlAbortedError;
}
