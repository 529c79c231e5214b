import { isAbortError } from '../../../shared/errors';
import type { RawListing } from '../../../shared/listing';
import { logger } from '../../../shared/logger';
import { raceAbort } from '../crawlerUtils';
import { runStrategyChain } from '../extractors';
import type { RateLimiter } from './RateLimiter';
import type { DescriptionStrategy, PageSession } from './types';

const log = logger.child('enricher');

export interface DetailEnricherOptions {
  platform: string;
  session: PageSession;
  rateLimiter: RateLimiter;
  strategies: readonly DescriptionStrategy[];
  settleMs: number;
  signal?: AbortSignal;
}

function sameText(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * Fills a missing description from the listing's own page.
 */
export class DetailEnricher {
  private readonly options: DetailEnricherOptions;

  constructor(options: DetailEnricherOptions) {
    this.options = options;
  }

  /**
   * Navigate to `listing.url` and set `listing.description`. A candidate
   * that echoes the title is ignored. Failures are logged and leave the
   * description empty; only a run abort propagates.
   */
  async enrich(listing: RawListing): Promise<void> {
    if (!listing.url) {
      return;
    }

    const { session, signal } = this.options;
    log.debug(`Enriching: ${listing.title}`, { url: listing.url });

    try {
      await this.options.rateLimiter.wait(signal);
      await raceAbort(session.navigate(listing.url), signal);
      await session.settle(this.options.settleMs);

      const { items } = await raceAbort(
        runStrategyChain(this.options.strategies, session, {
          platform: this.options.platform,
          pageUrl: listing.url,
        }),
        signal
      );

      const candidate = (items[0] ?? '').trim();
      if (candidate && !sameText(candidate, listing.title)) {
        listing.description = candidate;
      }
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      log.warn(`Enrich failed for '${listing.title}':`, error);
    }
  }
}
