import { isAbortError, WaitTimeoutError } from '../../../shared/errors';
import { listingFingerprint, type RawListing } from '../../../shared/listing';
import { logger } from '../../../shared/logger';
import { type Clock, raceAbort } from '../crawlerUtils';
import { runStrategyChain } from '../extractors';
import type { Deduplicator } from './Deduplicator';
import type { DetailEnricher } from './DetailEnricher';
import type { RateLimiter } from './RateLimiter';
import type { RetryExecutor } from './RetryExecutor';
import type {
  CardStrategy,
  NextPageStrategy,
  PageResult,
  PageSession,
  Section,
  SectionResult,
} from './types';

const log = logger.child('section-crawler');

export interface SectionCrawlerOptions {
  platform: string;
  quota: number;
  maxRetries: number;
  pageSettleMs: number;
  cardReadySelector: string;
  cardWaitTimeoutMs: number;
  session: PageSession;
  rateLimiter: RateLimiter;
  retry: RetryExecutor;
  deduplicator: Deduplicator;
  cardStrategies: readonly CardStrategy[];
  nextPageStrategies: readonly NextPageStrategy[];
  /** Omit to skip detail enrichment */
  enricher?: DetailEnricher;
  signal?: AbortSignal;
  now?: Clock;
}

/**
 * Pagination state machine for one section:
 * fetch → extract → filter → enrich → (next page | done | failed).
 * A next-page link back to a page already fetched ends the section.
 *
 * A section never fails the run. Listings kept before a failure stay in the
 * result.
 */
export class SectionCrawler {
  private readonly options: SectionCrawlerOptions;
  private readonly now: Clock;

  constructor(options: SectionCrawlerOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  async crawl(section: Section): Promise<SectionResult> {
    const { quota, rateLimiter, signal } = this.options;
    const collected: RawListing[] = [];
    const visited = new Set<string>();
    let currentUrl = section.seedUrl;
    let page = 1;

    const finish = (
      status: SectionResult['status'],
      reason?: string
    ): SectionResult => ({
      section,
      status,
      records: collected,
      quota,
      pages: page,
      reason,
    });

    log.info(`Scraping: ${section.name}`);

    try {
      if (quota <= 0) {
        return finish('done');
      }

      await rateLimiter.wait(signal);

      while (collected.length < quota) {
        log.info(
          `[${section.name}] page ${page} (have ${collected.length}/${quota})...`
        );

        visited.add(currentUrl);
        const result = await this.options.retry.run(
          this.options.maxRetries,
          () => this.fetchPage(currentUrl, section)
        );

        if (result.records.length === 0) {
          log.warn(`[${section.name}] No listings on page ${page}`);
          return finish('failed', `no listings on page ${page}`);
        }

        await this.keepNewListings(result.records, collected);

        if (collected.length >= quota || !result.nextUrl) {
          break;
        }

        if (visited.has(result.nextUrl)) {
          log.info(
            `[${section.name}] next page ${result.nextUrl} already visited, stopping`
          );
          break;
        }

        currentUrl = result.nextUrl;
        page++;
        await rateLimiter.wait(signal);
      }

      return finish('done');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      if (isAbortError(error)) {
        log.warn(`[${section.name}] aborted on page ${page}: ${reason}`);
      } else {
        log.error(`[${section.name}] page ${page} failed:`, error);
      }
      return finish('failed', reason);
    }
  }

  /**
   * Filter candidates in page order against the quota and the shared
   * deduplicator, enriching each kept listing as it is accepted.
   */
  private async keepNewListings(
    candidates: readonly RawListing[],
    collected: RawListing[]
  ): Promise<void> {
    const { quota, deduplicator, enricher } = this.options;

    for (const listing of candidates) {
      if (collected.length >= quota) {
        return;
      }
      if (!deduplicator.add(listingFingerprint(listing))) {
        log.debug(`Skipping duplicate: ${listing.title}`, { url: listing.url });
        continue;
      }

      if (enricher && !listing.description && listing.url) {
        await enricher.enrich(listing);
      }
      collected.push(listing);
    }
  }

  /**
   * One fetch attempt: load, wait for cards, extract them and find the next
   * page link.
   */
  private async fetchPage(url: string, section: Section): Promise<PageResult> {
    const { session, signal, platform } = this.options;

    await raceAbort(session.navigate(url), signal);
    await session.settle(this.options.pageSettleMs);

    try {
      await raceAbort(
        session.waitForVisible(
          this.options.cardReadySelector,
          this.options.cardWaitTimeoutMs
        ),
        signal
      );
    } catch (error) {
      if (!(error instanceof WaitTimeoutError)) {
        throw error;
      }
      log.debug(`Cards not visible yet on ${url}, extracting anyway`);
    }

    const context = { platform, pageUrl: url, sectionName: section.name };
    const { items: cards } = await raceAbort(
      runStrategyChain(this.options.cardStrategies, session, context),
      signal
    );

    const fetchedAt = new Date(this.now());
    const records = cards
      .filter((card) => card.title.trim() || card.url.trim())
      .map<RawListing>((card) => ({
        platform,
        title: card.title,
        rawPrice: card.price,
        location: card.location || section.name,
        rawRating: card.rating,
        url: card.url,
        description: '',
        fetchedAt,
      }));

    let nextUrl: string | null = null;
    try {
      const { items } = await raceAbort(
        runStrategyChain(this.options.nextPageStrategies, session, context),
        signal
      );
      nextUrl = items[0] || null;
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      log.debug(`Next page lookup failed on ${url}: ${String(error)}`);
    }

    return { records, nextUrl };
  }
}
