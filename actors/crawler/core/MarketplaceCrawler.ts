import { CrawlAbortedError } from '../../../shared/errors';
import type { RawListing } from '../../../shared/listing';
import { logger } from '../../../shared/logger';
import { type Clock, type Sleep, takeFirst, waitFor } from '../crawlerUtils';
import { Deduplicator } from './Deduplicator';
import { DetailEnricher } from './DetailEnricher';
import { RateLimiter } from './RateLimiter';
import { RetryExecutor } from './RetryExecutor';
import { SectionCrawler } from './SectionCrawler';
import { SectionDiscoverer } from './SectionDiscoverer';
import {
  type CrawlerDefinition,
  type CrawlerOptions,
  getTestModeConfig,
  type PageSession,
  type Section,
  type SectionResult,
  type SessionFactory,
  type TestModeConfig,
} from './types';

const log = logger.child('crawler');

export interface MarketplaceCrawlerDeps {
  openSession: SessionFactory;
  sleep?: Sleep;
  now?: Clock;
  testMode?: TestModeConfig;
}

export interface CrawlRunResult {
  platform: string;
  sections: SectionResult[];
  /** Kept listings of every section, in section order */
  listings: RawListing[];
  /** Run deadline expired or the caller cancelled */
  aborted: boolean;
}

interface SharedResources {
  rateLimiter: RateLimiter;
  deduplicator: Deduplicator;
  signal: AbortSignal;
}

/**
 * Runs discovery and then every section of one platform, sharing a single
 * rate limiter and deduplicator across all fetch sites.
 *
 * With `maxConcurrency` 1 (the default) sections run one at a time on one
 * session. Higher values start that many workers, each on its own session.
 */
export class MarketplaceCrawler {
  protected readonly definition: CrawlerDefinition;
  protected readonly options: CrawlerOptions;
  private readonly deps: MarketplaceCrawlerDeps;
  private readonly testMode: TestModeConfig;

  constructor(
    definition: CrawlerDefinition,
    options: CrawlerOptions,
    deps: MarketplaceCrawlerDeps
  ) {
    this.definition = definition;
    this.options = options;
    this.deps = deps;
    this.testMode = deps.testMode ?? getTestModeConfig();
  }

  protected get platform(): string {
    return this.definition.config.name;
  }

  /**
   * Crawl every section. Resolves with partial results when the deadline
   * expires; rejects only when discovery cannot load the entry page.
   */
  async run(signal?: AbortSignal): Promise<CrawlRunResult> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      forwardAbort();
    }
    signal?.addEventListener('abort', forwardAbort, { once: true });

    const { crawlTimeoutMs } = this.options;
    const deadline = setTimeout(() => {
      controller.abort(
        new CrawlAbortedError(`Crawl deadline of ${crawlTimeoutMs}ms exceeded`)
      );
    }, crawlTimeoutMs);

    try {
      log.info(`🚀 Starting ${this.platform} crawler`);
      const result = await this.crawlAll(controller.signal);
      log.info(
        `✅ ${this.platform} crawl complete. Total raw listings: ${result.listings.length}`
      );
      return result;
    } finally {
      clearTimeout(deadline);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private async crawlAll(signal: AbortSignal): Promise<CrawlRunResult> {
    const resources: SharedResources = {
      rateLimiter: new RateLimiter(this.options.rateLimitDelayMs, {
        sleep: this.deps.sleep,
        now: this.deps.now,
      }),
      deduplicator: new Deduplicator(),
      signal,
    };

    const primary = await this.deps.openSession(signal);
    const sessions: PageSession[] = [primary];

    try {
      const discoverer = new SectionDiscoverer({
        platform: this.platform,
        entryUrl: this.definition.config.entryUrl,
        session: primary,
        rateLimiter: resources.rateLimiter,
        strategies: this.definition.strategies.sections,
        fallbackSections: this.definition.fallbackSections,
        settleMs: this.options.entrySettleMs,
        signal,
      });

      const discovered = await discoverer.resolveSections();
      const sections = takeFirst(discovered, this.testMode.maxSections);
      if (sections.length < discovered.length) {
        log.info(`🧪 Test mode: limiting sections to ${sections.length}`);
      }

      log.info(`Scraping ${sections.length} sections...`);
      sections.forEach((section, index) => {
        log.info(`  [${index + 1}] ${section.name}`);
      });

      const results = await this.crawlSections(
        sections,
        primary,
        sessions,
        resources
      );

      const listings: RawListing[] = [];
      for (const result of results) {
        listings.push(...result.records);
      }

      return {
        platform: this.platform,
        sections: results,
        listings,
        aborted: signal.aborted,
      };
    } finally {
      await Promise.all(sessions.map((session) => this.closeSession(session)));
    }
  }

  private async crawlSections(
    sections: readonly Section[],
    primary: PageSession,
    sessions: PageSession[],
    resources: SharedResources
  ): Promise<SectionResult[]> {
    const results = new Map<number, SectionResult>();
    const workerCount = Math.max(
      1,
      Math.min(this.options.maxConcurrency, sections.length)
    );
    let next = 0;
    let total = 0;

    const work = async (session: PageSession) => {
      const crawler = this.createSectionCrawler(session, resources);
      while (next < sections.length) {
        const index = next++;
        const section = sections[index];

        if (resources.signal.aborted) {
          results.set(index, this.skipped(section));
          continue;
        }

        const result = await crawler.crawl(section);
        results.set(index, result);
        total += result.records.length;

        const outcome = result.status === 'done' ? 'done' : 'failed';
        log.info(
          `Section '${section.name}' ${outcome}: ${result.records.length}/${result.quota} listings (total: ${total})${result.reason ? ` - ${result.reason}` : ''}`
        );
      }
    };

    const workers: Promise<void>[] = [work(primary)];
    for (let i = 1; i < workerCount; i++) {
      workers.push(
        this.deps.openSession(resources.signal).then(
          (session) => {
            sessions.push(session);
            return work(session);
          },
          (error: unknown) => {
            log.error(`Worker ${i + 1} could not open a session:`, error);
          }
        )
      );
    }
    await Promise.all(workers);

    return sections.map(
      (section, index) => results.get(index) ?? this.skipped(section)
    );
  }

  private createSectionCrawler(
    session: PageSession,
    { rateLimiter, deduplicator, signal }: SharedResources
  ): SectionCrawler {
    const { options, definition } = this;

    const enricher = options.enrichDetails
      ? new DetailEnricher({
          platform: this.platform,
          session,
          rateLimiter,
          strategies: definition.strategies.description,
          settleMs: options.detailSettleMs,
          signal,
        })
      : undefined;

    return new SectionCrawler({
      platform: this.platform,
      quota: options.quota,
      maxRetries: options.maxRetries,
      pageSettleMs: options.pageSettleMs,
      cardReadySelector: definition.selectors.cardReady,
      cardWaitTimeoutMs: options.cardWaitTimeoutMs,
      session,
      rateLimiter,
      retry: new RetryExecutor({
        backoffUnitMs: options.backoffUnitMs,
        sleep: this.deps.sleep ?? waitFor,
        signal,
      }),
      deduplicator,
      cardStrategies: definition.strategies.cards,
      nextPageStrategies: definition.strategies.nextPage,
      enricher,
      signal,
      now: this.deps.now,
    });
  }

  private skipped(section: Section): SectionResult {
    log.warn(`Section '${section.name}' skipped: crawl aborted`);
    return {
      section,
      status: 'skipped',
      records: [],
      quota: this.options.quota,
      pages: 0,
      reason: 'crawl aborted before start',
    };
  }

  private async closeSession(session: PageSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      log.warn('Failed to close browser session:', error);
    }
  }
}
