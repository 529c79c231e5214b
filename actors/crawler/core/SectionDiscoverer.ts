import { DiscoveryError, isAbortError } from '../../../shared/errors';
import { logger } from '../../../shared/logger';
import { raceAbort } from '../crawlerUtils';
import { runStrategyChain } from '../extractors';
import type { RateLimiter } from './RateLimiter';
import type { PageSession, Section, SectionStrategy } from './types';

const log = logger.child('discovery');

export interface SectionDiscovererOptions {
  platform: string;
  entryUrl: string;
  session: PageSession;
  rateLimiter: RateLimiter;
  strategies: readonly SectionStrategy[];
  fallbackSections: readonly Section[];
  settleMs: number;
  signal?: AbortSignal;
}

export class SectionDiscoverer {
  private readonly options: SectionDiscovererOptions;

  constructor(options: SectionDiscovererOptions) {
    this.options = options;
  }

  /**
   * Load the entry page and run the section strategy chain.
   *
   * Returns an empty list when the page loaded but nothing could be
   * extracted.
   *
   * @throws DiscoveryError when the entry page cannot be loaded
   */
  async discover(): Promise<Section[]> {
    const { session, entryUrl, signal } = this.options;

    log.info(`Loading entry page ${entryUrl}...`);
    try {
      await this.options.rateLimiter.wait(signal);
      await raceAbort(session.navigate(entryUrl), signal);
      await session.settle(this.options.settleMs);
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      throw new DiscoveryError(`Entry page could not be loaded: ${entryUrl}`, {
        cause: error,
      });
    }

    log.info('Entry page loaded, extracting sections...');

    let candidates: Array<{ name: string; url: string }> = [];
    try {
      const result = await raceAbort(
        runStrategyChain(this.options.strategies, session, {
          platform: this.options.platform,
          pageUrl: session.url(),
        }),
        signal
      );
      candidates = result.items;
      if (result.strategy) {
        log.info(`Sections found with strategy ${result.strategy}`);
      }
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      log.warn('Section extraction failed:', error);
    }

    const seen = new Set<string>();
    const sections: Section[] = [];
    for (const candidate of candidates) {
      const name = candidate.name.trim();
      const seedUrl = candidate.url.trim();
      if (!name || !seedUrl || seen.has(seedUrl)) {
        continue;
      }
      seen.add(seedUrl);
      sections.push({ name, seedUrl });
    }

    return sections;
  }

  /**
   * Discovered sections, or the static fallback list when discovery found
   * none. Load failures still propagate.
   */
  async resolveSections(): Promise<Section[]> {
    const sections = await this.discover();
    if (sections.length > 0) {
      return sections;
    }

    log.warn(
      `Discovery returned 0 sections, using ${this.options.fallbackSections.length} fallback sections`
    );
    return [...this.options.fallbackSections];
  }
}
