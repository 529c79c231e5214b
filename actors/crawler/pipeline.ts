import { NoListingsError } from '../../shared/errors';
import { logger } from '../../shared/logger';
import { normalizeListings } from '../normalizer';
import {
  DEFAULT_TOP_RATED,
  generateInsights,
  type InsightReport,
  logInsightReport,
} from '../reporter';
import type { CleanSink, RawSink } from '../storage';
import type { CrawlRunResult } from './core';

const log = logger.child('pipeline');

// ================================================
// PIPELINE TYPES
// ================================================

export interface ListingCrawler {
  run(signal?: AbortSignal): Promise<CrawlRunResult>;
}

export interface PipelineDeps {
  crawler: ListingCrawler;
  rawSink: RawSink;
  cleanSink: CleanSink;
  topRated?: number;
  /** Receives the insights once computed; logs them by default */
  report?: (insights: InsightReport) => void;
}

export interface SectionSummary {
  section: string;
  status: CrawlRunResult['sections'][number]['status'];
  collected: number;
  quota: number;
  pages: number;
  reason?: string;
}

export interface PipelineSummary {
  platform: string;
  sections: SectionSummary[];
  rawCount: number;
  rawSaved: boolean;
  cleanCount: number;
  inserted: number;
  aborted: boolean;
  insights: InsightReport;
}

// ================================================
// PIPELINE
// ================================================

function summarizeSections(result: CrawlRunResult): SectionSummary[] {
  return result.sections.map((entry) => ({
    section: entry.section.name,
    status: entry.status,
    collected: entry.records.length,
    quota: entry.quota,
    pages: entry.pages,
    reason: entry.reason,
  }));
}

function logSectionSummary(platform: string, sections: SectionSummary[]) {
  log.info(`=== ${platform.toUpperCase()} CRAWL SUMMARY ===`);
  for (const entry of sections) {
    log.info(
      `  ${entry.section}: ${entry.collected}/${entry.quota} [${entry.status}]${entry.reason ? ` ${entry.reason}` : ''}`
    );
  }
}

/**
 * crawl → raw sink → normalize → clean sink → insights.
 *
 * @throws NoListingsError when the crawl produced nothing at all
 * @throws SinkWriteError when the clean sink fails
 */
export async function runPipeline(
  deps: PipelineDeps,
  signal?: AbortSignal
): Promise<PipelineSummary> {
  const result = await deps.crawler.run(signal);
  const sections = summarizeSections(result);
  logSectionSummary(result.platform, sections);

  if (result.aborted) {
    log.warn('Crawl was aborted, continuing with the listings collected');
  }

  if (result.listings.length === 0) {
    throw new NoListingsError(
      `No listings were collected from ${result.platform}`
    );
  }

  let rawSaved = false;
  try {
    await deps.rawSink.save(result.listings);
    rawSaved = true;
  } catch (error) {
    log.error(`Raw sink ${deps.rawSink.name} failed, continuing:`, error);
  }

  const clean = normalizeListings(result.listings);
  const inserted = await deps.cleanSink.save(clean);

  const insights = generateInsights(clean, deps.topRated ?? DEFAULT_TOP_RATED);
  (deps.report ?? logInsightReport)(insights);

  log.info(
    `✅ Pipeline complete: ${result.listings.length} raw, ${clean.length} clean, ${inserted} stored`
  );

  return {
    platform: result.platform,
    sections,
    rawCount: result.listings.length,
    rawSaved,
    cleanCount: clean.length,
    inserted,
    aborted: result.aborted,
    insights,
  };
}
