import type { RawListing } from '../../../shared/listing';

// ================================================
// CRAWL DATA TYPES
// ================================================

/** A named, URL-addressable group of listings found on the entry page */
export interface Section {
  readonly name: string;
  readonly seedUrl: string;
}

export interface PageResult {
  records: RawListing[];
  nextUrl: string | null;
}

export type SectionStatus = 'done' | 'failed' | 'skipped';

export interface SectionResult {
  section: Section;
  status: SectionStatus;
  /** Listings kept for this section, never more than `quota` */
  records: RawListing[];
  quota: number;
  pages: number;
  reason?: string;
}

// ================================================
// RENDERING SESSION
// ================================================

export type PageFunction<Arg, Result> = (arg: Arg) => Result | Promise<Result>;

/**
 * One browser tab. Sessions are not reentrant: a worker owns its session
 * for the whole run.
 */
export interface PageSession {
  /** @throws NavigationError */
  navigate(url: string): Promise<void>;
  /** @throws EvaluationError */
  evaluate<Arg, Result>(
    fn: PageFunction<Arg, Result>,
    arg: Arg
  ): Promise<Result>;
  /** @throws WaitTimeoutError */
  waitForVisible(selector: string, timeoutMs: number): Promise<void>;
  /** Fixed wait for client-side rendering after a navigation */
  settle(ms: number): Promise<void>;
  url(): string;
  close(): Promise<void>;
}

export type SessionFactory = (signal?: AbortSignal) => Promise<PageSession>;

// ================================================
// EXTRACTOR TYPES
// ================================================

export interface ExtractorContext {
  platform: string;
  pageUrl: string;
  sectionName?: string;
}

export interface SectionCandidate {
  name: string;
  url: string;
}

export interface CardCandidate {
  title: string;
  price: string;
  rating: string;
  url: string;
  location: string;
}

export interface ExtractionStrategy<T> {
  readonly name: string;
  extract(session: PageSession, context: ExtractorContext): Promise<T[]>;
}

export type SectionStrategy = ExtractionStrategy<SectionCandidate>;
export type CardStrategy = ExtractionStrategy<CardCandidate>;
/** Yields at most one absolute URL */
export type NextPageStrategy = ExtractionStrategy<string>;
/** Yields at most one description candidate */
export type DescriptionStrategy = ExtractionStrategy<string>;

// ================================================
// CONFIGURATION TYPES
// ================================================

export interface PlatformConfig {
  /** Platform identifier (e.g., 'airbnb') */
  platform: string;
  /** Display name stored on every listing */
  name: string;
  /** Entry page used for section discovery */
  entryUrl: string;
}

export interface SelectorConfig {
  /** Selector awaited before extracting cards from a result page */
  cardReady: string;
}

export interface StrategyChains {
  sections: SectionStrategy[];
  cards: CardStrategy[];
  nextPage: NextPageStrategy[];
  description: DescriptionStrategy[];
}

export interface CrawlerOptions {
  /** Maximum listings kept per section */
  quota: number;
  /** Attempts per page fetch */
  maxRetries: number;
  /** One unit of the `attempt²` retry backoff */
  backoffUnitMs: number;
  /** Minimum interval between any two outbound fetches */
  rateLimitDelayMs: number;
  /** Section workers, each with its own session */
  maxConcurrency: number;
  /** Run-scoped deadline */
  crawlTimeoutMs: number;
  enrichDetails: boolean;
  entrySettleMs: number;
  pageSettleMs: number;
  detailSettleMs: number;
  cardWaitTimeoutMs: number;
  /** Browser launch options */
  launchOptions: {
    headless: boolean;
    args: string[];
  };
}

// ================================================
// CRAWLER DEFINITION
// ================================================

export interface CrawlerDefinition {
  /** Site configuration */
  config: PlatformConfig;
  /** CSS selectors used outside the strategy chains */
  selectors: SelectorConfig;
  /** Ordered extraction strategies, first non-empty result wins */
  strategies: StrategyChains;
  /** Used when discovery finds no sections on the entry page */
  fallbackSections: readonly Section[];
  /** Crawler options (optional, uses defaults if not provided) */
  options?: Partial<CrawlerOptions>;
}

// ================================================
// TEST MODE CONFIGURATION
// ================================================

export interface TestModeConfig {
  enabled: boolean;
  maxListings: number;
  maxSections: number;
}

export function getTestModeConfig(): TestModeConfig {
  const isTestMode = process.env.CRAWLER_TEST_MODE === 'true';
  return {
    enabled: isTestMode,
    maxListings: isTestMode
      ? Number.parseInt(process.env.CRAWLER_MAX_LISTINGS || '3', 10)
      : Number.POSITIVE_INFINITY,
    maxSections: isTestMode ? 1 : Number.POSITIVE_INFINITY,
  };
}

// ================================================
// DEFAULT CRAWLER OPTIONS
// ================================================

export const DEFAULT_CRAWLER_OPTIONS: CrawlerOptions = {
  quota: 5,
  maxRetries: 3,
  backoffUnitMs: 1000,
  rateLimitDelayMs: 2000,
  maxConcurrency: 1,
  crawlTimeoutMs: 30 * 60 * 1000,
  enrichDetails: true,
  entrySettleMs: 6000,
  pageSettleMs: 5000,
  detailSettleMs: 3000,
  cardWaitTimeoutMs: 10_000,
  launchOptions: {
    headless: true,
    args: [
      '--no-sandbox',
      '--disable-setuid-sandbox',
      '--disable-dev-shm-usage',
      '--disable-blink-features=AutomationControlled',
    ],
  },
};

export function getCrawlerOptions(
  customOptions?: Partial<CrawlerOptions>,
  testMode?: TestModeConfig
): CrawlerOptions {
  const base = { ...DEFAULT_CRAWLER_OPTIONS, ...customOptions };

  if (testMode?.enabled) {
    return {
      ...base,
      quota: Math.min(base.quota, testMode.maxListings),
      maxConcurrency: 1,
    };
  }

  return base;
}
