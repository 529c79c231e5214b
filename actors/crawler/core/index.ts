// Core types and interfaces

// Registry
export {
  type CreateCrawlerInput,
  createCrawler,
  defineCrawler,
  getCrawlerDefinition,
  getRegisteredPlatforms,
  hasCrawler,
  registerCrawler,
} from './CrawlerRegistry';
// Crawl components
export { Deduplicator } from './Deduplicator';
export { DetailEnricher, type DetailEnricherOptions } from './DetailEnricher';
export {
  type CrawlRunResult,
  MarketplaceCrawler,
  type MarketplaceCrawlerDeps,
} from './MarketplaceCrawler';
export { PlaywrightBrowser, PlaywrightSession } from './PlaywrightSession';
export { RateLimiter, type RateLimiterOptions } from './RateLimiter';
export { RetryExecutor, type RetryExecutorOptions } from './RetryExecutor';
export { SectionCrawler, type SectionCrawlerOptions } from './SectionCrawler';
export {
  SectionDiscoverer,
  type SectionDiscovererOptions,
} from './SectionDiscoverer';
export * from './types';
