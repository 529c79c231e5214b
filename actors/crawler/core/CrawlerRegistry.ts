import { logger } from '../../../shared/logger';
import {
  MarketplaceCrawler,
  type MarketplaceCrawlerDeps,
} from './MarketplaceCrawler';
import {
  type CrawlerDefinition,
  type CrawlerOptions,
  getCrawlerOptions,
  getTestModeConfig,
} from './types';

// ================================================
// CRAWLER REGISTRY
// ================================================

const registry = new Map<string, CrawlerDefinition>();

/**
 * Register a platform definition
 */
export function registerCrawler(
  platform: string,
  definition: CrawlerDefinition
): void {
  if (registry.has(platform)) {
    logger.warn(`Crawler '${platform}' is already registered, overwriting...`);
  }
  registry.set(platform, definition);
  logger.debug(`Registered crawler: ${platform}`);
}

/**
 * Get a platform definition by name
 */
export function getCrawlerDefinition(
  platform: string
): CrawlerDefinition | null {
  return registry.get(platform) ?? null;
}

/**
 * Get all registered platforms
 */
export function getRegisteredPlatforms(): string[] {
  return Array.from(registry.keys());
}

/**
 * Check if a crawler is registered
 */
export function hasCrawler(platform: string): boolean {
  return registry.has(platform);
}

// ================================================
// CRAWLER CONSTRUCTION
// ================================================

export interface CreateCrawlerInput {
  deps: MarketplaceCrawlerDeps;
  /** Layered over the definition's own options */
  options?: Partial<CrawlerOptions>;
  /** Replaces the definition's entry page */
  entryUrl?: string;
}

/**
 * Build a crawler for a registered platform. Options resolve as
 * defaults, then the definition's options, then `input.options`; test mode
 * caps the result.
 */
export function createCrawler(
  platform: string,
  input: CreateCrawlerInput
): MarketplaceCrawler | null {
  const definition = registry.get(platform);
  if (!definition) {
    logger.error(`Crawler '${platform}' not found in registry`);
    return null;
  }

  const testMode = input.deps.testMode ?? getTestModeConfig();
  const options = getCrawlerOptions(
    { ...definition.options, ...input.options },
    testMode
  );
  const resolved: CrawlerDefinition = input.entryUrl
    ? {
        ...definition,
        config: { ...definition.config, entryUrl: input.entryUrl },
      }
    : definition;

  return new MarketplaceCrawler(resolved, options, {
    ...input.deps,
    testMode,
  });
}

// ================================================
// DEFINITION HELPER
// ================================================

/**
 * Define a crawler configuration (helper for type safety)
 */
export function defineCrawler(
  definition: CrawlerDefinition
): CrawlerDefinition {
  return definition;
}
