/**
 * Crawler Registry - Auto-registers all crawlers
 *
 * Import this file to register all available crawlers with the registry.
 */

import './airbnb';

// Re-export registry functions for convenience
export {
  createCrawler,
  getCrawlerDefinition,
  getRegisteredPlatforms,
  hasCrawler,
} from '../core';
