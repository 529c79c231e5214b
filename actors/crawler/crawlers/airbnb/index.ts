import { registerCrawler } from '../../core';
import { AIRBNB_CONFIG, airbnbDefinition } from './config';

// Register the crawler
registerCrawler(AIRBNB_CONFIG.platform, airbnbDefinition);

// Export definition for reference
export {
  AIRBNB_CONFIG,
  AIRBNB_FALLBACK_SECTIONS,
  AIRBNB_SELECTORS,
  airbnbDefinition,
} from './config';
