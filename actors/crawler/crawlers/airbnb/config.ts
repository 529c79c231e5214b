import { defineCrawler, type Section } from '../../core';
import { buildUrl } from '../../crawlerUtils';
import {
  createCardStrategies,
  createDescriptionStrategies,
  createNextPageStrategies,
  createSectionStrategies,
} from '../../extractors';

// ================================================
// SITE CONFIGURATION
// ================================================

export const AIRBNB_CONFIG = {
  platform: 'airbnb',
  name: 'Airbnb',
  baseUrl: 'https://www.airbnb.com',
} as const;

// ================================================
// SELECTORS
// ================================================

export const AIRBNB_SELECTORS = {
  sections: {
    container: 'section',
    heading: 'h2',
    link: 'a[href*="/s/"]',
    maxAncestorDepth: 4,
  },
  cards: {
    testId: '[data-testid="card-container"]',
    itemProp: '[itemprop="itemListElement"]',
    maxAncestorDepth: 5,
    fields: {
      title: [
        '[data-testid="listing-card-title"]',
        '[id^="title_"]',
        '[itemprop="name"]',
      ],
      priceLabel: '[aria-label*="per night"]',
      pricePrefix: '$',
      ratingLabel: '[aria-label*="out of 5"]',
      ratingPattern: '^[345]\\.\\d{1,2}$',
      link: 'a[href*="/rooms/"]',
      locationSeparator: ' in ',
    },
  },
  nextPage: [
    'a[aria-label="Next"]',
    '[data-testid="pagination-next-btn"]',
    'a[href*="items_offset"]',
  ],
  description: [
    '[data-section-id="DESCRIPTION_DEFAULT"] span',
    '[data-section-id="OVERVIEW_DEFAULT"] h1',
    'h1',
  ],
  cardReady: '[data-testid="card-container"]',
} as const;

// ================================================
// FALLBACK SECTIONS
// ================================================

const FALLBACK_DESTINATIONS: ReadonlyArray<[name: string, slug: string]> = [
  ['Bangkok', 'Bangkok--Thailand'],
  ['Kuala Lumpur', 'Kuala-Lumpur--Malaysia'],
  ['Tokyo', 'Tokyo--Japan'],
  ['Bali', 'Bali--Indonesia'],
  ['Seoul', 'Seoul--South-Korea'],
  ['Singapore', 'Singapore'],
  ['Paris', 'Paris--France'],
  ['New York', 'New-York--NY--United-States'],
  ['London', 'London--United-Kingdom'],
  ['Dubai', 'Dubai--United-Arab-Emirates'],
];

export const AIRBNB_FALLBACK_SECTIONS: readonly Section[] =
  FALLBACK_DESTINATIONS.map(([name, slug]) => ({
    name,
    seedUrl: buildUrl(AIRBNB_CONFIG.baseUrl, `/s/${slug}/homes`),
  }));

// ================================================
// CRAWLER DEFINITION
// ================================================

export const airbnbDefinition = defineCrawler({
  config: {
    platform: AIRBNB_CONFIG.platform,
    name: AIRBNB_CONFIG.name,
    entryUrl: AIRBNB_CONFIG.baseUrl,
  },
  selectors: {
    cardReady: AIRBNB_SELECTORS.cardReady,
  },
  strategies: {
    sections: createSectionStrategies(AIRBNB_SELECTORS.sections),
    cards: createCardStrategies({
      ...AIRBNB_SELECTORS.cards,
      fields: {
        ...AIRBNB_SELECTORS.cards.fields,
        title: [...AIRBNB_SELECTORS.cards.fields.title],
      },
    }),
    nextPage: createNextPageStrategies(AIRBNB_SELECTORS.nextPage),
    description: createDescriptionStrategies(AIRBNB_SELECTORS.description),
  },
  fallbackSections: AIRBNB_FALLBACK_SECTIONS,
});
