// @vitest-environment jsdom
import { beforeEach, describe, expect, it } from 'vitest';
import type { ExtractorContext } from '../core/types';
import { FakeSession, FakeSite } from '../test/fakeSite';
import {
  type CardFieldSelectors,
  createCardStrategies,
  createCardStrategy,
} from './cardStrategies';
import {
  createDescriptionStrategies,
  createHrefStrategy,
  createNextPageStrategies,
} from './linkStrategies';
import {
  createGenericLinkStrategy,
  createHeadingProximityStrategy,
  createSectionContainerStrategy,
  type SectionSelectors,
} from './sectionStrategies';

const FIELDS: CardFieldSelectors = {
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
};

const SECTIONS: SectionSelectors = {
  container: 'section',
  heading: 'h2',
  link: 'a[href*="/s/"]',
  maxAncestorDepth: 4,
};

const CONTEXT: ExtractorContext = {
  platform: 'Stays',
  pageUrl: 'https://stays.test/s/Tokyo/homes',
};

describe('page strategies', () => {
  let session: FakeSession;

  beforeEach(() => {
    session = new FakeSession(new FakeSite());
    document.body.innerHTML = '';
  });

  describe('cards', () => {
    it('should read labelled and plain-text card fields', async () => {
      document.body.innerHTML = `
        <div data-testid="card-container">
          <a href="https://stays.test/rooms/1">
            <div data-testid="listing-card-title">Condo in
              Bangkok</div>
          </a>
          <span aria-label="$142 total, $71 per night">$71</span>
          <span aria-label="4.82 out of 5 average rating">4.82 (120)</span>
        </div>
        <div data-testid="card-container">
          <a href="https://stays.test/rooms/2"></a>
          <div id="title_2">Loft near the river</div>
          <span>$95</span>
          <span>4.91</span>
        </div>
        <div data-testid="card-container"><span>Sponsored</span></div>
      `;
      const [byTestId] = createCardStrategies({
        testId: '[data-testid="card-container"]',
        itemProp: '[itemprop="itemListElement"]',
        maxAncestorDepth: 5,
        fields: FIELDS,
      });

      expect(byTestId.name).toBe('card-test-id');
      await expect(byTestId.extract(session, CONTEXT)).resolves.toEqual([
        {
          title: 'Condo in Bangkok',
          price: '$142 total, $71 per night',
          rating: '4.82 out of 5 average rating',
          url: 'https://stays.test/rooms/1',
          location: 'Bangkok',
        },
        {
          title: 'Loft near the river',
          price: '$95',
          rating: '4.91',
          url: 'https://stays.test/rooms/2',
          location: '',
        },
      ]);
    });

    it('should find cards around listing links', async () => {
      document.body.innerHTML = `
        <ul>
          <li><div>
            <a href="https://stays.test/rooms/7"><span itemprop="name">Cabin in Seoul</span></a>
            <span>$60</span>
          </div></li>
        </ul>
      `;
      const strategy = createCardStrategy(
        'card-link-ancestor',
        { kind: 'link-ancestor', link: FIELDS.link, maxDepth: 5 },
        FIELDS
      );

      await expect(strategy.extract(session, CONTEXT)).resolves.toEqual([
        {
          title: 'Cabin in Seoul',
          price: '$60',
          rating: '',
          url: 'https://stays.test/rooms/7',
          location: 'Seoul',
        },
      ]);
    });

    it('should order the card chain from most to least specific', () => {
      const names = createCardStrategies({
        testId: '[data-testid="card-container"]',
        itemProp: '[itemprop="itemListElement"]',
        maxAncestorDepth: 5,
        fields: FIELDS,
      }).map((strategy) => strategy.name);

      expect(names).toEqual([
        'card-test-id',
        'card-item-prop',
        'card-link-ancestor',
      ]);
    });
  });

  describe('sections', () => {
    it('should pair section headings with their links', async () => {
      document.body.innerHTML = `
        <section><h2>Popular homes in Tokyo</h2><a href="https://stays.test/s/Tokyo/homes">Show all</a></section>
        <section><h2>Beach stays</h2><a href="https://stays.test/s/Bali/homes">See more</a></section>
        <section><p>No heading</p><a href="https://stays.test/s/Oslo/homes">Oslo</a></section>
      `;

      await expect(
        createSectionContainerStrategy(SECTIONS).extract(session, CONTEXT)
      ).resolves.toEqual([
        { name: 'Popular homes in Tokyo', url: 'https://stays.test/s/Tokyo/homes' },
        { name: 'Beach stays', url: 'https://stays.test/s/Bali/homes' },
      ]);
    });

    it('should climb from a heading to a nearby link', async () => {
      document.body.innerHTML = `
        <div>
          <div><h2>Stays in Paris</h2></div>
          <div><a href="https://stays.test/s/Paris/homes">Go</a></div>
        </div>
      `;

      await expect(
        createHeadingProximityStrategy(SECTIONS).extract(session, CONTEXT)
      ).resolves.toEqual([
        { name: 'Stays in Paris', url: 'https://stays.test/s/Paris/homes' },
      ]);
    });

    it('should fall back to labelled section links', async () => {
      document.body.innerHTML = `
        <a href="https://stays.test/s/Rome/homes" aria-label="Rome"></a>
        <a href="https://stays.test/s/Rome/homes">Rome again</a>
      `;

      await expect(
        createGenericLinkStrategy(SECTIONS).extract(session, CONTEXT)
      ).resolves.toEqual([
        { name: 'Rome', url: 'https://stays.test/s/Rome/homes' },
      ]);
    });
  });

  describe('links and text', () => {
    it('should return the next page href', async () => {
      document.body.innerHTML = `
        <a aria-label="Next" href="https://stays.test/s/Tokyo/homes?items_offset=18">Next</a>
      `;
      const [byLabel, byTestId] = createNextPageStrategies([
        'a[aria-label="Next"]',
        '[data-testid="pagination-next-btn"]',
      ]);

      expect(byLabel.name).toBe('next-page-1');
      await expect(byLabel.extract(session, CONTEXT)).resolves.toEqual([
        'https://stays.test/s/Tokyo/homes?items_offset=18',
      ]);
      await expect(byTestId.extract(session, CONTEXT)).resolves.toEqual([]);
    });

    it('should read an href attribute from non-anchor elements', async () => {
      document.body.innerHTML = `
        <div data-testid="pagination-next-btn" href="https://stays.test/s/Tokyo/homes?page=2"></div>
      `;
      const strategy = createHrefStrategy(
        'next',
        '[data-testid="pagination-next-btn"]'
      );

      await expect(strategy.extract(session, CONTEXT)).resolves.toEqual([
        'https://stays.test/s/Tokyo/homes?page=2',
      ]);
    });

    it('should collapse whitespace in description text', async () => {
      document.body.innerHTML = `
        <div data-section-id="DESCRIPTION_DEFAULT"><span>  A bright
          loft.  </span></div>
        <h1>Loft near the river</h1>
      `;
      const [description, , heading] = createDescriptionStrategies([
        '[data-section-id="DESCRIPTION_DEFAULT"] span',
        '[data-section-id="OVERVIEW_DEFAULT"] h1',
        'h1',
      ]);

      await expect(description.extract(session, CONTEXT)).resolves.toEqual([
        'A bright loft.',
      ]);
      await expect(heading.extract(session, CONTEXT)).resolves.toEqual([
        'Loft near the river',
      ]);
    });
  });
});
