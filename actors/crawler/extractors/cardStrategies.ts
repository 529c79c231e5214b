import type { CardCandidate, CardStrategy } from '../core/types';

// ================================================
// CARD STRATEGY TYPES
// ================================================

export interface CardFieldSelectors {
  /** Title lookups, first existing element wins */
  title: string[];
  /** Element whose aria-label carries the price */
  priceLabel: string;
  /** Prefix of a span holding the price text */
  pricePrefix: string;
  /** Element whose aria-label carries the rating */
  ratingLabel: string;
  /** Regex source matched against span text when no rating label exists */
  ratingPattern: string;
  /** Link to the listing's own page */
  link: string;
  /** Title separator before the location ("Condo in Bangkok") */
  locationSeparator: string;
}

export type CardContainerLookup =
  | { kind: 'selector'; selector: string }
  | { kind: 'link-ancestor'; link: string; maxDepth: number };

interface CardPageArgs {
  container: CardContainerLookup;
  fields: CardFieldSelectors;
}

// Runs inside the browser: keep it self-contained.
const extractCardsInPage = ({ container, fields }: CardPageArgs) => {
  let containers: Element[] = [];

  if (container.kind === 'selector') {
    containers = Array.from(document.querySelectorAll(container.selector));
  } else {
    // Nearest ancestor holding exactly one listing link
    const seen = new Set<Element>();
    for (const anchor of Array.from(
      document.querySelectorAll(container.link)
    )) {
      let parent = anchor.parentElement;
      for (let depth = 0; depth < container.maxDepth && parent; depth++) {
        if (parent.querySelectorAll(container.link).length === 1) {
          if (!seen.has(parent)) {
            seen.add(parent);
            containers.push(parent);
          }
          break;
        }
        parent = parent.parentElement;
      }
    }
  }

  const ratingPattern = new RegExp(fields.ratingPattern);
  const cards: CardCandidate[] = [];

  for (const card of containers) {
    let title = '';
    for (const selector of fields.title) {
      const element = card.querySelector<HTMLElement>(selector);
      if (element) {
        title = (element.textContent ?? '').replace(/\s+/g, ' ').trim();
        break;
      }
    }

    const spans = Array.from(card.querySelectorAll<HTMLElement>('span'));

    let price =
      card.querySelector(fields.priceLabel)?.getAttribute('aria-label') ?? '';
    if (!price) {
      for (const span of spans) {
        const text = (span.textContent ?? '').replace(/\s+/g, ' ').trim();
        if (text.startsWith(fields.pricePrefix)) {
          price = text;
          break;
        }
      }
    }

    let rating =
      card.querySelector(fields.ratingLabel)?.getAttribute('aria-label') ?? '';
    if (!rating) {
      for (const span of spans) {
        const text = (span.textContent ?? '').replace(/\s+/g, ' ').trim();
        if (ratingPattern.test(text)) {
          rating = text;
          break;
        }
      }
    }

    const url = card.querySelector<HTMLAnchorElement>(fields.link)?.href ?? '';

    const separator = fields.locationSeparator;
    const location = title.includes(separator)
      ? title.split(separator).slice(1).join(separator)
      : '';

    if (title || url) {
      cards.push({ title, price, rating, url, location });
    }
  }

  return cards;
};

// ================================================
// STRATEGY FACTORIES
// ================================================

export function createCardStrategy(
  name: string,
  container: CardContainerLookup,
  fields: CardFieldSelectors
): CardStrategy {
  return {
    name,
    extract: (session) =>
      session.evaluate(extractCardsInPage, { container, fields }),
  };
}

export interface CardSelectors {
  /** Containers tagged for tests by the site itself */
  testId: string;
  /** Schema.org list items */
  itemProp: string;
  /** Max levels to climb from a listing link */
  maxAncestorDepth: number;
  fields: CardFieldSelectors;
}

export function createCardStrategies(selectors: CardSelectors): CardStrategy[] {
  const { fields } = selectors;
  return [
    createCardStrategy(
      'card-test-id',
      { kind: 'selector', selector: selectors.testId },
      fields
    ),
    createCardStrategy(
      'card-item-prop',
      { kind: 'selector', selector: selectors.itemProp },
      fields
    ),
    createCardStrategy(
      'card-link-ancestor',
      {
        kind: 'link-ancestor',
        link: fields.link,
        maxDepth: selectors.maxAncestorDepth,
      },
      fields
    ),
  ];
}
