import type { DescriptionStrategy, NextPageStrategy } from '../core/types';

/**
 * Absolute href of the first element matching `selector`
 */
export function createHrefStrategy(
  name: string,
  selector: string
): NextPageStrategy {
  return {
    name,
    extract: (session) =>
      session.evaluate((target) => {
        const element = document.querySelector(target);
        if (element instanceof HTMLAnchorElement && element.href) {
          return [element.href];
        }
        const href = element?.getAttribute('href');
        return href ? [new URL(href, document.baseURI).href] : [];
      }, selector),
  };
}

/**
 * Trimmed text of the first element matching `selector`, skipped when blank
 */
export function createTextStrategy(
  name: string,
  selector: string
): DescriptionStrategy {
  return {
    name,
    extract: (session) =>
      session.evaluate((target) => {
        const element = document.querySelector(target);
        const text = (element?.textContent ?? '').replace(/\s+/g, ' ').trim();
        return text ? [text] : [];
      }, selector),
  };
}

export function createNextPageStrategies(
  selectors: readonly string[]
): NextPageStrategy[] {
  return selectors.map((selector, index) =>
    createHrefStrategy(`next-page-${index + 1}`, selector)
  );
}

export function createDescriptionStrategies(
  selectors: readonly string[]
): DescriptionStrategy[] {
  return selectors.map((selector, index) =>
    createTextStrategy(`description-${index + 1}`, selector)
  );
}
