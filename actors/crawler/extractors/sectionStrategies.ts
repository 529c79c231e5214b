import type { SectionCandidate, SectionStrategy } from '../core/types';

// ================================================
// SECTION STRATEGY SELECTORS
// ================================================

export interface SectionSelectors {
  /** Structural block holding one section (e.g. `section`) */
  container: string;
  /** Heading that names the section */
  heading: string;
  /** Link into the section's result pages */
  link: string;
  /** How far up from a heading to look for a section link */
  maxAncestorDepth: number;
}

// Page functions below run inside the browser: keep them self-contained.

/**
 * A structural block with both a heading and a section link
 */
export function createSectionContainerStrategy(
  selectors: SectionSelectors
): SectionStrategy {
  return {
    name: 'section-container',
    extract: (session) =>
      session.evaluate(({ container, heading, link }) => {
        const results: SectionCandidate[] = [];
        const seen = new Set<string>();
        for (const block of Array.from(document.querySelectorAll(container))) {
          const title = block.querySelector<HTMLElement>(heading);
          const anchor = block.querySelector<HTMLAnchorElement>(link);
          if (title && anchor && !seen.has(anchor.href)) {
            seen.add(anchor.href);
            const name = (title.textContent ?? '').replace(/\s+/g, ' ').trim();
            results.push({ name, url: anchor.href });
          }
        }
        return results;
      }, selectors),
  };
}

/**
 * A heading whose nearby ancestor contains a section link
 */
export function createHeadingProximityStrategy(
  selectors: SectionSelectors
): SectionStrategy {
  return {
    name: 'heading-proximity',
    extract: (session) =>
      session.evaluate(({ heading, link, maxAncestorDepth }) => {
        const results: SectionCandidate[] = [];
        const seen = new Set<string>();
        const headings = document.querySelectorAll<HTMLElement>(heading);
        for (const title of Array.from(headings)) {
          const name = (title.textContent ?? '').replace(/\s+/g, ' ').trim();
          if (!name) {
            continue;
          }
          let parent = title.parentElement;
          for (let depth = 0; depth < maxAncestorDepth && parent; depth++) {
            const anchor = parent.querySelector<HTMLAnchorElement>(link);
            if (anchor && !seen.has(anchor.href)) {
              seen.add(anchor.href);
              results.push({ name, url: anchor.href });
              break;
            }
            parent = parent.parentElement;
          }
        }
        return results;
      }, selectors),
  };
}

/**
 * Every section link carrying visible text or an aria-label
 */
export function createGenericLinkStrategy(
  selectors: SectionSelectors
): SectionStrategy {
  return {
    name: 'generic-link',
    extract: (session) =>
      session.evaluate(({ link }) => {
        const results: SectionCandidate[] = [];
        const seen = new Set<string>();
        const anchors = document.querySelectorAll<HTMLAnchorElement>(link);
        for (const anchor of Array.from(anchors)) {
          const text =
            (anchor.textContent ?? '').replace(/\s+/g, ' ').trim() ||
            anchor.getAttribute('aria-label') ||
            '';
          if (text && !seen.has(anchor.href)) {
            seen.add(anchor.href);
            results.push({ name: text, url: anchor.href });
          }
        }
        return results;
      }, selectors),
  };
}

export function createSectionStrategies(
  selectors: SectionSelectors
): SectionStrategy[] {
  return [
    createSectionContainerStrategy(selectors),
    createHeadingProximityStrategy(selectors),
    createGenericLinkStrategy(selectors),
  ];
}
