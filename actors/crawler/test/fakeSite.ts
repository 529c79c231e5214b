import { NavigationError, WaitTimeoutError } from '../../../shared/errors';
import type {
  CardCandidate,
  CrawlerDefinition,
  PageFunction,
  PageSession,
  SectionCandidate,
  SessionFactory,
  StrategyChains,
} from '../core/types';
import type { Clock, Sleep } from '../crawlerUtils';

// ================================================
// CANNED PAGES
// ================================================

export interface FakePage {
  sections?: SectionCandidate[];
  cards?: CardCandidate[];
  next?: string;
  description?: string;
  /** Navigations to this page that fail before one succeeds */
  failures?: number;
  /** Card container never becomes visible */
  slowCards?: boolean;
}

export function card(
  id: string,
  overrides: Partial<CardCandidate> = {}
): CardCandidate {
  return {
    title: `Listing ${id}`,
    price: '$100',
    rating: '4.50 out of 5 average rating',
    url: `https://stays.test/rooms/${id}`,
    location: '',
    ...overrides,
  };
}

/**
 * In-process stand-in for the marketplace: URLs map to canned pages, and
 * the fake strategies read whatever page the session last loaded.
 */
export class FakeSite {
  readonly pages = new Map<string, FakePage>();
  readonly visits: string[] = [];
  readonly sessions: FakeSession[] = [];

  constructor(pages: Record<string, FakePage> = {}) {
    for (const [url, page] of Object.entries(pages)) {
      this.pages.set(url, page);
    }
  }

  page(url: string): FakePage | undefined {
    return this.pages.get(url);
  }

  readonly openSession: SessionFactory = async () => {
    const session = new FakeSession(this);
    this.sessions.push(session);
    return session;
  };

  strategies(): StrategyChains {
    return {
      sections: [
        {
          name: 'fake-sections',
          extract: async (_session, context) =>
            this.page(context.pageUrl)?.sections ?? [],
        },
      ],
      cards: [
        {
          name: 'fake-cards',
          extract: async (_session, context) =>
            this.page(context.pageUrl)?.cards ?? [],
        },
      ],
      nextPage: [
        {
          name: 'fake-next',
          extract: async (_session, context) => {
            const next = this.page(context.pageUrl)?.next;
            return next ? [next] : [];
          },
        },
      ],
      description: [
        {
          name: 'fake-description',
          extract: async (_session, context) => {
            const description = this.page(context.pageUrl)?.description;
            return description ? [description] : [];
          },
        },
      ],
    };
  }
}

export class FakeSession implements PageSession {
  private readonly site: FakeSite;
  private current = 'about:blank';
  closed = false;

  constructor(site: FakeSite) {
    this.site = site;
  }

  async navigate(url: string): Promise<void> {
    this.site.visits.push(url);
    const page = this.site.page(url);
    if (!page) {
      throw new NavigationError(url, new Error('404'));
    }
    if (page.failures && page.failures > 0) {
      page.failures--;
      throw new NavigationError(url, new Error('connection reset'));
    }
    this.current = url;
  }

  async evaluate<Arg, Result>(
    fn: PageFunction<Arg, Result>,
    arg: Arg
  ): Promise<Result> {
    return fn(arg);
  }

  async waitForVisible(selector: string, timeoutMs: number): Promise<void> {
    if (this.site.page(this.current)?.slowCards) {
      throw new WaitTimeoutError(selector, timeoutMs);
    }
  }

  async settle(): Promise<void> {}

  url(): string {
    return this.current;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

// ================================================
// DEFINITIONS & TIMING
// ================================================

export const ENTRY_URL = 'https://stays.test/';

export function fakeDefinition(
  site: FakeSite,
  fallbackSections: CrawlerDefinition['fallbackSections'] = []
): CrawlerDefinition {
  return {
    config: { platform: 'stays', name: 'Stays', entryUrl: ENTRY_URL },
    selectors: { cardReady: '.card' },
    strategies: site.strategies(),
    fallbackSections,
  };
}

/** Sleep that advances a virtual clock instead of waiting */
export function virtualTime(start = 0): {
  now: Clock;
  sleep: Sleep;
  sleeps: number[];
} {
  let time = start;
  const sleeps: number[] = [];
  return {
    now: () => time,
    sleep: async (ms) => {
      sleeps.push(ms);
      time += ms;
    },
    sleeps,
  };
}
