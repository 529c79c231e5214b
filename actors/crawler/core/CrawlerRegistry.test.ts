import { describe, expect, it } from 'vitest';
import {
  card,
  ENTRY_URL,
  FakeSite,
  fakeDefinition,
  virtualTime,
} from '../test/fakeSite';
import {
  createCrawler,
  defineCrawler,
  getCrawlerDefinition,
  getRegisteredPlatforms,
  hasCrawler,
  registerCrawler,
} from './CrawlerRegistry';
import type { CrawlerOptions, TestModeConfig } from './types';

const NO_TEST_MODE: TestModeConfig = {
  enabled: false,
  maxListings: Number.POSITIVE_INFINITY,
  maxSections: Number.POSITIVE_INFINITY,
};

const SECTION_URL = 'https://stays.test/s/A';

function register(platform: string, options?: Partial<CrawlerOptions>) {
  const site = new FakeSite({
    [ENTRY_URL]: { sections: [{ name: 'A', url: SECTION_URL }] },
    'https://mirror.stays.test/': {
      sections: [{ name: 'A', url: SECTION_URL }],
    },
    [SECTION_URL]: { cards: [card('a1'), card('a2'), card('a3')] },
  });
  registerCrawler(
    platform,
    defineCrawler({ ...fakeDefinition(site), options })
  );
  return site;
}

describe('CrawlerRegistry', () => {
  it('should register and look up definitions', () => {
    register('registry-lookup');

    expect(hasCrawler('registry-lookup')).toBe(true);
    expect(getRegisteredPlatforms()).toContain('registry-lookup');
    expect(getCrawlerDefinition('registry-lookup')?.config.name).toBe('Stays');
    expect(getCrawlerDefinition('missing')).toBeNull();
  });

  it('should return null for an unknown platform', () => {
    const site = new FakeSite();
    expect(
      createCrawler('missing', { deps: { openSession: site.openSession } })
    ).toBeNull();
  });

  it('should layer caller options over the definition options', async () => {
    const site = register('registry-layering', { quota: 1 });
    const deps = {
      openSession: site.openSession,
      ...virtualTime(),
      testMode: NO_TEST_MODE,
    };

    const fromDefinition = createCrawler('registry-layering', { deps });
    const fromCaller = createCrawler('registry-layering', {
      deps,
      options: { quota: 2 },
    });

    expect((await fromDefinition?.run())?.listings).toHaveLength(1);
    expect((await fromCaller?.run())?.listings).toHaveLength(2);
  });

  it('should cap the quota in test mode', async () => {
    const site = register('registry-test-mode');

    const crawler = createCrawler('registry-test-mode', {
      deps: {
        openSession: site.openSession,
        ...virtualTime(),
        testMode: { enabled: true, maxListings: 1, maxSections: 1 },
      },
      options: { quota: 5 },
    });

    expect((await crawler?.run())?.listings).toHaveLength(1);
  });

  it('should replace the entry page when asked', async () => {
    const site = register('registry-entry');

    const crawler = createCrawler('registry-entry', {
      deps: { openSession: site.openSession, ...virtualTime(), testMode: NO_TEST_MODE },
      entryUrl: 'https://mirror.stays.test/',
    });
    await crawler?.run();

    expect(site.visits[0]).toBe('https://mirror.stays.test/');
  });
});
