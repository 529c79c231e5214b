#!/usr/bin/env tsx
/**
 * Crawler CLI - Run the listing pipeline from command line
 *
 * Usage:
 *   npm run crawl -- [platform]      Crawl, normalize, store and report
 *   npm run crawl -- --list          List all available platforms
 *
 * Options:
 *   --quota=N                        Listings kept per section
 *   --max-retries=N                  Attempts per page fetch
 *   --concurrency=N                  Section workers
 *   --no-enrich                      Skip detail page enrichment
 *   --dry-run                        Write clean listings to JSON, not PostgreSQL
 *   --test                           Enable test mode (one section, few listings)
 *
 * Examples:
 *   npm run crawl -- airbnb
 *   npm run crawl -- airbnb --test --dry-run
 */

import { type HarvestConfig, loadConfig } from '../../shared/config';
import { DEFAULT_PLATFORM } from '../../shared/constants';
import { ConfigError, CrawlAbortedError } from '../../shared/errors';
import type { CleanListing, RawListing } from '../../shared/listing';
import { logger } from '../../shared/logger';
import { type CleanSink, JsonFileSink, PostgresSink } from '../storage';

// Import crawlers to register them
import './crawlers';

import {
  type CrawlerOptions,
  createCrawler,
  DEFAULT_CRAWLER_OPTIONS,
  getRegisteredPlatforms,
  hasCrawler,
  PlaywrightBrowser,
} from './core';
import { runPipeline } from './pipeline';

// ================================================
// ARGUMENT PARSING
// ================================================

interface CliArgs {
  platform?: string;
  list: boolean;
  test: boolean;
  dryRun: boolean;
  noEnrich: boolean;
  quota?: number;
  maxRetries?: number;
  concurrency?: number;
  help: boolean;
}

function parsePositiveInt(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError([
      `${flag}: expected a positive integer, got '${value}'`,
    ]);
  }
  return parsed;
}

function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    list: false,
    test: false,
    dryRun: false,
    noEnrich: false,
    help: false,
  };

  for (const arg of args) {
    const [flag, value = ''] = arg.split('=', 2);
    if (arg === '--list' || arg === '-l') {
      result.list = true;
    } else if (arg === '--test' || arg === '-t') {
      result.test = true;
    } else if (arg === '--dry-run') {
      result.dryRun = true;
    } else if (arg === '--no-enrich') {
      result.noEnrich = true;
    } else if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (flag === '--quota') {
      result.quota = parsePositiveInt(flag, value);
    } else if (flag === '--max-retries') {
      result.maxRetries = parsePositiveInt(flag, value);
    } else if (flag === '--concurrency') {
      result.concurrency = parsePositiveInt(flag, value);
    } else if (arg.startsWith('-')) {
      logger.warn(`Ignoring unknown option ${arg}`);
    } else {
      result.platform = arg;
    }
  }

  return result;
}

// ================================================
// HELP TEXT
// ================================================

function printHelp(): void {
  logger.info(`
Crawler CLI - Run the listing pipeline from command line

Usage:
  npm run crawl -- [platform]      Crawl, normalize, store and report (default: ${DEFAULT_PLATFORM})
  npm run crawl -- --list          List all available platforms

Options:
  --quota=N                        Listings kept per section
  --max-retries=N                  Attempts per page fetch
  --concurrency=N                  Section workers
  --no-enrich                      Skip detail page enrichment
  --dry-run                        Write clean listings to JSON, not PostgreSQL
  --test                           Enable test mode (one section, few listings)
  --help                           Show this help message

Examples:
  npm run crawl -- airbnb
  npm run crawl -- airbnb --test --dry-run
`);
}

// ================================================
// COMMANDS
// ================================================

function listCrawlers(): void {
  const platforms = getRegisteredPlatforms();

  if (platforms.length === 0) {
    logger.info('No crawlers registered.');
  } else {
    logger.info('Available crawlers:');
    for (const platform of platforms.sort()) {
      logger.info(`  - ${platform}`);
    }
  }
}

function resolveOptions(
  args: CliArgs,
  config: HarvestConfig
): Partial<CrawlerOptions> {
  return {
    quota: args.quota ?? config.listingsPerSection,
    maxRetries: args.maxRetries ?? config.maxRetries,
    backoffUnitMs: config.backoffUnitMs,
    rateLimitDelayMs: config.rateLimitDelayMs,
    maxConcurrency: args.concurrency ?? config.maxConcurrency,
    crawlTimeoutMs: config.crawlTimeoutMs,
    enrichDetails: args.noEnrich ? false : config.enrichDetails,
    entrySettleMs: config.entrySettleMs,
    pageSettleMs: config.pageSettleMs,
    detailSettleMs: config.detailSettleMs,
    cardWaitTimeoutMs: config.cardWaitTimeoutMs,
    launchOptions: {
      ...DEFAULT_CRAWLER_OPTIONS.launchOptions,
      headless: config.headless,
    },
  };
}

function createCleanSink(
  args: CliArgs,
  config: HarvestConfig,
  platform: string
): CleanSink {
  if (args.dryRun) {
    logger.info('Dry run: clean listings go to JSON');
    return new JsonFileSink<CleanListing>({
      outputDir: config.outputDir,
      key: platform,
      kind: 'clean-listings',
    });
  }
  if (!config.databaseUrl) {
    throw new ConfigError(['DATABASE_URL: required unless --dry-run is set']);
  }
  return PostgresSink.fromUrl(config.databaseUrl);
}

async function runPlatform(platform: string, args: CliArgs): Promise<void> {
  if (!hasCrawler(platform)) {
    logger.error(`Crawler '${platform}' not found`);
    logger.info(`Available crawlers: ${getRegisteredPlatforms().join(', ')}`);
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const options = resolveOptions(args, config);
  const browser = new PlaywrightBrowser({
    ...DEFAULT_CRAWLER_OPTIONS.launchOptions,
    ...options.launchOptions,
  });
  const crawler = createCrawler(platform, {
    deps: { openSession: browser.openSession },
    options,
    entryUrl: config.entryUrl,
  });
  if (!crawler) {
    process.exitCode = 1;
    return;
  }

  const cleanSink = createCleanSink(args, config, platform);
  const rawSink = new JsonFileSink<RawListing>({
    outputDir: config.outputDir,
    key: platform,
    kind: 'raw-listings',
  });

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn(`Received ${signal}, stopping crawl...`);
    controller.abort(new CrawlAbortedError(`Interrupted by ${signal}`));
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  logger.info(`Running ${platform} crawler...`);
  try {
    const summary = await runPipeline(
      { crawler, rawSink, cleanSink },
      controller.signal
    );
    logger.info(
      `Done: ${summary.cleanCount} clean listings, ${summary.inserted} stored${summary.aborted ? ' (aborted early)' : ''}`
    );
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await browser.close();
    await cleanSink.close();
  }
}

// ================================================
// MAIN
// ================================================

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  // Set environment variables for test mode
  if (args.test) {
    process.env.CRAWLER_TEST_MODE = 'true';
    logger.info('🧪 Test mode enabled');
  }

  // Handle commands
  if (args.help) {
    printHelp();
    return;
  }

  if (args.list) {
    listCrawlers();
    return;
  }

  await runPlatform(args.platform ?? DEFAULT_PLATFORM, args);
}

// Run CLI
main().catch((error: unknown) => {
  logger.fatal('CLI error:', error);
  process.exit(1);
});
