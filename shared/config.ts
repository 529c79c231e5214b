import { z } from 'zod';
import { DEFAULT_OUTPUT_DIR } from './constants';
import { ConfigError } from './errors';
// Loads .env.local / .env before the schema reads process.env
import './logger';

// ================================================
// ENVIRONMENT SCHEMA
// ================================================

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

// Largest delay setTimeout honours; longer ones fire after 1ms
const MAX_TIMER_MS = 2_147_483_647;

const envSchema = z.object({
  ENTRY_URL: z.string().url().default('https://www.airbnb.com'),
  LISTINGS_PER_SECTION: positiveInt.default(5),
  RATE_LIMIT_DELAY_MS: nonNegativeInt.default(2000),
  MAX_RETRIES: positiveInt.default(3),
  BACKOFF_UNIT_MS: nonNegativeInt.default(1000),
  MAX_CONCURRENCY: positiveInt.default(1),
  CRAWL_TIMEOUT_MS: positiveInt.max(MAX_TIMER_MS).default(30 * 60 * 1000),
  ENRICH_DETAILS: booleanFlag.default('true'),
  HEADLESS: booleanFlag.default('true'),
  PAGE_SETTLE_MS: nonNegativeInt.default(5000),
  ENTRY_SETTLE_MS: nonNegativeInt.default(6000),
  DETAIL_SETTLE_MS: nonNegativeInt.default(3000),
  CARD_WAIT_TIMEOUT_MS: nonNegativeInt.default(10_000),
  OUTPUT_DIR: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  DATABASE_URL: z.string().min(1).optional(),
});

export interface HarvestConfig {
  entryUrl: string;
  listingsPerSection: number;
  rateLimitDelayMs: number;
  maxRetries: number;
  backoffUnitMs: number;
  /** Section workers; `1` keeps the sequential reference behaviour */
  maxConcurrency: number;
  crawlTimeoutMs: number;
  enrichDetails: boolean;
  headless: boolean;
  pageSettleMs: number;
  entrySettleMs: number;
  detailSettleMs: number;
  cardWaitTimeoutMs: number;
  outputDir: string;
  databaseUrl?: string;
}

// Empty strings count as unset so `.env` templates can leave keys blank
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): HarvestConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      )
    );
  }

  const values = parsed.data;
  return {
    entryUrl: values.ENTRY_URL,
    listingsPerSection: values.LISTINGS_PER_SECTION,
    rateLimitDelayMs: values.RATE_LIMIT_DELAY_MS,
    maxRetries: values.MAX_RETRIES,
    backoffUnitMs: values.BACKOFF_UNIT_MS,
    maxConcurrency: values.MAX_CONCURRENCY,
    crawlTimeoutMs: values.CRAWL_TIMEOUT_MS,
    enrichDetails: values.ENRICH_DETAILS,
    headless: values.HEADLESS,
    pageSettleMs: values.PAGE_SETTLE_MS,
    entrySettleMs: values.ENTRY_SETTLE_MS,
    detailSettleMs: values.DETAIL_SETTLE_MS,
    cardWaitTimeoutMs: values.CARD_WAIT_TIMEOUT_MS,
    outputDir: values.OUTPUT_DIR,
    databaseUrl: values.DATABASE_URL,
  };
}
