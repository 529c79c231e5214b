import { launchPlaywright } from 'crawlee';
import {
  type Browser,
  type BrowserContext,
  errors,
  type Page,
} from 'playwright';
import {
  EvaluationError,
  NavigationError,
  WaitTimeoutError,
} from '../../../shared/errors';
import { logger } from '../../../shared/logger';
import { raceAbort, waitFor } from '../crawlerUtils';
import type {
  CrawlerOptions,
  PageFunction,
  PageSession,
  SessionFactory,
} from './types';

const log = logger.child('browser');

const USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
const NAVIGATION_TIMEOUT_MS = 60_000;

/**
 * A single tab in its own browser context
 */
export class PlaywrightSession implements PageSession {
  private readonly context: BrowserContext;
  private readonly page: Page;
  private readonly signal?: AbortSignal;

  private constructor(
    context: BrowserContext,
    page: Page,
    signal?: AbortSignal
  ) {
    this.context = context;
    this.page = page;
    this.signal = signal;
  }

  static async open(
    browser: Browser,
    signal?: AbortSignal
  ): Promise<PlaywrightSession> {
    const context = await browser.newContext({
      userAgent: USER_AGENT,
      viewport: { width: 1440, height: 900 },
      locale: 'en-US',
    });
    const page = await context.newPage();
    page.setDefaultNavigationTimeout(NAVIGATION_TIMEOUT_MS);
    return new PlaywrightSession(context, page, signal);
  }

  async navigate(url: string): Promise<void> {
    try {
      await raceAbort(
        this.page.goto(url, { waitUntil: 'domcontentloaded' }),
        this.signal
      );
    } catch (error) {
      throw new NavigationError(url, error);
    }
  }

  async evaluate<Arg, Result>(
    fn: PageFunction<Arg, Result>,
    arg: Arg
  ): Promise<Result> {
    // Shipped as source with a JSON argument, the same way Playwright
    // serializes page functions itself.
    const expression = `(${fn.toString()})(${JSON.stringify(arg)})`;
    try {
      return await this.page.evaluate<Result>(expression);
    } catch (error) {
      throw new EvaluationError(`Page evaluation failed on ${this.url()}`, {
        cause: error,
      });
    }
  }

  async waitForVisible(selector: string, timeoutMs: number): Promise<void> {
    try {
      await this.page.waitForSelector(selector, {
        state: 'visible',
        timeout: timeoutMs,
      });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new WaitTimeoutError(selector, timeoutMs, error);
      }
      throw new EvaluationError(`Waiting for ${selector} failed`, {
        cause: error,
      });
    }
  }

  settle(ms: number): Promise<void> {
    return waitFor(ms, this.signal);
  }

  url(): string {
    return this.page.url();
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}

/**
 * Owns one launched browser and hands out isolated sessions on it
 */
export class PlaywrightBrowser {
  private launching: Promise<Browser> | null = null;
  private readonly launchOptions: CrawlerOptions['launchOptions'];

  constructor(launchOptions: CrawlerOptions['launchOptions']) {
    this.launchOptions = launchOptions;
  }

  readonly openSession: SessionFactory = async (signal) => {
    const browser = await this.ensureBrowser();
    return PlaywrightSession.open(browser, signal);
  };

  // Concurrent workers share one launch
  private ensureBrowser(): Promise<Browser> {
    if (!this.launching) {
      log.info(
        `Launching browser (headless: ${this.launchOptions.headless})...`
      );
      this.launching = launchPlaywright({
        launchOptions: {
          headless: this.launchOptions.headless,
          args: this.launchOptions.args,
        },
      }).then(
        (browser) => {
          log.info('Browser launched successfully');
          return browser;
        },
        (error: unknown) => {
          this.launching = null;
          log.error('Failed to launch browser:', error);
          throw error;
        }
      );
    }
    return this.launching;
  }

  async close(): Promise<void> {
    if (!this.launching) {
      return;
    }
    const browser = await this.launching;
    this.launching = null;
    await browser.close();
    log.info('Browser closed');
  }
}
