import { chromium } from 'playwright-core';
import type { Page } from 'playwright-core';
import { logger, errorMessage } from './utils/logger.js';
import { sleep } from './utils/timing.js';
import type { Config, ContentFetcher } from './types.js';

/** The part of a Playwright page the fetcher drives. */
export type BrowserTab = Pick<Page, 'url' | 'goto' | 'content'>;

export interface FetcherOptions {
  retries: number;
  retryDelayMs: number;
  settleMs: number;
  timeout: number;
}

/**
 * Reads pages through a browser tab that already carries a logged-in session.
 *
 * The tab is navigated to the requested URL, its markup captured, and then it
 * is sent back to wherever it was before so the session's own page survives.
 */
export class BrowserContentFetcher implements ContentFetcher {
  constructor(
    private tab: BrowserTab,
    private options: FetcherOptions,
    private release: () => Promise<void> = async () => {}
  ) {}

  /**
   * Attaches to a running browser over CDP, or launches Chrome on an existing
   * profile directory when `userDataDir` is set.
   */
  static async connect(config: Config): Promise<BrowserContentFetcher> {
    const options: FetcherOptions = {
      retries: config.retries,
      retryDelayMs: config.retryDelayMs,
      settleMs: config.settleMs,
      timeout: config.timeout
    };

    if (config.userDataDir) {
      logger.debug(`Launching Chrome with profile: ${config.userDataDir}`);
      const context = await chromium.launchPersistentContext(config.userDataDir, {
        channel: 'chrome',
        headless: config.headless
      });
      const page = context.pages()[0] ?? (await context.newPage());
      return new BrowserContentFetcher(page, options, () => context.close());
    }

    logger.debug(`Attaching to browser at ${config.cdpEndpoint}...`);
    const browser = await chromium.connectOverCDP(config.cdpEndpoint);
    const context = browser.contexts()[0] ?? (await browser.newContext());
    const page = context.pages()[0] ?? (await context.newPage());
    return new BrowserContentFetcher(page, options, () => browser.close());
  }

  async fetch(url: string): Promise<string | null> {
    const { retries, retryDelayMs, settleMs, timeout } = this.options;

    for (let attempt = 1; attempt <= retries; attempt++) {
      const previousUrl = this.tab.url();
      try {
        await this.tab.goto(url, { waitUntil: 'load', timeout: timeout * 1000 });
        if (settleMs > 0) {
          await sleep(settleMs);
        }
        return await this.tab.content();
      } catch (error) {
        logger.warn(`Attempt ${attempt}/${retries} failed for ${url}: ${errorMessage(error)}`);
      } finally {
        await this.restore(previousUrl);
      }

      if (attempt < retries && retryDelayMs > 0) {
        await sleep(retryDelayMs);
      }
    }

    return null;
  }

  async close(): Promise<void> {
    await this.release();
  }

  private async restore(previousUrl: string) {
    if (!previousUrl || previousUrl === 'about:blank' || previousUrl === this.tab.url()) {
      return;
    }
    try {
      await this.tab.goto(previousUrl, { waitUntil: 'load', timeout: this.options.timeout * 1000 });
    } catch (error) {
      logger.warn(`Could not return tab to ${previousUrl}: ${errorMessage(error)}`);
    }
  }
}
