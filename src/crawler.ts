import { RegexLinkExtractor } from './link-extractor.js';
import { logger, errorMessage } from './utils/logger.js';
import { normalizeUrl } from './utils/url-utils.js';
import { sleep } from './utils/timing.js';
import type {
  ArchiveWriter,
  ContentFetcher,
  CrawlState,
  CrawlStats,
  CrawlTarget,
  LinkExtractor,
  PageRecord
} from './types.js';

export interface CrawlEngineOptions {
  delayMs: number;
  maxPages?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface CrawlCollaborators {
  fetcher: ContentFetcher;
  writer: ArchiveWriter;
  extractor?: LinkExtractor;
}

/**
 * Breadth-first crawl of everything under the target's base URL, one page at
 * a time: fetch, archive, discover links, pause.
 *
 * A URL is marked visited before it is fetched, so a page that fails is never
 * tried again in the same run.
 */
export class CrawlEngine {
  private state: CrawlState;
  private stats: CrawlStats = { visited: 0, archived: 0, failed: 0, discarded: 0 };
  private extractor: LinkExtractor;
  private wait: (ms: number) => Promise<void>;

  constructor(
    private target: CrawlTarget,
    private collaborators: CrawlCollaborators,
    private options: CrawlEngineOptions
  ) {
    this.state = {
      frontier: [target.baseUrl],
      visitedUrls: new Set()
    };
    this.extractor = collaborators.extractor ?? new RegexLinkExtractor();
    this.wait = options.sleep ?? sleep;
  }

  get frontier(): readonly string[] {
    return this.state.frontier;
  }

  get visitedUrls(): ReadonlySet<string> {
    return this.state.visitedUrls;
  }

  async run(): Promise<CrawlStats> {
    const baseUrl = normalizeUrl(this.target.baseUrl);
    const { frontier, visitedUrls } = this.state;
    const { maxPages, delayMs } = this.options;

    while (frontier.length > 0) {
      if (maxPages !== undefined && this.stats.visited >= maxPages) {
        logger.warn(`Reached page limit (${maxPages}), ${frontier.length} queued URLs not visited`);
        break;
      }

      const next = frontier.shift();
      if (next === undefined) break;

      const url = normalizeUrl(next);
      if (visitedUrls.has(url) || !url.startsWith(baseUrl)) {
        this.stats.discarded++;
        logger.debug(`Skipping: ${url}`);
        continue;
      }

      visitedUrls.add(url);
      this.stats.visited++;
      logger.info(`Crawling: ${url}`);

      try {
        await this.processPage(url);
      } catch (error) {
        this.stats.failed++;
        logger.error(`Failed to process ${url}: ${errorMessage(error)}`);
      }

      if (delayMs > 0) {
        await this.wait(delayMs);
      }
    }

    return { ...this.stats };
  }

  private async processPage(url: string) {
    const content = await this.collaborators.fetcher.fetch(url);
    if (content === null) {
      this.stats.failed++;
      logger.error(`Failed to retrieve content for: ${url}`);
      return;
    }

    const page: PageRecord = { url, content };
    await this.archive(page);
    this.discover(page);
  }

  private async archive(page: PageRecord) {
    const results = await this.collaborators.writer.write(page.content, page.url);

    for (const result of results) {
      if (result.ok) {
        logger.success(`Saved ${result.format}: ${result.path}`);
      } else {
        logger.error(`Failed to save ${result.format} for ${page.url}: ${result.error ?? 'unknown error'}`);
      }
    }

    if (results.some(result => result.ok)) {
      this.stats.archived++;
    }
  }

  private discover(page: PageRecord) {
    const links = this.extractor.extract(page.content, this.target.baseUrl, page.url);
    const fresh = links.filter(link => !this.state.visitedUrls.has(link));

    this.state.frontier.push(...fresh);
    logger.info(`Added ${fresh.length} new URLs to visit`);
    for (const link of fresh.slice(0, 10)) {
      logger.debug(`  Link: ${link}`);
    }
  }
}
