export interface Config {
  baseUrl: string;
  outputDir: string;
  delayMs: number;
  retries: number;
  retryDelayMs: number;
  settleMs: number;
  timeout: number;
  cdpEndpoint: string;
  userDataDir?: string;
  headless: boolean;
  maxPages?: number;
  verbose: boolean;
}

/** Where a run starts and where it writes. Fixed for the lifetime of a run. */
export interface CrawlTarget {
  readonly baseUrl: string;
  readonly outputDir: string;
}

export interface CrawlState {
  frontier: string[];
  visitedUrls: Set<string>;
}

export interface CrawlStats {
  visited: number;
  archived: number;
  failed: number;
  discarded: number;
}

export interface PageRecord {
  url: string;
  content: string;
}

export const ARCHIVE_FORMATS = ['webarchive', 'html'] as const;

export type ArchiveFormat = (typeof ARCHIVE_FORMATS)[number];

export interface ArchiveResult {
  format: ArchiveFormat;
  path: string;
  ok: boolean;
  error?: string;
}

export interface ContentFetcher {
  /** Resolves to the page markup, or null once every attempt has failed. */
  fetch(url: string): Promise<string | null>;
  close(): Promise<void>;
}

export interface ArchiveWriter {
  write(content: string, url: string): Promise<ArchiveResult[]>;
}

export interface LinkExtractor {
  extract(content: string, baseUrl: string, currentUrl: string): string[];
}
