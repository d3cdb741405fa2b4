import { promises as fs } from 'fs';
import { Command } from 'commander';
import { FileArchiveWriter } from './archive-writer.js';
import { CrawlEngine } from './crawler.js';
import { BrowserContentFetcher } from './fetcher.js';
import {
  DEFAULTS,
  buildConfig,
  parseNonNegativeInt,
  parsePositiveInt,
  toCrawlTarget
} from './config.js';
import type { CliOptions } from './config.js';
import { logger, errorMessage } from './utils/logger.js';
import type { ArchiveWriter, Config, ContentFetcher } from './types.js';

export const PROGRAM_NAME = 'webarchive-crawler';
export const VERSION = '1.0.0';

export interface CliDependencies {
  createFetcher: (config: Config) => Promise<ContentFetcher>;
  createWriter: (outputDir: string) => ArchiveWriter;
}

const defaultDependencies: CliDependencies = {
  createFetcher: config => BrowserContentFetcher.connect(config),
  createWriter: outputDir => new FileArchiveWriter(outputDir)
};

/** Runs one crawl and resolves to the process exit code. */
export async function runCrawl(config: Config, deps: CliDependencies): Promise<number> {
  logger.setVerbose(config.verbose);

  try {
    await fs.mkdir(config.outputDir, { recursive: true });
  } catch (error) {
    logger.error(`Failed to create output directory: ${errorMessage(error)}`);
    return 1;
  }

  logger.info(`Starting crawl from: ${config.baseUrl}`);
  logger.info(`Output directory: ${config.outputDir}`);
  logger.info(`Delay between pages: ${config.delayMs}ms`);
  if (config.maxPages !== undefined) {
    logger.info(`Page limit: ${config.maxPages}`);
  }
  console.log('');

  let fetcher: ContentFetcher;
  try {
    fetcher = await deps.createFetcher(config);
  } catch (error) {
    logger.error(`Could not open browser session: ${errorMessage(error)}`);
    return 1;
  }

  try {
    const engine = new CrawlEngine(
      toCrawlTarget(config),
      { fetcher, writer: deps.createWriter(config.outputDir) },
      { delayMs: config.delayMs, maxPages: config.maxPages }
    );
    const stats = await engine.run();

    console.log('');
    logger.info('Crawling completed.');
    logger.info(`Pages visited: ${stats.visited}`);
    logger.info(`Pages archived: ${stats.archived}`);
    if (stats.failed > 0) {
      logger.warn(`Pages failed: ${stats.failed}`);
    }
    return 0;
  } finally {
    await fetcher.close().catch(error => {
      logger.warn(`Failed to close browser session: ${errorMessage(error)}`);
    });
  }
}

export function createProgram(deps: CliDependencies = defaultDependencies): Command {
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description('Archives the pages of a site through an already logged-in browser session')
    .version(`${PROGRAM_NAME} ${VERSION}`, '-V, --version')
    .argument('<BASE_URL>', 'Site root; only URLs under it are crawled')
    .argument('<OUTPUT_DIR>', 'Directory the archives are written to')
    .option('--delay <ms>', 'Pause between pages', parseNonNegativeInt, DEFAULTS.delayMs)
    .option('--retries <n>', 'Fetch attempts per page', parsePositiveInt, DEFAULTS.retries)
    .option('--retry-delay <ms>', 'Wait between failed attempts', parseNonNegativeInt, DEFAULTS.retryDelayMs)
    .option('--settle <ms>', 'Wait after page load before capturing', parseNonNegativeInt, DEFAULTS.settleMs)
    .option('--timeout <s>', 'Navigation timeout per attempt', parsePositiveInt, DEFAULTS.timeout)
    .option('--cdp-endpoint <url>', 'Attach to a running browser over CDP', DEFAULTS.cdpEndpoint)
    .option('--user-data-dir <dir>', 'Launch Chrome on this profile instead of attaching')
    .option('--headless', 'Run headless (with --user-data-dir)', false)
    .option('--max-pages <n>', 'Stop after this many pages', parsePositiveInt)
    .option('-v, --verbose', 'Verbose output', false)
    .allowExcessArguments(false)
    .showHelpAfterError()
    .action(async (baseUrl: string, outputDir: string, options: CliOptions) => {
      process.exitCode = await runCrawl(buildConfig(baseUrl, outputDir, options), deps);
    });

  return program;
}
