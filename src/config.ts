import path from 'path';
import { InvalidArgumentError } from 'commander';
import { ensureProtocol, normalizeUrl } from './utils/url-utils.js';
import type { Config, CrawlTarget } from './types.js';

/** Options as commander hands them to the action, already parsed. */
export interface CliOptions {
  delay: number;
  retries: number;
  retryDelay: number;
  settle: number;
  timeout: number;
  cdpEndpoint: string;
  userDataDir?: string;
  headless: boolean;
  maxPages?: number;
  verbose: boolean;
}

export const DEFAULTS = {
  delayMs: 5000,
  retries: 3,
  retryDelayMs: 2000,
  settleMs: 5000,
  timeout: 30,
  cdpEndpoint: 'http://localhost:9222'
} as const;

export function parseNonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parseInt(value, 10);
}

export function parsePositiveInt(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed < 1) {
    throw new InvalidArgumentError('Must be at least 1.');
  }
  return parsed;
}

export function buildConfig(baseUrl: string, outputDir: string, options: CliOptions): Config {
  return {
    baseUrl: normalizeUrl(ensureProtocol(baseUrl)),
    outputDir: path.resolve(outputDir),
    delayMs: options.delay,
    retries: options.retries,
    retryDelayMs: options.retryDelay,
    settleMs: options.settle,
    timeout: options.timeout,
    cdpEndpoint: options.cdpEndpoint,
    userDataDir: options.userDataDir,
    headless: options.headless,
    maxPages: options.maxPages,
    verbose: options.verbose
  };
}

export function toCrawlTarget(config: Config): CrawlTarget {
  return Object.freeze({ baseUrl: config.baseUrl, outputDir: config.outputDir });
}
