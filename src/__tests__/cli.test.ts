import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { CommanderError, InvalidArgumentError } from 'commander';
import { PROGRAM_NAME, VERSION, createProgram, runCrawl } from '../cli.js';
import type { CliDependencies } from '../cli.js';
import { buildConfig, parseNonNegativeInt, parsePositiveInt } from '../config.js';
import type { CliOptions } from '../config.js';
import type { ArchiveResult, Config, ContentFetcher } from '../types.js';

const CLI_DEFAULTS: CliOptions = {
  delay: 5000,
  retries: 3,
  retryDelay: 2000,
  settle: 5000,
  timeout: 30,
  cdpEndpoint: 'http://localhost:9222',
  headless: false,
  verbose: false
};

function createDeps(pages: Record<string, string> = {}) {
  const fetcher: ContentFetcher = {
    fetch: vi.fn(async (url: string) => pages[url] ?? null),
    close: vi.fn(async () => {})
  };
  const written: string[] = [];
  const deps: CliDependencies = {
    createFetcher: vi.fn(async (_config: Config) => fetcher),
    createWriter: () => ({
      write: async (_content: string, url: string): Promise<ArchiveResult[]> => {
        written.push(url);
        return [{ format: 'html', path: url, ok: true }];
      }
    })
  };
  return { deps, fetcher, written };
}

function captureProgram(deps: CliDependencies) {
  const out: string[] = [];
  const err: string[] = [];
  const program = createProgram(deps)
    .exitOverride()
    .configureOutput({
      writeOut: text => out.push(text),
      writeErr: text => err.push(text)
    });
  return { program, out, err };
}

describe('config', () => {
  it('should parse integer options', () => {
    expect(parseNonNegativeInt('0')).toBe(0);
    expect(parseNonNegativeInt(' 250 ')).toBe(250);
    expect(() => parseNonNegativeInt('-1')).toThrow(InvalidArgumentError);
    expect(() => parseNonNegativeInt('1.5')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('0')).toThrow('Must be at least 1.');
  });

  it('should normalize the base URL and resolve the output directory', () => {
    const config = buildConfig('Site.TEST//docs/', 'out', CLI_DEFAULTS);

    expect(config.baseUrl).toBe('https://site.test/docs');
    expect(config.outputDir).toBe(path.resolve('out'));
    expect(config.delayMs).toBe(5000);
    expect(config.maxPages).toBeUndefined();
  });
});

describe('createProgram', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('should print the program name and version', async () => {
    const { program, out } = captureProgram(createDeps().deps);

    await expect(program.parseAsync(['node', PROGRAM_NAME, '--version'])).rejects.toMatchObject({
      code: 'commander.version',
      exitCode: 0
    });
    expect(out.join('')).toBe(`${PROGRAM_NAME} ${VERSION}\n`);
  });

  it('should fail with usage when an argument is missing', async () => {
    const { deps } = createDeps();
    const { program, err } = captureProgram(deps);

    const failure = program.parseAsync(['node', PROGRAM_NAME, 'https://site.test']);

    await expect(failure).rejects.toBeInstanceOf(CommanderError);
    await expect(failure).rejects.toMatchObject({ code: 'commander.missingArgument', exitCode: 1 });
    expect(err.join('')).toContain('Usage: webarchive-crawler [options] <BASE_URL> <OUTPUT_DIR>');
    expect(deps.createFetcher).not.toHaveBeenCalled();
  });

  it('should fail when given too many arguments', async () => {
    const { program } = captureProgram(createDeps().deps);

    await expect(
      program.parseAsync(['node', PROGRAM_NAME, 'https://site.test', 'out', 'extra'])
    ).rejects.toMatchObject({ code: 'commander.excessArguments', exitCode: 1 });
  });

  it('should reject an invalid delay', async () => {
    const { program } = captureProgram(createDeps().deps);

    await expect(
      program.parseAsync(['node', PROGRAM_NAME, 'https://site.test', 'out', '--delay', 'soon'])
    ).rejects.toMatchObject({ code: 'commander.invalidArgument', exitCode: 1 });
  });

  describe('with an output directory', () => {
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-'));
    });

    afterEach(async () => {
      await fs.rm(tmpDir, { recursive: true, force: true });
    });

    it('should crawl with the parsed options', async () => {
      const outputDir = path.join(tmpDir, 'archive');
      const { deps, fetcher, written } = createDeps({
        'https://site.test/': '<html><body><a href="/a">a</a></body></html>',
        'https://site.test/a': '<html><body></body></html>'
      });
      const { program } = captureProgram(deps);

      await program.parseAsync([
        'node',
        PROGRAM_NAME,
        'site.test',
        outputDir,
        '--delay',
        '0',
        '--max-pages',
        '5'
      ]);

      expect(process.exitCode).toBe(0);
      expect(deps.createFetcher).toHaveBeenCalledWith(
        expect.objectContaining({
          baseUrl: 'https://site.test/',
          outputDir,
          delayMs: 0,
          maxPages: 5,
          retries: 3
        })
      );
      expect(written).toEqual(['https://site.test/', 'https://site.test/a']);
      expect(fetcher.close).toHaveBeenCalledOnce();
      expect((await fs.stat(outputDir)).isDirectory()).toBe(true);
      expect(console.log).toHaveBeenCalledWith('[info] Crawling completed.');
    });

    it('should exit 1 when the output directory cannot be created', async () => {
      const blocker = path.join(tmpDir, 'file');
      await fs.writeFile(blocker, 'not a directory');
      const { deps } = createDeps();

      const code = await runCrawl(
        buildConfig('https://site.test', path.join(blocker, 'archive'), { ...CLI_DEFAULTS, delay: 0 }),
        deps
      );

      expect(code).toBe(1);
      expect(deps.createFetcher).not.toHaveBeenCalled();
      expect(console.error).toHaveBeenCalledWith(
        expect.stringMatching(/^\[error\] Failed to create output directory: /)
      );
    });

    it('should exit 1 when the browser session cannot be opened', async () => {
      const { deps } = createDeps();
      deps.createFetcher = async () => {
        throw new Error('connect ECONNREFUSED 127.0.0.1:9222');
      };

      const code = await runCrawl(
        buildConfig('https://site.test', tmpDir, { ...CLI_DEFAULTS, delay: 0 }),
        deps
      );

      expect(code).toBe(1);
      expect(console.error).toHaveBeenCalledWith(
        '[error] Could not open browser session: connect ECONNREFUSED 127.0.0.1:9222'
      );
    });
  });
});
