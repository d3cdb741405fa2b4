import { promises as fs } from 'fs';
import path from 'path';
import plist from 'plist';
import { errorMessage } from './utils/logger.js';
import { ARCHIVE_FORMATS } from './types.js';
import type { ArchiveFormat, ArchiveResult, ArchiveWriter } from './types.js';

export interface ArchivePaths {
  directory: string;
  files: Record<ArchiveFormat, string>;
}

const DEFAULT_BASENAME = 'index';

/**
 * Decoded path segment that is safe to use as a single directory or file name.
 */
function safeSegment(segment: string): string {
  let decoded: string;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    // malformed escape
    decoded = segment;
  }

  if (decoded === '.' || decoded === '..') {
    return '_';
  }
  return decoded.replace(/[/\\\0]/g, '_');
}

function querySuffix(search: string): string {
  const query = search.replace(/^\?/, '');
  return query ? `_${query.replace(/[^A-Za-z0-9._-]/g, '_')}` : '';
}

/**
 * Mirrors the URL's path under the output directory. The last segment (or
 * `index` for the root) names both files.
 *
 * `https://site.test/docs/intro` → `<out>/docs/intro/intro.{webarchive,html}`
 */
export function getArchivePaths(url: string, outputDir: string): ArchivePaths {
  const parsed = new URL(url);
  const segments = parsed.pathname
    .split('/')
    .filter(segment => segment.length > 0)
    .map(safeSegment);

  const directory = path.join(outputDir, ...segments);
  const last = segments.length > 0 ? segments[segments.length - 1] : DEFAULT_BASENAME;
  const basename = `${last}${querySuffix(parsed.search)}`;

  return {
    directory,
    files: {
      webarchive: path.join(directory, `${basename}.webarchive`),
      html: path.join(directory, `${basename}.html`)
    }
  };
}

export function buildWebArchive(content: string, url: string): string {
  return plist.build({
    WebMainResource: {
      WebResourceData: Buffer.from(content, 'utf8'),
      WebResourceFrameName: '',
      WebResourceMIMEType: 'text/html',
      WebResourceTextEncodingName: 'UTF-8',
      WebResourceURL: url
    }
  });
}

function render(format: ArchiveFormat, content: string, url: string): string {
  switch (format) {
    case 'webarchive':
      return buildWebArchive(content, url);
    case 'html':
      return content;
  }
}

async function writeAtomically(filepath: string, data: string): Promise<void> {
  const tmpPath = `${filepath}.tmp`;
  await fs.writeFile(tmpPath, data, 'utf8');
  await fs.rename(tmpPath, filepath);
}

/**
 * Writes every page twice: a Safari-style `.webarchive` property list and the
 * plain `.html`. Each format reports its own outcome.
 */
export class FileArchiveWriter implements ArchiveWriter {
  constructor(private outputDir: string) {}

  async write(content: string, url: string): Promise<ArchiveResult[]> {
    let paths: ArchivePaths;
    try {
      paths = getArchivePaths(url, this.outputDir);
    } catch (error) {
      const reason = errorMessage(error);
      return ARCHIVE_FORMATS.map(format => ({ format, path: '', ok: false, error: reason }));
    }

    const { directory, files } = paths;
    try {
      await fs.mkdir(directory, { recursive: true });
    } catch (error) {
      const reason = errorMessage(error);
      return ARCHIVE_FORMATS.map(format => ({ format, path: files[format], ok: false, error: reason }));
    }

    const results: ArchiveResult[] = [];
    for (const format of ARCHIVE_FORMATS) {
      const filepath = files[format];
      try {
        await writeAtomically(filepath, render(format, content, url));
        results.push({ format, path: filepath, ok: true });
      } catch (error) {
        await fs.unlink(`${filepath}.tmp`).catch(() => {});
        results.push({ format, path: filepath, ok: false, error: errorMessage(error) });
      }
    }
    return results;
  }
}
