import type { LinkExtractor } from './types.js';
import {
  hasFragment,
  isRootRelative,
  normalizeUrl,
  resolveRootRelative
} from './utils/url-utils.js';

const BODY_PATTERN = /<body[^>]*>([\s\S]*?)<\/body>/i;
const HREF_PATTERN = /href\s*=\s*['"]([^'"]+)['"]/gi;

function isInPageAnchor(href: string, baseUrl: string, currentUrl: string): boolean {
  if (href.startsWith('#')) {
    return true;
  }
  if (!hasFragment(href)) {
    return false;
  }
  const target = isRootRelative(href) ? resolveRootRelative(href, baseUrl) : normalizeUrl(href);
  return target === currentUrl;
}

/**
 * Pulls candidate same-site links out of the first `<body>` of a page.
 *
 * This is a pattern scan, not an HTML parse: markup the patterns do not
 * recognise yields fewer links, never an error. Links come back normalized
 * and in document order; duplicates are kept.
 */
export function extractLinks(content: string, baseUrl: string, currentUrl: string): string[] {
  const body = BODY_PATTERN.exec(content);
  if (!body) {
    return [];
  }

  const base = normalizeUrl(baseUrl);
  const current = normalizeUrl(currentUrl);
  const links: string[] = [];

  for (const match of body[1].matchAll(HREF_PATTERN)) {
    const href = match[1];

    if (isInPageAnchor(href, base, current)) {
      continue;
    }

    const normalized = normalizeUrl(href);
    if (normalized.startsWith(base)) {
      if (normalized !== current) {
        links.push(normalized);
      }
    } else if (isRootRelative(href)) {
      links.push(resolveRootRelative(href, base));
    }
  }

  return links;
}

export class RegexLinkExtractor implements LinkExtractor {
  extract(content: string, baseUrl: string, currentUrl: string): string[] {
    return extractLinks(content, baseUrl, currentUrl);
  }
}
