/**
 * Canonical form of a URL used as the dedup key and for scope checks.
 *
 * Scheme and host come out lowercase (the WHATWG parser does that), empty
 * path segments are dropped, leading segments that repeat the host are
 * stripped (`/example.com/foo` is what a relative link glued onto a host
 * looks like) and the fragment is removed. The query is left alone.
 *
 * Input that does not parse as an absolute URL is returned unchanged.
 */
export function normalizeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }

  const host = parsed.hostname;
  const segments = parsed.pathname.split('/').filter(segment => segment.length > 0);

  // Strip every repeat, not just the first, so the result is a fixed point
  while (host && segments[0] === host) {
    segments.shift();
  }

  parsed.pathname = `/${segments.join('/')}`;
  parsed.hash = '';

  return parsed.href;
}

export function isInScope(url: string, baseUrl: string): boolean {
  return normalizeUrl(url).startsWith(normalizeUrl(baseUrl));
}

/** `/about`, but not the protocol-relative `//host/about`. */
export function isRootRelative(href: string): boolean {
  return href.startsWith('/') && !href.startsWith('//');
}

export function resolveRootRelative(href: string, baseUrl: string): string {
  return normalizeUrl(`${baseUrl}${href}`);
}

export function hasFragment(href: string): boolean {
  return href.includes('#');
}

export function ensureProtocol(url: string): string {
  return /^https?:\/\//i.test(url) ? url : `https://${url}`;
}
