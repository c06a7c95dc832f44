const REJECTED_PREFIXES = ['mailto:', 'tel:', 'javascript:'];

export function isHttpUrl(input: string): boolean {
  try {
    const u = new URL(input);
    return u.protocol === 'http:' || u.protocol === 'https:';
  } catch {
    return false;
  }
}

const stripParams = (pathname: string): string => {
  // `;params` only ever belong to the last path segment
  const lastSegmentStart = pathname.lastIndexOf('/');
  const paramsStart = pathname.indexOf(';', lastSegmentStart + 1);
  return paramsStart === -1 ? pathname : pathname.slice(0, paramsStart);
};

const stripTrailingSlashes = (pathname: string): string => pathname.replace(/\/+$/, '');

const canonicalPath = (pathname: string): string => {
  // Stripping `;params` can expose an earlier segment that carries its own,
  // so repeat until the path is stable
  let path = stripTrailingSlashes(pathname);
  let previous: string;
  do {
    previous = path;
    path = stripTrailingSlashes(stripParams(path));
  } while (path !== previous);
  return path || '/';
};

/**
 * Resolves `href` against `base` and returns the canonical form used as the
 * crawl identity of a page, or `null` when the link cannot be crawled.
 *
 * Fragments and `;params` are dropped, the query string is kept, and a
 * non-root path loses its trailing slashes. Applying it to its own output
 * returns the same string.
 */
export function normalizeUrl(base: string, href: string): string | null {
  const candidate = href.trim();
  if (!candidate) return null;

  const lower = candidate.toLowerCase();
  if (REJECTED_PREFIXES.some(prefix => lower.startsWith(prefix))) return null;

  let url: URL;
  try {
    url = new URL(candidate, base);
  } catch {
    return null;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;

  url.hash = '';
  url.pathname = canonicalPath(url.pathname);

  return url.toString();
}

export function getNetworkLocation(input: string): string {
  return new URL(input).host;
}

export function isSameDomain(url: string, rootNetworkLocation: string): boolean {
  try {
    return getNetworkLocation(url) === rootNetworkLocation;
  } catch {
    return false;
  }
}
