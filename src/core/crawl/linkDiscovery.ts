import { isSameDomain, normalizeUrl } from '../../utils/urlValidator';
import type { Frontier } from './frontier';

/**
 * Normalizes each href against the page it was found on and keeps those that
 * are valid, on the crawl's network location and not yet visited. Order
 * follows the page; duplicates are kept for the frontier to collapse.
 */
export function discoverLinks(
  pageUrl: string,
  hrefs: readonly string[],
  rootNetworkLocation: string,
  frontier: Pick<Frontier, 'hasVisited'>
): string[] {
  const discovered: string[] = [];
  for (const href of hrefs) {
    const next = normalizeUrl(pageUrl, href);
    if (!next) continue;
    if (!isSameDomain(next, rootNetworkLocation)) continue;
    if (frontier.hasVisited(next)) continue;
    discovered.push(next);
  }
  return discovered;
}
