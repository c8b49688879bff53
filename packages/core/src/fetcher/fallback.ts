/**
 * Alternate retrieval routes used once an origin refuses direct access.
 */

const KEYWORD_PATTERN = /[a-zA-Z]{3,}/g;
const MAX_KEYWORDS = 5;

/** Cached copy of the exact target, e.g. https://web.archive.org/web/2/<target>. */
export function buildCacheUrl(target: string, cacheServiceUrl: string): URL {
  return new URL(`${cacheServiceUrl}${target}`);
}

/**
 * Keywords taken from the target's raw query string, or its path when there is no query.
 */
export function extractSearchTerms(target: URL, fallbackTerm: string): string {
  const source = target.search.replace(/^\?/, '') || target.pathname;
  const keywords = source.match(KEYWORD_PATTERN) ?? [];
  return keywords.length > 0 ? keywords.slice(0, MAX_KEYWORDS).join(' ') : fallbackTerm;
}

/** Search restricted to the blocked host: `site:<host> <terms>`. */
export function buildSearchUrl(target: URL, searchServiceUrl: string, fallbackTerm: string): URL {
  const url = new URL(searchServiceUrl);
  url.searchParams.set('q', `site:${target.host} ${extractSearchTerms(target, fallbackTerm)}`);
  return url;
}
