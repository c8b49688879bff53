/**
 * Organic results from search-engine HTML pages (DuckDuckGo HTML, Google markup).
 */

import { extractListing, type ListingSelectors } from './listing.js';

export interface SearchResult {
  url: string;
  title: string;
  snippet: string;
}

const DUCKDUCKGO_RESULTS: Omit<ListingSelectors, 'limit'> = {
  items: '.result',
  title: 'a.result__a',
  snippet: '.result__snippet',
};

const GOOGLE_RESULTS: Omit<ListingSelectors, 'limit'> = {
  items: 'div.g',
  title: 'h3',
  snippet: 'div.VwiC3b, span.st, div[data-sncf]',
};

/** First `limit` results, deduplicated by URL and title. */
export function parseSearchResults(html: string, limit = 10): SearchResult[] {
  let rows = extractListing(html, { ...DUCKDUCKGO_RESULTS, limit });
  if (rows.length === 0) rows = extractListing(html, { ...GOOGLE_RESULTS, limit }, 'https://www.google.com/');

  const seen = new Set<string>();
  const results: SearchResult[] = [];
  for (const row of rows) {
    const key = `${row.url.toLowerCase().replace(/\/$/, '')}|${row.title}`;
    if (seen.has(key)) continue;
    seen.add(key);
    results.push({ url: row.url, title: row.title, snippet: row.snippet });
  }
  return results;
}
