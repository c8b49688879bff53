/**
 * Selector-driven extraction of repeated items (result rows, story cards, job cards).
 */

import { parse, type HTMLElement } from 'node-html-parser';

export interface ListingSelectors {
  items: string;
  title: string;
  snippet?: string;
  company?: string;
  /** Items considered, counted before any filtering. */
  limit: number;
}

export interface ListingItem {
  title: string;
  url: string;
  snippet: string;
  company: string;
  /** Full text of the item. */
  text: string;
}

export function cleanText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function decodeRedirect(url: URL): string | null {
  // DuckDuckGo: /l/?uddg=<encoded target>
  if (url.hostname.endsWith('duckduckgo.com') && (url.pathname === '/l' || url.pathname === '/l/')) {
    return url.searchParams.get('uddg');
  }
  // Google: /url?q=<target>
  if (url.hostname.includes('google.') && url.pathname === '/url') {
    return url.searchParams.get('q') ?? url.searchParams.get('url');
  }
  return null;
}

/**
 * Absolute http(s) URL for an href, with search-engine redirects unwrapped.
 * Returns '' for anything that does not resolve to http(s).
 */
export function resolveHref(href: string | undefined, baseUrl = 'https://duckduckgo.com/'): string {
  const raw = href?.trim();
  if (!raw || raw.startsWith('javascript:')) return '';

  let url: URL;
  try {
    url = new URL(raw, baseUrl);
  } catch {
    return '';
  }

  const redirected = decodeRedirect(url);
  if (redirected !== null) return resolveHref(redirected, baseUrl);
  return url.protocol === 'http:' || url.protocol === 'https:' ? url.toString() : '';
}

function textOf(el: HTMLElement | null | undefined): string {
  return el ? cleanText(el.text) : '';
}

function linkOf(item: HTMLElement, titleEl: HTMLElement): HTMLElement | null {
  if (titleEl.tagName === 'A') return titleEl;
  return item.querySelector('a[href]');
}

export function extractListing(html: string, selectors: ListingSelectors, baseUrl?: string): ListingItem[] {
  const root = parse(html);
  const items: ListingItem[] = [];

  for (const item of root.querySelectorAll(selectors.items).slice(0, selectors.limit)) {
    const titleEl = item.querySelector(selectors.title);
    if (!titleEl) continue;
    const title = textOf(titleEl);
    if (!title) continue;

    items.push({
      title,
      url: resolveHref(linkOf(item, titleEl)?.getAttribute('href'), baseUrl),
      snippet: selectors.snippet ? textOf(item.querySelector(selectors.snippet)) : '',
      company: selectors.company ? textOf(item.querySelector(selectors.company)) : '',
      text: textOf(item),
    });
  }
  return items;
}
