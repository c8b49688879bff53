import { describe, it, expect } from 'vitest';
import { extractListing, parseSearchResults, resolveHref } from '@corroborate/agents';
import { ddgPage } from './fake-fetcher';

describe('parseSearchResults', () => {
  it('decodes DuckDuckGo redirect links and drops duplicates', () => {
    const html = ddgPage([
      { url: 'https://news.example.test/almarai', title: 'Almarai selects SAP S/4HANA', snippet: 'Riyadh' },
      { url: 'https://example.test/b', title: 'Second' },
      { url: 'https://news.example.test/almarai', title: 'Almarai selects SAP S/4HANA', snippet: 'Riyadh' },
    ]);

    expect(parseSearchResults(html)).toEqual([
      { url: 'https://news.example.test/almarai', title: 'Almarai selects SAP S/4HANA', snippet: 'Riyadh' },
      { url: 'https://example.test/b', title: 'Second', snippet: '' },
    ]);
  });

  it('skips rows without a result link', () => {
    const html = `<div class="result"><span>Sponsored</span></div>${ddgPage([{ url: 'https://example.test/a', title: 'Only' }])}`;
    expect(parseSearchResults(html).map((r) => r.title)).toEqual(['Only']);
  });

  it('respects the limit', () => {
    const html = ddgPage([
      { url: 'https://example.test/1', title: 'One' },
      { url: 'https://example.test/2', title: 'Two' },
      { url: 'https://example.test/3', title: 'Three' },
    ]);
    expect(parseSearchResults(html, 2).map((r) => r.title)).toEqual(['One', 'Two']);
  });

  it('reads Google result markup', () => {
    const html = `
      <div class="g">
        <a href="/url?q=https://corp.example.test/news"><h3>Corp news</h3></a>
        <div class="VwiC3b">Go-live announced</div>
      </div>`;
    expect(parseSearchResults(html)).toEqual([
      { url: 'https://corp.example.test/news', title: 'Corp news', snippet: 'Go-live announced' },
    ]);
  });
});

describe('resolveHref', () => {
  it('resolves relative links against the page', () => {
    expect(resolveHref('/job/1', 'https://board.test/jobs?q=x')).toBe('https://board.test/job/1');
  });

  it('rejects non-http links', () => {
    expect(resolveHref('javascript:void(0)')).toBe('');
    expect(resolveHref('mailto:jobs@example.test')).toBe('');
    expect(resolveHref(undefined)).toBe('');
  });
});

describe('extractListing', () => {
  it('collects title, link and company per item', () => {
    const html = `
      <ul>
        <li class="job-card"><h2><a href="/job/1">SAP FICO Analyst</a></h2><span class="company-name">Fourth Coffee</span></li>
        <li class="job-card"><p>no title</p></li>
      </ul>`;
    const items = extractListing(
      html,
      { items: 'li.job-card', title: 'h2 a', company: "[class*='company']", limit: 10 },
      'https://board.test/jobs',
    );
    expect(items).toEqual([
      {
        title: 'SAP FICO Analyst',
        url: 'https://board.test/job/1',
        snippet: '',
        company: 'Fourth Coffee',
        text: 'SAP FICO AnalystFourth Coffee',
      },
    ]);
  });
});
