/**
 * Vendor customer-story pages (case studies) and the vendor news center (announcements).
 */

import { detectProducts, extractCustomerName, inferRegion } from '../extract/index.js';
import { extractListing, type ListingSelectors } from '../html/listing.js';
import { AdapterRun, fillUrlTemplate } from '../shared/adapter-run.js';
import type { AdapterContext, AdapterResult, SourceAdapter } from '../shared/types.js';

const STORY_CARDS: ListingSelectors = {
  items: "[class*='card'], [class*='story'], article, .customer-story",
  title: "h2, h3, h4, [class*='title']",
  limit: 20,
};

const NEWS_ARTICLES: ListingSelectors = {
  items: 'article, .post-item, .search-result-item',
  title: 'h2 a, h3 a, .entry-title a',
  limit: 10,
};

async function collectStories(run: AdapterRun, regionQuery: string): Promise<void> {
  const { profile } = run.context;
  const pageUrl = fillUrlTemplate(profile.sources.stories.storiesUrl, regionQuery);
  const body = await run.load(pageUrl);
  if (body === null) return;

  for (const card of extractListing(body, STORY_CARDS, pageUrl)) {
    const name = extractCustomerName(card.title, profile.focusTerm, (n) => run.isExcluded(n));
    if (run.isExcluded(name)) continue;
    // Stories without a recognizable region are not region evidence.
    const region = inferRegion(`${card.title} ${card.text}`, profile.regions);
    if (!region) continue;

    run.emit({
      entityName: name,
      region,
      attributes: detectProducts(card.title, profile.products),
      evidenceKind: 'case-study',
      confidence: 'High',
      sourceLabel: `${profile.focusTerm} Customer Stories`,
      referenceUrl: card.url,
      excerpt: card.title,
    });
  }
}

async function collectNews(run: AdapterRun, query: string): Promise<void> {
  const { profile } = run.context;
  const pageUrl = fillUrlTemplate(profile.sources.stories.newsUrl, query);
  const body = await run.load(pageUrl);
  if (body === null) return;

  for (const article of extractListing(body, NEWS_ARTICLES, pageUrl)) {
    const name = extractCustomerName(article.title, profile.focusTerm, (n) => run.isExcluded(n));
    if (run.isExcluded(name)) continue;

    run.emit({
      entityName: name,
      region: inferRegion(article.title, profile.regions) || profile.genericRegion,
      attributes: detectProducts(article.title, profile.products),
      evidenceKind: 'announcement',
      confidence: 'High',
      sourceLabel: `${profile.focusTerm} News`,
      referenceUrl: article.url,
      excerpt: article.title,
    });
  }
}

export const customerStoriesAdapter: SourceAdapter = {
  id: 'stories',
  label: 'Customer stories',
  description: 'Vendor customer stories and news center announcements',
  async collect(context: AdapterContext): Promise<AdapterResult> {
    const run = new AdapterRun(customerStoriesAdapter, context);
    const { stories } = context.profile.sources;
    for (const regionQuery of stories.regionQueries) await collectStories(run, regionQuery);
    for (const query of stories.newsQueries) await collectNews(run, query);
    return run.finish();
  },
};
