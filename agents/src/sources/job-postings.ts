/**
 * Organizations hiring in-house staff for the tracked platform: search results plus job boards.
 * Boards that refuse direct access are served through the fetcher's fallback chain,
 * so their selectors also accept search-result markup.
 */

import type { TargetProfile } from '@corroborate/schemas';
import { extractHiringCompany, inferRoleProducts } from '../extract/index.js';
import { extractListing, type ListingSelectors } from '../html/listing.js';
import { AdapterRun } from '../shared/adapter-run.js';
import type { AdapterContext, AdapterResult, SourceAdapter } from '../shared/types.js';

const RESULTS_PER_QUERY = 15;

const BOARD_ITEMS: ListingSelectors = {
  items:
    ".result, div.g, li.has-pointer-d, .job-item, [data-job-id], article, [class*='job']",
  title: "a.result__a, h3, h2 a, .jb-title a, a[class*='title'], a.job-title",
  company: "[class*='company'], .jb-company, .employer, .org",
  limit: 12,
};

function roleProducts(text: string, profile: TargetProfile): string[] {
  return inferRoleProducts(text, profile.roleKeywords, profile.unspecifiedProduct);
}

async function collectSearchPostings(run: AdapterRun): Promise<void> {
  const { profile } = run.context;
  for (const [region, queries] of Object.entries(profile.sources.jobs.searchQueries)) {
    for (const query of queries) {
      for (const result of await run.search(query, RESULTS_PER_QUERY)) {
        const name = extractHiringCompany(result.title, result.snippet, (n) => run.isExcluded(n));
        if (run.isExcluded(name)) continue;

        run.emit({
          entityName: name,
          region,
          attributes: roleProducts(`${result.title} ${result.snippet}`, profile),
          evidenceKind: 'hiring-signal',
          confidence: 'Medium',
          sourceLabel: 'Job Posting',
          referenceUrl: result.url,
          excerpt: `Hiring ${profile.focusTerm} staff: ${result.title.slice(0, 100)}`,
        });
      }
    }
  }
}

async function collectBoardPostings(run: AdapterRun): Promise<void> {
  const { profile } = run.context;
  const focus = profile.focusTerm.toLowerCase();

  for (const [region, boards] of Object.entries(profile.sources.jobs.boards)) {
    for (const board of boards) {
      const body = await run.load(board.url);
      if (body === null) continue;

      for (const item of extractListing(body, BOARD_ITEMS, board.url)) {
        if (!item.title.toLowerCase().includes(focus)) continue;
        const name = item.company || extractHiringCompany(item.title, '', (n) => run.isExcluded(n));
        if (!name || run.isExcluded(name)) continue;

        run.emit({
          entityName: name,
          region,
          attributes: roleProducts(item.title, profile),
          evidenceKind: 'hiring-signal',
          confidence: 'Medium',
          sourceLabel: board.label,
          referenceUrl: item.url,
          excerpt: `Hiring: ${item.title.slice(0, 100)}`,
        });
      }
    }
  }
}

export const jobPostingsAdapter: SourceAdapter = {
  id: 'jobs',
  label: 'Job postings',
  description: 'In-house hiring for the platform via search and regional job boards',
  async collect(context: AdapterContext): Promise<AdapterResult> {
    const run = new AdapterRun(jobPostingsAdapter, context);
    await collectSearchPostings(run);
    await collectBoardPostings(run);
    return run.finish();
  },
};
