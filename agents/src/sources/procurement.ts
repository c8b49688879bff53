/**
 * Public-sector tenders mentioning the platform, found through the search service.
 */

import { detectProducts, extractProcuringOrg } from '../extract/index.js';
import { AdapterRun } from '../shared/adapter-run.js';
import type { AdapterContext, AdapterResult, SourceAdapter } from '../shared/types.js';

const RESULTS_PER_QUERY = 10;

export const procurementAdapter: SourceAdapter = {
  id: 'gov',
  label: 'Procurement',
  description: 'Government tenders and procurement notices',
  async collect(context: AdapterContext): Promise<AdapterResult> {
    const run = new AdapterRun(procurementAdapter, context);
    const { profile } = context;
    const keywords = profile.sources.gov.keywords.map((k) => k.toLowerCase());

    for (const [region, queries] of Object.entries(profile.sources.gov.queries)) {
      for (const query of queries) {
        for (const result of await run.search(query, RESULTS_PER_QUERY)) {
          const title = result.title.toLowerCase();
          if (!keywords.some((k) => title.includes(k))) continue;
          const name = extractProcuringOrg(result.title);
          if (run.isExcluded(name)) continue;

          run.emit({
            entityName: name,
            region,
            attributes: detectProducts(result.title, profile.products),
            category: 'Government',
            evidenceKind: 'procurement',
            confidence: 'Medium',
            sourceLabel: 'Procurement',
            referenceUrl: result.url,
            excerpt: result.title,
          });
        }
      }
    }
    return run.finish();
  },
};
