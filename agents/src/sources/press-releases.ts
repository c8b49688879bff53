/**
 * Press coverage of go-lives and selections, found through the search service.
 */

import { detectProducts, extractPressCustomer, inferRegion } from '../extract/index.js';
import { AdapterRun } from '../shared/adapter-run.js';
import type { AdapterContext, AdapterResult, SourceAdapter } from '../shared/types.js';

const RESULTS_PER_QUERY = 10;

export function expandPressQueries(templates: readonly string[], region: string): string[] {
  return templates.map((template) => template.replaceAll('{region}', region));
}

export const pressReleasesAdapter: SourceAdapter = {
  id: 'press',
  label: 'Press releases',
  description: 'Search-based press releases announcing implementations',
  async collect(context: AdapterContext): Promise<AdapterResult> {
    const run = new AdapterRun(pressReleasesAdapter, context);
    const { profile } = context;
    const focus = profile.focusTerm.toLowerCase();

    for (const defaultRegion of profile.sources.press.regions) {
      for (const query of expandPressQueries(profile.sources.press.queryTemplates, defaultRegion)) {
        for (const result of await run.search(query, RESULTS_PER_QUERY)) {
          const combined = `${result.title} ${result.snippet}`;
          const name = extractPressCustomer(combined, profile.focusTerm, (n) => run.isExcluded(n));
          if (run.isExcluded(name)) continue;

          const products = detectProducts(combined, profile.products);
          if (products.length === 0 && !combined.toLowerCase().includes(focus)) continue;

          run.emit({
            entityName: name,
            region: inferRegion(combined, profile.regions) || defaultRegion,
            attributes: products,
            evidenceKind: 'announcement',
            confidence: 'High',
            sourceLabel: 'Press Release',
            referenceUrl: result.url,
            excerpt: result.title,
          });
        }
      }
    }
    return run.finish();
  },
};
