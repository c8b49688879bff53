/**
 * Conference agendas and speaker announcements.
 */

import { detectProducts, extractSpeakerOrg, inferRegion, withRegionHints } from '../extract/index.js';
import { AdapterRun } from '../shared/adapter-run.js';
import type { AdapterContext, AdapterResult, SourceAdapter } from '../shared/types.js';

const RESULTS_PER_QUERY = 10;

export const conferenceAdapter: SourceAdapter = {
  id: 'events',
  label: 'Conferences',
  description: 'Speakers and agenda mentions at regional conferences',
  async collect(context: AdapterContext): Promise<AdapterResult> {
    const run = new AdapterRun(conferenceAdapter, context);
    const { profile } = context;
    const focus = profile.focusTerm.toLowerCase();
    const regions = withRegionHints(profile.regions, profile.sources.events.regionHints);

    for (const query of profile.sources.events.queries) {
      for (const result of await run.search(query, RESULTS_PER_QUERY)) {
        const combined = `${result.title} ${result.snippet}`;
        if (!combined.toLowerCase().includes(focus)) continue;

        const entityName = extractSpeakerOrg(combined, (n) => run.isExcluded(n));
        if (run.isExcluded(entityName)) continue;

        run.emit({
          entityName,
          region: inferRegion(combined, regions) || profile.genericRegion,
          attributes: detectProducts(combined, profile.products),
          evidenceKind: 'event-mention',
          confidence: 'Medium',
          sourceLabel: 'Conference',
          referenceUrl: result.url,
          excerpt: result.title,
        });
      }
    }
    return run.finish();
  },
};
