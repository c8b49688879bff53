/**
 * Curated seed list: organizations already confirmed from public references.
 * No network access; every entry becomes a High-confidence reference observation.
 */

import { z } from 'zod';
import seedEntities from '../../data/seed-entities.json';
import { AdapterRun } from '../shared/adapter-run.js';
import type { AdapterContext, AdapterResult, SourceAdapter } from '../shared/types.js';

export const seedEntitySchema = z.object({
  name: z.string().min(1),
  region: z.string().default(''),
  attributes: z.array(z.string()).default([]),
  category: z.string().default(''),
});
export type SeedEntity = z.infer<typeof seedEntitySchema>;

export const SEED_SOURCE_LABEL = 'Curated Seed List';

export function loadSeedEntities(raw: unknown = seedEntities): SeedEntity[] {
  return z.array(seedEntitySchema).parse(raw);
}

export function createSeedListAdapter(entries: readonly SeedEntity[] = loadSeedEntities()): SourceAdapter {
  const adapter: SourceAdapter = {
    id: 'seed',
    label: 'Seed list',
    description: 'Curated organizations with confirmed public references',
    async collect(context: AdapterContext): Promise<AdapterResult> {
      const run = new AdapterRun(adapter, context);
      for (const entry of entries) {
        run.emit({
          entityName: entry.name,
          region: entry.region,
          attributes: entry.attributes,
          category: entry.category,
          evidenceKind: 'reference',
          confidence: 'High',
          sourceLabel: SEED_SOURCE_LABEL,
          excerpt: `Known ${context.profile.focusTerm} customer: ${entry.category || 'N/A'}`,
        });
      }
      return run.finish();
    },
  };
  return adapter;
}

export const seedListAdapter = createSeedListAdapter();
