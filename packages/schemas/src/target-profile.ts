import { z } from 'zod';

/**
 * What the source adapters look for: the tracked vendor term, its product catalog,
 * regions and the query/endpoint catalog per source.
 */

export const regionDefinitionSchema = z.object({
  label: z.string().min(1),
  terms: z.array(z.string().min(1)).min(1),
});
export type RegionDefinition = z.infer<typeof regionDefinitionSchema>;

const regionQueries = z.record(z.string(), z.array(z.string()));

export const targetProfileSchema = z.object({
  focusTerm: z.string().min(1),
  genericRegion: z.string().min(1),
  products: z.array(z.string()).min(1),
  roleKeywords: z.record(z.string(), z.string()),
  unspecifiedProduct: z.string(),
  regions: z.array(regionDefinitionSchema).min(1),
  sources: z.object({
    stories: z.object({
      storiesUrl: z.string().url(),
      regionQueries: z.array(z.string()),
      newsUrl: z.string().url(),
      newsQueries: z.array(z.string()),
    }),
    press: z.object({
      regions: z.array(z.string()),
      queryTemplates: z.array(z.string()),
    }),
    jobs: z.object({
      searchQueries: regionQueries,
      boards: z.record(
        z.string(),
        z.array(z.object({ label: z.string(), url: z.string().url() })),
      ),
    }),
    gov: z.object({
      queries: regionQueries,
      keywords: z.array(z.string()).min(1),
    }),
    events: z.object({
      queries: z.array(z.string()),
      regionHints: z.record(z.string(), z.array(z.string())),
    }),
  }),
});

export type TargetProfile = z.infer<typeof targetProfileSchema>;
