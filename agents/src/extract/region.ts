import type { RegionDefinition } from '@corroborate/schemas';

/** Extend region terms with source-specific hints (event names tied to a country). */
export function withRegionHints(
  regions: readonly RegionDefinition[],
  hints: Readonly<Record<string, readonly string[]>>,
): RegionDefinition[] {
  return regions.map((region) => ({
    label: region.label,
    terms: [...region.terms, ...(hints[region.label] ?? [])],
  }));
}

/** Label of the first region with a term contained in the text, or ''. */
export function inferRegion(text: string, regions: readonly RegionDefinition[]): string {
  const lower = text.toLowerCase();
  const match = regions.find((region) => region.terms.some((term) => lower.includes(term.toLowerCase())));
  return match?.label ?? '';
}
