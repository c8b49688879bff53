import type { Confidence, EntityRecord, InventoryResult } from '@corroborate/schemas';

/** Score desc, then observation count desc, then first seen. Returns a new array. */
export function rankRecords<T extends EntityRecord>(records: readonly T[]): T[] {
  return [...records].sort(
    (a, b) =>
      b.corroborationScore - a.corroborationScore ||
      b.observationCount - a.observationCount ||
      a.firstSeen - b.firstSeen,
  );
}

export interface InventoryQuery {
  region?: string;
  category?: string;
  minScore?: number;
  limit?: number;
}

/** Filter ranked records; order is preserved. Text filters are case-insensitive exact matches. */
export function queryInventory(
  records: readonly EntityRecord[],
  query: InventoryQuery = {},
): EntityRecord[] {
  const region = query.region?.trim().toLowerCase();
  const category = query.category?.trim().toLowerCase();

  const matches = records.filter((r) => {
    if (region && r.region.toLowerCase() !== region) return false;
    if (category && !r.categories.some((c) => c.toLowerCase() === category)) return false;
    if (query.minScore !== undefined && r.corroborationScore < query.minScore) return false;
    return true;
  });
  return query.limit !== undefined ? matches.slice(0, Math.max(0, query.limit)) : matches;
}

export function confidenceLabel(score: number): Confidence {
  if (score >= 2) return 'High';
  if (score === 1) return 'Medium';
  return 'Low';
}

export const HIGH_CONFIDENCE_SCORE = 2;
const TOP_CATEGORIES = 15;
const TOP_ATTRIBUTES = 12;

export interface CountEntry {
  name: string;
  count: number;
}

export interface RegionSummary {
  region: string;
  entities: number;
  topAttribute: string | null;
  topCategory: string | null;
}

export interface InventorySummary {
  rawObservations: number;
  uniqueEntities: number;
  highConfidence: number;
  regions: RegionSummary[];
  topCategories: CountEntry[];
  topAttributes: CountEntry[];
}

/** Counts sorted by count desc; Map insertion order breaks ties. */
function tally(values: Iterable<string>): CountEntry[] {
  const counts = new Map<string, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  return [...counts.entries()]
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count);
}

export function summarizeInventory(result: InventoryResult): InventorySummary {
  const { records } = result;

  const regions = tally(records.map((r) => r.region || 'Unknown')).map(({ name, count }) => {
    const inRegion = records.filter((r) => (r.region || 'Unknown') === name);
    return {
      region: name,
      entities: count,
      topAttribute: tally(inRegion.flatMap((r) => r.attributes))[0]?.name ?? null,
      topCategory: tally(inRegion.flatMap((r) => r.categories))[0]?.name ?? null,
    };
  });

  return {
    rawObservations: result.rawObservationCount,
    uniqueEntities: records.length,
    highConfidence: records.filter((r) => r.corroborationScore >= HIGH_CONFIDENCE_SCORE).length,
    regions,
    topCategories: tally(records.flatMap((r) => r.categories)).slice(0, TOP_CATEGORIES),
    topAttributes: tally(records.flatMap((r) => r.attributes)).slice(0, TOP_ATTRIBUTES),
  };
}
