/**
 * Corroboration aggregator: folds Observations into one EntityRecord per canonical key.
 * The score is the number of distinct evidence kinds behind a record.
 */

import {
  confidenceRank,
  type Confidence,
  type EntityRecord,
  type EvidenceKind,
  type InventoryResult,
  type Observation,
  type RejectionCounts,
} from '@corroborate/schemas';
import { createLogger } from '../logging';
import { defaultExclusionPolicy, type ExclusionPolicy } from '../normalize/exclusion';
import { normalizeEntityName } from '../normalize/entity-name';
import { rankRecords } from './ranking';

const logger = createLogger('Aggregator');

export const DEFAULT_GENERIC_REGIONS = ['GCC', 'Middle East', 'Global', 'Multi-country'] as const;
export const DEFAULT_MIN_KEY_LENGTH = 3;
export const DEFAULT_MAX_DISPLAY_SOURCES = 10;

export interface AggregatorOptions {
  exclusion?: ExclusionPolicy;
  /** Broad region labels that any later non-empty region replaces. Case-insensitive. */
  genericRegions?: readonly string[];
  minKeyLength?: number;
  maxDisplaySources?: number;
}

interface Accumulator {
  canonicalKey: string;
  displayName: string;
  region: string;
  attributes: Set<string>;
  categories: Set<string>;
  evidenceKinds: Set<EvidenceKind>;
  sources: string[];
  observationCount: number;
  bestConfidence: Confidence | null;
  firstSeen: number;
}

export class CorroborationAggregator {
  private readonly exclusion: ExclusionPolicy;
  private readonly genericRegions: Set<string>;
  private readonly minKeyLength: number;
  private readonly maxDisplaySources: number;
  private readonly byKey = new Map<string, Accumulator>();
  private readonly rejected: RejectionCounts = { excluded: 0, tooShort: 0, excludedAfterMerge: 0 };
  private observed = 0;

  constructor(options: AggregatorOptions = {}) {
    this.exclusion = options.exclusion ?? defaultExclusionPolicy;
    this.genericRegions = new Set(
      (options.genericRegions ?? DEFAULT_GENERIC_REGIONS).map((r) => r.trim().toLowerCase()),
    );
    this.minKeyLength = options.minKeyLength ?? DEFAULT_MIN_KEY_LENGTH;
    this.maxDisplaySources = options.maxDisplaySources ?? DEFAULT_MAX_DISPLAY_SOURCES;
  }

  /** Observations seen so far, including rejected ones. */
  get observationCount(): number {
    return this.observed;
  }

  add(observation: Observation): void {
    this.observed++;
    const rawName = observation.entityName;

    if (this.exclusion.isExcluded(rawName)) {
      this.rejected.excluded++;
      logger.debug(`Excluded "${rawName}" from ${observation.sourceLabel}`);
      return;
    }

    const key = normalizeEntityName(rawName);
    if (key.length < this.minKeyLength) {
      this.rejected.tooShort++;
      logger.debug(`Dropped "${rawName}": key "${key}" is too short`);
      return;
    }

    let acc = this.byKey.get(key);
    if (!acc) {
      acc = {
        canonicalKey: key,
        displayName: '',
        region: '',
        attributes: new Set(),
        categories: new Set(),
        evidenceKinds: new Set(),
        sources: [],
        observationCount: 0,
        bestConfidence: null,
        firstSeen: this.byKey.size,
      };
      this.byKey.set(key, acc);
    }
    this.merge(acc, observation);
  }

  /** Apply the final exclusion pass, score and rank. The aggregator stays usable afterwards. */
  finalize(): InventoryResult {
    const records: EntityRecord[] = [];
    let excludedAfterMerge = 0;

    for (const acc of this.byKey.values()) {
      if (this.exclusion.isExcluded(acc.canonicalKey)) {
        excludedAfterMerge++;
        logger.debug(`Dropped merged record "${acc.canonicalKey}": excluded name`);
        continue;
      }
      const evidenceKinds = [...acc.evidenceKinds].sort();
      records.push(
        Object.freeze({
          canonicalKey: acc.canonicalKey,
          displayName: acc.displayName,
          region: acc.region,
          attributes: [...acc.attributes].sort(),
          categories: [...acc.categories].sort(),
          evidenceKinds,
          sources: acc.sources.slice(0, this.maxDisplaySources),
          observationCount: acc.observationCount,
          bestConfidence: acc.bestConfidence,
          corroborationScore: evidenceKinds.length,
          firstSeen: acc.firstSeen,
        }),
      );
    }

    const ranked = rankRecords(records);
    logger.info(`Corroboration: ${this.observed} observations → ${ranked.length} unique entities`);
    return {
      records: ranked,
      rawObservationCount: this.observed,
      rejected: { ...this.rejected, excludedAfterMerge },
    };
  }

  private merge(acc: Accumulator, obs: Observation): void {
    if (obs.entityName.length > acc.displayName.length) acc.displayName = obs.entityName;

    if (!acc.region) {
      acc.region = obs.region;
    } else if (obs.region && this.isGeneric(acc.region)) {
      acc.region = obs.region;
    }

    for (const attribute of obs.attributes) acc.attributes.add(attribute);
    if (obs.category) acc.categories.add(obs.category);
    acc.evidenceKinds.add(obs.evidenceKind);
    if (obs.sourceLabel && !acc.sources.includes(obs.sourceLabel)) acc.sources.push(obs.sourceLabel);
    acc.observationCount++;
    if (confidenceRank(obs.confidence) > confidenceRank(acc.bestConfidence)) {
      acc.bestConfidence = obs.confidence;
    }
  }

  private isGeneric(region: string): boolean {
    return this.genericRegions.has(region.trim().toLowerCase());
  }
}

/** Fold a complete batch of observations. */
export function foldObservations(
  observations: Iterable<Observation>,
  options: AggregatorOptions = {},
): InventoryResult {
  const aggregator = new CorroborationAggregator(options);
  for (const observation of observations) aggregator.add(observation);
  return aggregator.finalize();
}
