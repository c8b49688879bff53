import type {
  AppConfig,
  BlockedOrigin,
  BlockedOriginRegistry,
  DocumentFetcher,
  ExclusionPolicy,
  InventorySummary,
} from '@corroborate/core';
import type { AdapterError, SourceAdapter } from '@corroborate/agents';
import type { InventoryResult, TargetProfile } from '@corroborate/schemas';

export type FetcherFactory = (adapterId: string, registry: BlockedOriginRegistry) => DocumentFetcher;

export interface InventoryRunOptions {
  config: AppConfig;
  /** Adapter ids to activate, in order. Defaults to every adapter in the catalog. */
  sources?: readonly string[];
  /** Adapters run at the same time. */
  concurrency?: number;
  /** When set, the report is written here. */
  outputDir?: string;
  profile?: TargetProfile;
  /** Adapter catalog; defaults to the bundled adapters. */
  adapters?: readonly SourceAdapter[];
  exclusion?: ExclusionPolicy;
  createFetcher?: FetcherFactory;
  now?: () => Date;
}

export type SourceStatus = 'ok' | 'failed';

export interface SourceRunStats {
  id: string;
  label: string;
  status: SourceStatus;
  observations: number;
  failedFetches: number;
  errors: AdapterError[];
  /** Set when the adapter threw. */
  error?: string;
  durationMs: number;
}

export interface InventoryRun {
  result: InventoryResult;
  summary: InventorySummary;
  sources: SourceRunStats[];
  skippedSources: string[];
  blockedOrigins: BlockedOrigin[];
  startedAt: Date;
  finishedAt: Date;
  reportPath: string | null;
}
