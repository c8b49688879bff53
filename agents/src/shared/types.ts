/**
 * Contracts between source adapters and the orchestrator.
 */

import type { DocumentFetcher, ExclusionPolicy, FailureReason } from '@corroborate/core';
import type { Observation, TargetProfile } from '@corroborate/schemas';

export interface AdapterContext {
  /** Dedicated to this adapter; shares only the blocked-origin registry with others. */
  fetcher: DocumentFetcher;
  profile: TargetProfile;
  /** Base URL of the HTML search endpoint used for search-driven sources. */
  searchServiceUrl: string;
  exclusion: ExclusionPolicy;
}

export interface AdapterError {
  target: string;
  reason: FailureReason;
  detail: string;
}

export interface AdapterResult {
  observations: Observation[];
  errors: AdapterError[];
}

export interface SourceAdapter {
  id: string;
  label: string;
  description: string;
  collect(context: AdapterContext): Promise<AdapterResult>;
}
