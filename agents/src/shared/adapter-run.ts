import { createLogger, type Logger } from '@corroborate/core';
import { createObservation, type Observation, type ObservationInput } from '@corroborate/schemas';
import { parseSearchResults, type SearchResult } from '../html/search-results.js';
import type { AdapterContext, AdapterError, AdapterResult, SourceAdapter } from './types.js';

/** Build a search-service URL for a free-text query. */
export function buildSearchQueryUrl(searchServiceUrl: string, query: string): string {
  const url = new URL(searchServiceUrl);
  url.searchParams.set('q', query.trim());
  return url.toString();
}

/** Substitute `{query}` in a URL template with the encoded query. */
export function fillUrlTemplate(template: string, query: string): string {
  return template.replace('{query}', encodeURIComponent(query));
}

/**
 * Per-invocation state of one adapter: collected observations, fetch failures, logger.
 */
export class AdapterRun {
  readonly logger: Logger;
  private readonly observations: Observation[] = [];
  private readonly errors: AdapterError[] = [];

  constructor(
    readonly adapter: Pick<SourceAdapter, 'id' | 'label'>,
    readonly context: AdapterContext,
  ) {
    this.logger = createLogger(`Source:${adapter.id}`);
  }

  /** Fetch a target. A failure is recorded and yields null. */
  async load(target: string): Promise<string | null> {
    const result = await this.context.fetcher.fetch(target);
    if (result.ok) return result.document.body;

    const { reason, detail } = result.failure;
    this.errors.push({ target, reason, detail });
    this.logger.debug(`No document for ${target} (${reason})`);
    return null;
  }

  async search(query: string, limit: number): Promise<SearchResult[]> {
    const body = await this.load(buildSearchQueryUrl(this.context.searchServiceUrl, query));
    return body === null ? [] : parseSearchResults(body, limit);
  }

  isExcluded(name: string): boolean {
    return this.context.exclusion.isExcluded(name);
  }

  emit(input: ObservationInput): void {
    this.observations.push(createObservation(input));
  }

  finish(): AdapterResult {
    this.logger.info(
      `${this.adapter.label}: ${this.observations.length} observations, ${this.errors.length} failed fetches`,
    );
    return { observations: [...this.observations], errors: [...this.errors] };
  }
}
