/**
 * Orchestrator: activates source adapters, isolates their failures, folds the
 * combined observations and (optionally) writes the report.
 */
import {
  BlockedOriginRegistry,
  ResilientFetcher,
  createLogger,
  defaultExclusionPolicy,
  errorMessage,
  fetcherOptionsFromConfig,
  foldObservations,
  summarizeInventory,
} from '@corroborate/core';
import { SOURCE_ADAPTERS, defaultTargetProfile } from '@corroborate/agents';
import type { AdapterContext, SourceAdapter } from '@corroborate/agents';
import type { Observation } from '@corroborate/schemas';
import { buildInventoryReport, writeInventoryReport } from '../report/inventory-report';
import type { FetcherFactory, InventoryRun, InventoryRunOptions, SourceRunStats } from './types';

const logger = createLogger('Orchestrator');

interface Activation {
  adapter: SourceAdapter;
  context: AdapterContext;
}

interface Invocation {
  stats: SourceRunStats;
  observations: Observation[];
}

/** Resolve requested ids against the catalog; unknown ids are reported, duplicates dropped. */
export function selectAdapters(
  catalog: readonly SourceAdapter[],
  requested: readonly string[] | undefined,
): { adapters: SourceAdapter[]; unknown: string[] } {
  if (!requested || requested.length === 0) return { adapters: [...catalog], unknown: [] };

  const byId = new Map(catalog.map((adapter) => [adapter.id, adapter]));
  const adapters: SourceAdapter[] = [];
  const unknown: string[] = [];
  for (const raw of requested) {
    const id = raw.trim().toLowerCase();
    if (!id) continue;
    const adapter = byId.get(id);
    if (!adapter) unknown.push(raw);
    else if (!adapters.includes(adapter)) adapters.push(adapter);
  }
  return { adapters, unknown };
}

/** Run `fn` over items with at most `limit` in flight; results keep item order. */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await fn(item, index);
    }
  };

  const workers = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workers }, worker));
  return results;
}

async function invoke({ adapter, context }: Activation): Promise<Invocation> {
  const started = Date.now();
  logger.info(`Running source "${adapter.id}"`);
  try {
    const { observations, errors } = await adapter.collect(context);
    return {
      observations,
      stats: {
        id: adapter.id,
        label: adapter.label,
        status: 'ok',
        observations: observations.length,
        failedFetches: errors.length,
        errors,
        durationMs: Date.now() - started,
      },
    };
  } catch (err) {
    const message = errorMessage(err);
    logger.error(`Source "${adapter.id}" failed: ${message}`);
    return {
      observations: [],
      stats: {
        id: adapter.id,
        label: adapter.label,
        status: 'failed',
        observations: 0,
        failedFetches: 0,
        errors: [],
        error: message,
        durationMs: Date.now() - started,
      },
    };
  }
}

export async function runInventory(options: InventoryRunOptions): Promise<InventoryRun> {
  const now = options.now ?? (() => new Date());
  const startedAt = now();
  const { config } = options;
  const profile = options.profile ?? defaultTargetProfile();
  const exclusion = options.exclusion ?? defaultExclusionPolicy;
  const registry = new BlockedOriginRegistry();

  const createFetcher: FetcherFactory =
    options.createFetcher ??
    ((adapterId, sharedRegistry) =>
      new ResilientFetcher({
        ...fetcherOptionsFromConfig(config.fetch),
        registry: sharedRegistry,
        name: adapterId,
        defaultSearchTerm: profile.focusTerm,
      }));

  const { adapters, unknown } = selectAdapters(options.adapters ?? SOURCE_ADAPTERS, options.sources);
  for (const id of unknown) logger.warn(`Unknown source "${id}" skipped`);

  const activations: Activation[] = adapters.map((adapter) => ({
    adapter,
    context: {
      fetcher: createFetcher(adapter.id, registry),
      profile,
      searchServiceUrl: config.fetch.searchServiceUrl,
      exclusion,
    },
  }));

  const invocations = await mapWithConcurrency(activations, options.concurrency ?? 1, invoke);
  const observations = invocations.flatMap((invocation) => invocation.observations);
  logger.info(`Collected ${observations.length} observations from ${activations.length} sources`);

  const result = foldObservations(observations, { exclusion });
  const summary = summarizeInventory(result);
  const finishedAt = now();

  const run: InventoryRun = {
    result,
    summary,
    sources: invocations.map((invocation) => invocation.stats),
    skippedSources: unknown,
    blockedOrigins: registry.entries(),
    startedAt,
    finishedAt,
    reportPath: null,
  };

  if (options.outputDir) {
    run.reportPath = await writeInventoryReport(buildInventoryReport(run), options.outputDir);
    logger.success(`Report written to ${run.reportPath}`);
  }
  return run;
}
