/**
 * Resilient document fetcher.
 *
 * Per request: throttle → rotate identity → GET with timeout → success, retry with
 * exponential backoff, or (on an access-denial status) mark the origin blocked in the
 * shared registry and go through the fallback chain (cached copy, then site search).
 * Network-class failures never escape `fetch`; they come back as a FetchFailure.
 */

import type { AppConfig } from '../config';
import { createLogger, errorMessage, type Logger } from '../logging';
import type { BlockedOriginRegistry } from './blocked-origins';
import { CookieJar } from './cookie-jar';
import { buildCacheUrl, buildSearchUrl } from './fallback';
import { IdentityRotator } from './identity';
import { Throttle, defaultSleep, type Clock, type Sleep } from './throttle';
import {
  parseTarget,
  type DocumentFetcher,
  type FetchedDocument,
  type FetchResult,
  type HttpRequest,
  type RetrievalPath,
} from './types';

export interface ResilientFetcherOptions {
  registry: BlockedOriginRegistry;
  /** Shown in log lines, usually the adapter id. */
  name?: string;
  minIntervalMs?: number;
  maxAttempts?: number;
  timeoutMs?: number;
  backoffBaseMs?: number;
  blockingStatuses?: readonly number[];
  cacheServiceUrl?: string;
  searchServiceUrl?: string;
  /** Search keyword used when the target URL yields none. */
  defaultSearchTerm?: string;
  http?: HttpRequest;
  sleep?: Sleep;
  clock?: Clock;
  identity?: IdentityRotator;
  logger?: Logger;
}

const DEFAULTS = {
  minIntervalMs: 2000,
  maxAttempts: 3,
  timeoutMs: 20_000,
  backoffBaseMs: 1000,
  blockingStatuses: [403],
  cacheServiceUrl: 'https://web.archive.org/web/2/',
  searchServiceUrl: 'https://html.duckduckgo.com/html/',
  defaultSearchTerm: 'customer',
} as const;

/** Map the validated app configuration onto fetcher options. */
export function fetcherOptionsFromConfig(
  config: AppConfig['fetch'],
): Omit<ResilientFetcherOptions, 'registry'> {
  return {
    minIntervalMs: config.minIntervalMs,
    maxAttempts: config.maxAttempts,
    timeoutMs: config.timeoutMs,
    backoffBaseMs: config.backoffBaseMs,
    blockingStatuses: config.blockingStatuses,
    cacheServiceUrl: config.cacheServiceUrl,
    searchServiceUrl: config.searchServiceUrl,
  };
}

function readSetCookie(headers: Headers): string[] {
  if (typeof headers.getSetCookie === 'function') return headers.getSetCookie();
  const raw = headers.get('set-cookie');
  return raw ? [raw] : [];
}

/** Release the connection of a response whose body is not used. */
async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) await response.body.cancel();
}

export class ResilientFetcher implements DocumentFetcher {
  private readonly registry: BlockedOriginRegistry;
  private readonly maxAttempts: number;
  private readonly timeoutMs: number;
  private readonly backoffBaseMs: number;
  private readonly blockingStatuses: readonly number[];
  private readonly cacheServiceUrl: string;
  private readonly searchServiceUrl: string;
  private readonly defaultSearchTerm: string;
  private readonly http: HttpRequest;
  private readonly sleep: Sleep;
  private readonly clock: Clock;
  private readonly throttle: Throttle;
  private readonly identity: IdentityRotator;
  private readonly cookies = new CookieJar();
  private readonly logger: Logger;

  constructor(options: ResilientFetcherOptions) {
    this.registry = options.registry;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
    this.backoffBaseMs = options.backoffBaseMs ?? DEFAULTS.backoffBaseMs;
    this.blockingStatuses = options.blockingStatuses ?? DEFAULTS.blockingStatuses;
    this.cacheServiceUrl = options.cacheServiceUrl ?? DEFAULTS.cacheServiceUrl;
    this.searchServiceUrl = options.searchServiceUrl ?? DEFAULTS.searchServiceUrl;
    this.defaultSearchTerm = options.defaultSearchTerm ?? DEFAULTS.defaultSearchTerm;
    // Resolve the global at call time so a stubbed fetch is picked up.
    this.http = options.http ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? Date.now;
    this.throttle = new Throttle(options.minIntervalMs ?? DEFAULTS.minIntervalMs, this.sleep, this.clock);
    this.identity = options.identity ?? new IdentityRotator();
    this.logger = options.logger ?? createLogger(options.name ? `Fetcher:${options.name}` : 'Fetcher');
  }

  async fetch(target: string): Promise<FetchResult> {
    const url = parseTarget(target);

    let lastDetail = 'no attempt made';
    let blockedStatus: number | null = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      // Another fetcher on the registry may have blocked the origin while this one backed off.
      if (this.registry.isBlocked(url.origin)) {
        this.logger.info(`Skipping blocked origin ${url.origin}; using fallback`);
        return this.fallback(url, target);
      }
      try {
        const response = await this.send(url, url.origin);
        if (this.blockingStatuses.includes(response.status)) {
          blockedStatus = response.status;
          await discardBody(response);
          break;
        }
        if (response.ok) {
          const body = await response.text();
          return { ok: true, document: this.toDocument(target, url, response, body, 'direct') };
        }
        lastDetail = `HTTP ${response.status}`;
        await discardBody(response);
      } catch (err) {
        lastDetail = errorMessage(err);
      }

      if (attempt < this.maxAttempts) {
        const waitMs = this.backoffBaseMs * 2 ** attempt;
        this.logger.warn(
          `Attempt ${attempt} failed for ${target}: ${lastDetail}; retry in ${waitMs}ms`,
        );
        await this.sleep(waitMs);
      }
    }

    if (blockedStatus !== null) {
      if (this.registry.block(url.origin, `HTTP ${blockedStatus}`, new Date(this.clock()))) {
        this.logger.warn(`${blockedStatus} from ${url.origin}; marking origin as blocked`);
      }
      return this.fallback(url, target);
    }

    this.logger.warn(`All ${this.maxAttempts} attempts exhausted for ${target}: ${lastDetail}`);
    return { ok: false, failure: { reason: 'exhausted', target, detail: lastDetail } };
  }

  private async fallback(url: URL, target: string): Promise<FetchResult> {
    const cached = await this.tryOnce(buildCacheUrl(target, this.cacheServiceUrl), target, 'cache');
    if (cached) {
      this.logger.info(`Cached copy served for ${target}`);
      return { ok: true, document: cached };
    }

    const searchUrl = buildSearchUrl(url, this.searchServiceUrl, this.defaultSearchTerm);
    const searched = await this.tryOnce(searchUrl, target, 'search');
    if (searched) {
      this.logger.info(`Site search fallback served ${url.host}`);
      return { ok: true, document: searched };
    }

    this.logger.warn(`All fallback strategies failed for ${target}`);
    return {
      ok: false,
      failure: { reason: 'no_fallback', target, detail: 'cached copy and site search both failed' },
    };
  }

  private async tryOnce(
    serviceUrl: URL,
    target: string,
    via: RetrievalPath,
  ): Promise<FetchedDocument | null> {
    try {
      const response = await this.send(serviceUrl, serviceUrl.origin);
      if (!response.ok) {
        this.logger.debug(`${via} fallback for ${target} answered HTTP ${response.status}`);
        await discardBody(response);
        return null;
      }
      const body = await response.text();
      return this.toDocument(target, serviceUrl, response, body, via);
    } catch (err) {
      this.logger.debug(`${via} fallback for ${target} failed: ${errorMessage(err)}`);
      return null;
    }
  }

  private async send(url: URL, referer: string): Promise<Response> {
    await this.throttle.acquire();
    const headers = this.identity.headersFor(referer);
    const cookie = this.cookies.headerFor(url.host);
    if (cookie) headers.Cookie = cookie;

    const response = await this.http(url.toString(), {
      method: 'GET',
      headers,
      redirect: 'follow',
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    this.cookies.store(url.host, readSetCookie(response.headers));
    return response;
  }

  private toDocument(
    target: string,
    requested: URL,
    response: Response,
    body: string,
    via: RetrievalPath,
  ): FetchedDocument {
    return {
      target,
      url: response.url || requested.toString(),
      status: response.status,
      body,
      via,
      fetchedAt: new Date(this.clock()),
    };
  }
}
