import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import {
  BlockedOriginRegistry,
  IdentityRotator,
  InvalidTargetError,
  ResilientFetcher,
  Throttle,
  buildSearchUrl,
  extractSearchTerms,
  type ResilientFetcherOptions,
} from '@corroborate/core';

type Reply = { status: number; body?: string; headers?: Record<string, string> } | Error;

function scriptedFetch(replies: Reply[]) {
  let i = 0;
  return vi.fn(async (_url: string, _init: RequestInit): Promise<Response> => {
    const reply = replies[Math.min(i++, replies.length - 1)];
    if (!reply) throw new Error('no scripted reply');
    if (reply instanceof Error) throw reply;
    return new Response(reply.body ?? '', { status: reply.status, headers: reply.headers });
  });
}

function calledUrls(mock: ReturnType<typeof scriptedFetch>): string[] {
  return mock.mock.calls.map(([url]) => url);
}

describe('ResilientFetcher', () => {
  let registry: BlockedOriginRegistry;
  let sleep: Mock<(ms: number) => Promise<void>>;

  const create = (overrides: Partial<ResilientFetcherOptions> = {}) =>
    new ResilientFetcher({
      registry,
      minIntervalMs: 0,
      backoffBaseMs: 1000,
      maxAttempts: 3,
      cacheServiceUrl: 'https://cache.test/web/2/',
      searchServiceUrl: 'https://search.test/html/',
      defaultSearchTerm: 'platform',
      identity: new IdentityRotator(['test-agent']),
      sleep,
      clock: () => 0,
      ...overrides,
    });

  beforeEach(() => {
    registry = new BlockedOriginRegistry();
    sleep = vi.fn(async (_ms: number): Promise<void> => {});
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the document from a direct request', async () => {
    const mockFetch = scriptedFetch([{ status: 200, body: '<html>ok</html>' }]);
    vi.stubGlobal('fetch', mockFetch);

    const result = await create().fetch('https://example.test/page');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.document.body).toBe('<html>ok</html>');
    expect(result.document.via).toBe('direct');
    expect(result.document.url).toBe('https://example.test/page');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('sends a rotated identity with the origin as referer', async () => {
    const mockFetch = scriptedFetch([{ status: 200 }]);
    vi.stubGlobal('fetch', mockFetch);

    await create().fetch('https://example.test/a/b?x=1');

    const init = mockFetch.mock.calls[0]?.[1];
    expect(init?.headers).toMatchObject({ 'User-Agent': 'test-agent', Referer: 'https://example.test/' });
    expect(init?.redirect).toBe('follow');
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('retries transient statuses with exponential backoff', async () => {
    const mockFetch = scriptedFetch([{ status: 500 }, { status: 502 }, { status: 200, body: 'third time' }]);
    vi.stubGlobal('fetch', mockFetch);

    const result = await create().fetch('https://example.test/flaky');

    expect(result.ok && result.document.body).toBe('third time');
    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000]);
  });

  it('reports exhaustion after the attempt budget without a trailing sleep', async () => {
    const mockFetch = scriptedFetch([new TypeError('fetch failed')]);
    vi.stubGlobal('fetch', mockFetch);

    const result = await create().fetch('https://example.test/down');

    expect(result).toEqual({
      ok: false,
      failure: { reason: 'exhausted', target: 'https://example.test/down', detail: 'fetch failed' },
    });
    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000]);
    expect(registry.size).toBe(0);
  });

  it('blocks the origin on 403 and walks the fallback chain', async () => {
    const mockFetch = scriptedFetch([{ status: 403 }, { status: 404 }, { status: 500 }]);
    vi.stubGlobal('fetch', mockFetch);
    const fetcher = create();

    const result = await fetcher.fetch('https://blocked.test/jobs?q=SAP');

    expect(result).toEqual({
      ok: false,
      failure: {
        reason: 'no_fallback',
        target: 'https://blocked.test/jobs?q=SAP',
        detail: 'cached copy and site search both failed',
      },
    });
    expect(calledUrls(mockFetch)).toEqual([
      'https://blocked.test/jobs?q=SAP',
      'https://cache.test/web/2/https://blocked.test/jobs?q=SAP',
      'https://search.test/html/?q=site%3Ablocked.test+SAP',
    ]);
    expect(registry.isBlocked('https://blocked.test')).toBe(true);
    expect(registry.entries()[0]?.reason).toBe('HTTP 403');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('skips direct retrieval for an already blocked origin', async () => {
    registry.block('https://blocked.test', 'HTTP 403');
    const mockFetch = scriptedFetch([{ status: 200, body: 'archived' }]);
    vi.stubGlobal('fetch', mockFetch);

    const result = await create().fetch('https://blocked.test/careers');

    expect(calledUrls(mockFetch)).toEqual(['https://cache.test/web/2/https://blocked.test/careers']);
    expect(result.ok && result.document.via).toBe('cache');
    expect(result.ok && result.document.body).toBe('archived');
  });

  it('falls back to site search when the cached copy is missing', async () => {
    registry.block('https://blocked.test', 'HTTP 403');
    const mockFetch = scriptedFetch([{ status: 404 }, { status: 200, body: 'results' }]);
    vi.stubGlobal('fetch', mockFetch);

    const result = await create().fetch('https://blocked.test/');

    expect(calledUrls(mockFetch)[1]).toBe('https://search.test/html/?q=site%3Ablocked.test+platform');
    expect(result.ok && result.document.via).toBe('search');
    const init = mockFetch.mock.calls[1]?.[1];
    expect(init?.headers).toMatchObject({ Referer: 'https://search.test/' });
  });

  it('shares blocked origins between fetchers on the same registry', async () => {
    const mockFetch = scriptedFetch([{ status: 403 }, { status: 200, body: 'cached' }, { status: 200, body: 'cached again' }]);
    vi.stubGlobal('fetch', mockFetch);

    await create().fetch('https://blocked.test/one');
    await create().fetch('https://blocked.test/two');

    expect(calledUrls(mockFetch)).toEqual([
      'https://blocked.test/one',
      'https://cache.test/web/2/https://blocked.test/one',
      'https://cache.test/web/2/https://blocked.test/two',
    ]);
  });

  it('switches to the fallback chain when the origin is blocked during backoff', async () => {
    const mockFetch = scriptedFetch([{ status: 500 }, { status: 200, body: 'cached' }]);
    vi.stubGlobal('fetch', mockFetch);
    sleep.mockImplementation(async () => {
      registry.block('https://site.test', 'HTTP 403');
    });

    const result = await create().fetch('https://site.test/jobs');

    expect(calledUrls(mockFetch)).toEqual([
      'https://site.test/jobs',
      'https://cache.test/web/2/https://site.test/jobs',
    ]);
    expect(sleep.mock.calls).toEqual([[2000]]);
    expect(result.ok && result.document.via).toBe('cache');
  });

  it('releases the bodies of failed responses', async () => {
    const responses: Response[] = [];
    vi.stubGlobal(
      'fetch',
      vi.fn(async (): Promise<Response> => {
        const response = new Response('upstream error', { status: 500 });
        responses.push(response);
        return response;
      }),
    );

    const result = await create({ maxAttempts: 2 }).fetch('https://flaky.test/');

    expect(result.ok).toBe(false);
    expect(responses.map((r) => r.bodyUsed)).toEqual([true, true]);
  });

  it('treats configured statuses as blocking', async () => {
    const mockFetch = scriptedFetch([{ status: 429 }, { status: 200, body: 'cached' }]);
    vi.stubGlobal('fetch', mockFetch);

    const result = await create({ blockingStatuses: [403, 429] }).fetch('https://limited.test/x');

    expect(result.ok && result.document.via).toBe('cache');
    expect(registry.isBlocked('https://limited.test/other')).toBe(true);
  });

  it('replays cookies set by earlier responses on the same host', async () => {
    const mockFetch = scriptedFetch([
      { status: 200, headers: { 'set-cookie': 'session=abc123; Path=/; HttpOnly' } },
      { status: 200 },
    ]);
    vi.stubGlobal('fetch', mockFetch);
    const fetcher = create();

    await fetcher.fetch('https://example.test/login');
    await fetcher.fetch('https://example.test/next');

    expect(mockFetch.mock.calls[0]?.[1].headers).not.toHaveProperty('Cookie');
    expect(mockFetch.mock.calls[1]?.[1].headers).toMatchObject({ Cookie: 'session=abc123' });
  });

  it('throttles consecutive requests of one instance', async () => {
    vi.stubGlobal('fetch', scriptedFetch([{ status: 200 }]));
    const fetcher = create({ minIntervalMs: 2000 });

    await fetcher.fetch('https://example.test/1');
    await fetcher.fetch('https://other.test/2');

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000]);
  });

  it('throws InvalidTargetError for unusable targets', async () => {
    await expect(create().fetch('not a url')).rejects.toBeInstanceOf(InvalidTargetError);
    await expect(create().fetch('ftp://example.test/file')).rejects.toBeInstanceOf(InvalidTargetError);
  });
});

describe('Throttle', () => {
  it('waits out the remaining interval and queues concurrent callers', async () => {
    let now = 0;
    const sleep = vi.fn(async (ms: number) => {
      now += ms;
    });
    const throttle = new Throttle(2000, sleep, () => now);

    await throttle.acquire();
    now += 500;
    await throttle.acquire();
    await Promise.all([throttle.acquire(), throttle.acquire()]);

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1500, 2000, 2000]);
  });
});

describe('site search fallback terms', () => {
  it('takes up to five keywords from the query string', () => {
    const url = new URL('https://jobs.test/search?keywords=SAP&location=saudi-arabia&x=1');
    expect(extractSearchTerms(url, 'platform')).toBe('keywords SAP location saudi arabia');
  });

  it('uses the path when there is no query', () => {
    expect(extractSearchTerms(new URL('https://jobs.test/en/uae/jobs/'), 'platform')).toBe('uae jobs');
  });

  it('falls back to the default term', () => {
    expect(extractSearchTerms(new URL('https://jobs.test/'), 'platform')).toBe('platform');
    expect(buildSearchUrl(new URL('https://jobs.test/'), 'https://search.test/html/', 'platform').toString()).toBe(
      'https://search.test/html/?q=site%3Ajobs.test+platform',
    );
  });
});
