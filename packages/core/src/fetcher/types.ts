/**
 * Fetcher contracts shared by the core and source adapters.
 */

export type RetrievalPath = 'direct' | 'cache' | 'search';

export interface FetchedDocument {
  /** The URL the caller asked for. */
  target: string;
  /** The URL that actually answered (after redirects, or the fallback service URL). */
  url: string;
  status: number;
  body: string;
  via: RetrievalPath;
  fetchedAt: Date;
}

export type FailureReason = 'exhausted' | 'no_fallback';

export interface FetchFailure {
  reason: FailureReason;
  target: string;
  detail: string;
}

export type FetchResult =
  | { ok: true; document: FetchedDocument }
  | { ok: false; failure: FetchFailure };

/** Capability handed to source adapters. */
export interface DocumentFetcher {
  fetch(target: string): Promise<FetchResult>;
}

export type HttpRequest = (url: string, init: RequestInit) => Promise<Response>;

export class InvalidTargetError extends Error {
  constructor(readonly target: string) {
    super(`Invalid fetch target: ${target}`);
    this.name = 'InvalidTargetError';
  }
}

export function parseTarget(target: string): URL {
  try {
    const url = new URL(target);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new InvalidTargetError(target);
    }
    return url;
  } catch (err) {
    if (err instanceof InvalidTargetError) throw err;
    throw new InvalidTargetError(target);
  }
}
