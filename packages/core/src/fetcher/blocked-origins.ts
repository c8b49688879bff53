/**
 * Origin-level circuit breaker state shared by every fetcher of one run.
 *
 * Node runs fetchers on a single event loop, so check-then-add on the underlying
 * Map is never interleaved; `block` is idempotent when two adapters discover the
 * same origin.
 */

export interface BlockedOrigin {
  origin: string;
  reason: string;
  blockedAt: Date;
}

export function originOf(originOrUrl: string): string {
  try {
    return new URL(originOrUrl).origin;
  } catch {
    return originOrUrl;
  }
}

export class BlockedOriginRegistry {
  private readonly blocked = new Map<string, BlockedOrigin>();

  /** Returns true when the origin was not blocked before. */
  block(originOrUrl: string, reason: string, now: Date = new Date()): boolean {
    const origin = originOf(originOrUrl);
    if (this.blocked.has(origin)) return false;
    this.blocked.set(origin, { origin, reason, blockedAt: now });
    return true;
  }

  isBlocked(originOrUrl: string): boolean {
    return this.blocked.has(originOf(originOrUrl));
  }

  entries(): BlockedOrigin[] {
    return [...this.blocked.values()];
  }

  get size(): number {
    return this.blocked.size;
  }
}
