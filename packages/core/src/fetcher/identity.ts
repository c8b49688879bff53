/**
 * Outbound identity: a rotating user-agent over a browser-like header profile.
 */

import userAgents from '../data/user-agents.json';

const BROWSER_HEADERS: Record<string, string> = {
  Accept:
    'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9,ar;q=0.8',
  'Cache-Control': 'max-age=0',
  'Sec-Fetch-Dest': 'document',
  'Sec-Fetch-Mode': 'navigate',
  'Sec-Fetch-Site': 'none',
  'Sec-Fetch-User': '?1',
  'Upgrade-Insecure-Requests': '1',
};

export const DEFAULT_USER_AGENTS: readonly string[] = userAgents;

export class IdentityRotator {
  constructor(
    private readonly userAgents: readonly string[] = DEFAULT_USER_AGENTS,
    private readonly random: () => number = Math.random,
  ) {
    if (userAgents.length === 0) throw new Error('IdentityRotator needs at least one user-agent');
  }

  nextUserAgent(): string {
    const idx = Math.min(Math.floor(this.random() * this.userAgents.length), this.userAgents.length - 1);
    return this.userAgents[idx] ?? this.userAgents[0] ?? '';
  }

  /** Fresh header set for one request; `referer` is an origin such as https://example.com */
  headersFor(referer: string): Record<string, string> {
    return {
      ...BROWSER_HEADERS,
      'User-Agent': this.nextUserAgent(),
      Referer: referer.endsWith('/') ? referer : `${referer}/`,
    };
  }
}
