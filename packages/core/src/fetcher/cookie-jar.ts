/**
 * Per-fetcher session cookies, keyed by host. Only name=value pairs are kept;
 * attributes (path, expiry) are ignored for the lifetime of one adapter run.
 */
export class CookieJar {
  private readonly byHost = new Map<string, Map<string, string>>();

  store(host: string, setCookieHeaders: readonly string[]): void {
    if (setCookieHeaders.length === 0) return;
    const jar = this.byHost.get(host) ?? new Map<string, string>();
    for (const header of setCookieHeaders) {
      const pair = header.split(';', 1)[0]?.trim() ?? '';
      const eq = pair.indexOf('=');
      if (eq <= 0) continue;
      jar.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
    }
    this.byHost.set(host, jar);
  }

  headerFor(host: string): string | null {
    const jar = this.byHost.get(host);
    if (!jar || jar.size === 0) return null;
    return [...jar.entries()].map(([k, v]) => `${k}=${v}`).join('; ');
  }
}
