/**
 * Runtime configuration read from environment variables (see .env.example).
 * Load .env files first via scripts/load-env.ts when running from the CLI.
 */

import { z } from 'zod';

export const DEFAULT_CACHE_SERVICE_URL = 'https://web.archive.org/web/2/';
export const DEFAULT_SEARCH_SERVICE_URL = 'https://html.duckduckgo.com/html/';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const statusList = z
  .string()
  .default('403')
  .transform((raw, ctx) => {
    const statuses = raw
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean)
      .map(Number);
    if (statuses.some((s) => !Number.isInteger(s) || s < 400 || s > 599)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid HTTP status list: ${raw}` });
      return z.NEVER;
    }
    return statuses;
  });

export const configSchema = z.object({
  FETCH_MIN_INTERVAL_MS: nonNegativeInt(2000),
  FETCH_MAX_ATTEMPTS: positiveInt(3),
  FETCH_TIMEOUT_MS: positiveInt(20_000),
  FETCH_BACKOFF_BASE_MS: nonNegativeInt(1000),
  FETCH_BLOCKING_STATUSES: statusList,
  CACHE_SERVICE_URL: z.string().url().default(DEFAULT_CACHE_SERVICE_URL),
  SEARCH_SERVICE_URL: z.string().url().default(DEFAULT_SEARCH_SERVICE_URL),
  OUTPUT_DIR: z.string().min(1).default('output'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface AppConfig {
  fetch: {
    minIntervalMs: number;
    maxAttempts: number;
    timeoutMs: number;
    backoffBaseMs: number;
    blockingStatuses: number[];
    cacheServiceUrl: string;
    searchServiceUrl: string;
  };
  outputDir: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse configuration from an env-like record. Empty strings count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const key of Object.keys(configSchema.shape)) {
    const value = env[key]?.trim();
    if (value) cleaned[key] = value;
  }

  const parsed = configSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const c = parsed.data;
  return {
    fetch: {
      minIntervalMs: c.FETCH_MIN_INTERVAL_MS,
      maxAttempts: c.FETCH_MAX_ATTEMPTS,
      timeoutMs: c.FETCH_TIMEOUT_MS,
      backoffBaseMs: c.FETCH_BACKOFF_BASE_MS,
      blockingStatuses: c.FETCH_BLOCKING_STATUSES,
      cacheServiceUrl: c.CACHE_SERVICE_URL,
      searchServiceUrl: c.SEARCH_SERVICE_URL,
    },
    outputDir: c.OUTPUT_DIR,
    logLevel: c.LOG_LEVEL,
  };
}
