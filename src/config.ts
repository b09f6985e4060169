/**
 * Runtime configuration for the sitemap index builder and search
 */

import { INDEX_PLACEHOLDER, type SitemapRange, validateRange } from "./range.js";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

export interface FetchOptions {
  /** Attempts per document before giving up */
  maxAttempts: number;
  timeoutMs: number;
  /** Delay before retry n is backoffMs * 2^n */
  backoffMs: number;
  /** Extra requests allowed per attempt when the status is in retryStatuses */
  statusRetries: number;
  retryStatuses: readonly number[];
  userAgent: string;
}

export interface SitemapConfig {
  /** Sitemap URL with an `{index}` placeholder */
  urlTemplate: string;
  range: SitemapRange;
  cacheDir: string;
  indexFile: string;
  /** Pause after every network request to a sitemap */
  requestDelayMs: number;
  fetch: FetchOptions;
}

export interface ConfigOverrides extends Partial<Omit<SitemapConfig, "fetch">> {
  fetch?: Partial<FetchOptions>;
}

export const DEFAULT_CONFIG: SitemapConfig = {
  urlTemplate: `https://cinego.tv/sitemap-movie-${INDEX_PLACEHOLDER}.xml`,
  range: { start: 1, end: 60 },
  cacheDir: "sitemaps",
  indexFile: "movie_urls.txt",
  requestDelayMs: 1000,
  fetch: {
    maxAttempts: 3,
    timeoutMs: 10000,
    backoffMs: 1000,
    statusRetries: 3,
    retryStatuses: [429, 500, 502, 503, 504],
    userAgent: DEFAULT_USER_AGENT,
  },
};

function nonNegative(name: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid ${name}: ${value}`);
  }
  return value;
}

/**
 * Merge overrides over DEFAULT_CONFIG and validate the result
 */
export function resolveConfig(overrides: ConfigOverrides = {}): SitemapConfig {
  const fetch: FetchOptions = { ...DEFAULT_CONFIG.fetch, ...overrides.fetch };
  const config: SitemapConfig = {
    ...DEFAULT_CONFIG,
    ...overrides,
    range: validateRange(overrides.range ?? DEFAULT_CONFIG.range),
    fetch,
  };

  if (!config.urlTemplate.includes(INDEX_PLACEHOLDER)) {
    throw new Error(`urlTemplate must contain ${INDEX_PLACEHOLDER}: ${config.urlTemplate}`);
  }
  if (!Number.isInteger(fetch.maxAttempts) || fetch.maxAttempts < 1) {
    throw new Error(`Invalid maxAttempts: ${fetch.maxAttempts}`);
  }
  nonNegative("requestDelayMs", config.requestDelayMs);
  nonNegative("timeoutMs", fetch.timeoutMs);
  nonNegative("backoffMs", fetch.backoffMs);
  nonNegative("statusRetries", fetch.statusRetries);

  return config;
}
