import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { resolveConfig, type SitemapConfig } from "../config.js";
import type { DocumentFetcher, FetchResult } from "../network/fetch.js";
import type { SitemapRange } from "../range.js";

export const TEST_TEMPLATE = "https://sitemaps.test/sitemap-movie-{index}.xml";

export function testUrl(index: number): string {
  return `https://sitemaps.test/sitemap-movie-${index}.xml`;
}

export function urlset(...locs: string[]): string {
  const entries = locs.map((loc) => `  <url><loc>${loc}</loc><changefreq>weekly</changefreq></url>`);
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">',
    ...entries,
    "</urlset>",
  ].join("\n");
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "sitemap-search-"));
}

export function testConfig(dir: string, range: SitemapRange): SitemapConfig {
  return resolveConfig({
    urlTemplate: TEST_TEMPLATE,
    range,
    cacheDir: path.join(dir, "sitemaps"),
    indexFile: path.join(dir, "movie_urls.txt"),
    requestDelayMs: 0,
  });
}

/**
 * Serves canned documents by URL; anything else fails like an exhausted fetch
 */
export class FakeFetcher implements DocumentFetcher {
  readonly calls: string[] = [];

  constructor(private readonly documents: Record<string, string>) {}

  async fetch(url: string): Promise<FetchResult> {
    this.calls.push(url);
    const doc = this.documents[url];
    if (doc === undefined) {
      return { ok: false, error: new Error("HTTP 503") };
    }
    return { ok: true, status: 200, body: Buffer.from(doc, "utf8") };
  }
}
