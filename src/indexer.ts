/**
 * Builds the flat URL index from the configured sitemap range
 */

import fs from "node:fs/promises";
import type { SitemapConfig } from "./config.js";
import { type DocumentFetcher, Fetcher, type Sleep } from "./network/fetch.js";
import { extractUrls } from "./parsers/sitemap.js";
import { type RangeItemResult, rangeIndices } from "./range.js";
import { SitemapStore } from "./store/sitemap-store.js";
import { ensureDir, fileExists, writeFileAtomic } from "./utils/filesystem.js";

export type BuildMode = "up-to-date" | "from-cache" | "downloaded";

export interface BuildReport {
  mode: BuildMode;
  urlCount: number;
  /** Whether the index file was (re)written during this run */
  written: boolean;
  items: RangeItemResult[];
}

export interface BuildDeps {
  fetcher?: DocumentFetcher;
  sleep?: Sleep;
}

/**
 * One URL per line, newline-terminated
 */
export function formatIndex(urls: readonly string[]): string {
  return urls.map((u) => `${u}\n`).join("");
}

/**
 * Download whatever is missing, extract every <loc> and write the index.
 * Repeated runs with everything on disk do no network and no writes.
 */
export async function buildIndex(
  config: SitemapConfig,
  deps: BuildDeps = {},
): Promise<BuildReport> {
  const fetcher = deps.fetcher ?? new Fetcher(config.fetch, { sleep: deps.sleep });
  const store = new SitemapStore(config, fetcher, deps.sleep);
  const indices = rangeIndices(config.range);

  await ensureDir(config.cacheDir);

  if (await store.allPresent()) {
    const items = indices.map((index) => ({
      index,
      url: store.urlFor(index),
      passed: true,
      detail: "cache",
    }));

    if (await fileExists(config.indexFile)) {
      console.log(`All ${indices.length} sitemaps and ${config.indexFile} present, nothing to do.`);
      return { mode: "up-to-date", urlCount: 0, written: false, items };
    }

    console.log(`All ${indices.length} sitemaps present, rebuilding ${config.indexFile} from cache.`);
    const urls: string[] = [];
    for (const index of indices) {
      urls.push(...extractUrls(await fs.readFile(store.pathFor(index))));
    }
    await writeFileAtomic(config.indexFile, formatIndex(urls));
    console.log(`Wrote ${urls.length} URLs to ${config.indexFile}`);
    return { mode: "from-cache", urlCount: urls.length, written: true, items };
  }

  const urls: string[] = [];
  const items: RangeItemResult[] = [];
  for (const index of indices) {
    const url = store.urlFor(index);
    const stored = await store.ensureDownloaded(index);
    if (!stored) {
      items.push({ index, url, passed: false, detail: "download failed" });
      continue;
    }
    const found = extractUrls(await fs.readFile(stored.path));
    console.log(`Sitemap ${index}: ${found.length} URLs (${stored.source})`);
    urls.push(...found);
    items.push({ index, url, passed: true, detail: stored.source });
  }

  if (urls.length === 0) {
    console.warn(`No URLs collected, leaving ${config.indexFile} untouched.`);
    return { mode: "downloaded", urlCount: 0, written: false, items };
  }
  await writeFileAtomic(config.indexFile, formatIndex(urls));
  console.log(`Wrote ${urls.length} URLs to ${config.indexFile}`);
  return { mode: "downloaded", urlCount: urls.length, written: true, items };
}
