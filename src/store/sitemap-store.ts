/**
 * Local cache of downloaded sitemap documents, one file per sitemap number
 */

import path from "node:path";
import type { SitemapConfig } from "../config.js";
import { type DocumentFetcher, defaultSleep, type Sleep } from "../network/fetch.js";
import { rangeIndices, sitemapUrl } from "../range.js";
import { fileExists, writeFileAtomic } from "../utils/filesystem.js";

export interface StoredSitemap {
  index: number;
  path: string;
  source: "cache" | "network";
}

export class SitemapStore {
  constructor(
    private readonly config: SitemapConfig,
    private readonly fetcher: DocumentFetcher,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  pathFor(index: number): string {
    return path.join(this.config.cacheDir, `sitemap-${index}.xml`);
  }

  urlFor(index: number): string {
    return sitemapUrl(this.config.urlTemplate, index);
  }

  isPresent(index: number): Promise<boolean> {
    return fileExists(this.pathFor(index));
  }

  /**
   * True only if every sitemap in the configured range is on disk
   */
  async allPresent(): Promise<boolean> {
    for (const index of rangeIndices(this.config.range)) {
      if (!(await this.isPresent(index))) return false;
    }
    return true;
  }

  /**
   * Return the cached file for `index`, downloading it first if missing.
   * A failed download is logged and yields null.
   */
  async ensureDownloaded(index: number): Promise<StoredSitemap | null> {
    const file = this.pathFor(index);
    if (await fileExists(file)) {
      return { index, path: file, source: "cache" };
    }

    const url = this.urlFor(index);
    console.log(`Downloading ${url}`);
    const result = await this.fetcher.fetch(url);
    // politeness throttle, applied whether or not the request worked
    await this.sleep(this.config.requestDelayMs);

    if (!result.ok) {
      console.warn(`Skipping sitemap ${index}: ${result.error.message}`);
      return null;
    }
    await writeFileAtomic(file, result.body);
    return { index, path: file, source: "network" };
  }
}
