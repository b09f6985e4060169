/**
 * Browser-based search: render each sitemap in headless Chrome/Edge and look
 * for a term in the page source
 */

import puppeteer, { type Browser, type Page } from "puppeteer-core";
import { defaultSleep, type Sleep } from "../network/fetch.js";
import { type RangeItemResult, rangeIndices, type SitemapRange, sitemapUrl } from "../range.js";

export interface PageSource {
  load(url: string): Promise<string>;
  close(): Promise<void>;
}

export interface BrowserOptions {
  /** Path to a Chrome, Chromium or Edge binary */
  executablePath: string;
  navigationTimeoutMs?: number;
  /** Wait after navigation before reading the page source */
  settleMs?: number;
}

export interface ScanOptions {
  urlTemplate: string;
  /** Pause between pages */
  delayMs?: number;
  sleep?: Sleep;
}

class BrowserPageSource implements PageSource {
  constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    private readonly options: BrowserOptions,
  ) {}

  async load(url: string): Promise<string> {
    await this.page.goto(url, {
      waitUntil: "load",
      timeout: this.options.navigationTimeoutMs ?? 30000,
    });
    await defaultSleep(this.options.settleMs ?? 1000);
    return this.page.content();
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

/**
 * Launch a headless browser with one reusable tab
 */
export async function createBrowserPageSource(options: BrowserOptions): Promise<PageSource> {
  const browser = await puppeteer.launch({
    executablePath: options.executablePath,
    headless: true,
    args: ["--disable-gpu"],
  });
  try {
    const page = await browser.newPage();
    return new BrowserPageSource(browser, page, options);
  } catch (err) {
    await browser.close();
    throw err;
  }
}

/**
 * Check every sitemap in the range for `term` (case-insensitive).
 * A page that fails to load counts as a miss; the scan carries on.
 */
export async function scanPages(
  range: SitemapRange,
  term: string,
  source: PageSource,
  options: ScanOptions,
): Promise<RangeItemResult[]> {
  const sleep = options.sleep ?? defaultSleep;
  const needle = term.toLowerCase();
  const results: RangeItemResult[] = [];

  try {
    for (const index of rangeIndices(range)) {
      const url = sitemapUrl(options.urlTemplate, index);
      console.log(`\nChecking: ${url}`);
      try {
        const html = await source.load(url);
        const passed = html.toLowerCase().includes(needle);
        console.log(passed ? `Match found on: ${url}` : "No match found.");
        results.push({ index, url, passed });
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.warn(`Error accessing ${url}: ${msg}`);
        results.push({ index, url, passed: false, detail: msg });
      }
      await sleep(options.delayMs ?? 1500);
    }
  } finally {
    await source.close();
  }
  return results;
}
