#!/usr/bin/env node
/**
 * sitemap-search
 *
 * Downloads a numbered range of sitemaps (sitemap-movie-1.xml ... N), keeps
 * them in a local cache, flattens every <loc> into one index file and
 * searches that index by title.
 * - Sitemaps already on disk are never fetched again
 * - Failed downloads and broken XML are skipped, the rest is still indexed
 * - "The Vampire Diaries" matches /movie/the-vampire-diaries-s01e01
 *
 * Usage:
 *   npm run dev -- "<title>" [--start 1] [--end 60] [--delayMs 1000]
 */

import { runSearchCLI } from "./cli.js";

runSearchCLI().catch((err) => {
  console.error(err);
  process.exit(1);
});
