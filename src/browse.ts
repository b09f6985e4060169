#!/usr/bin/env node
/**
 * sitemap-browse
 *
 * Opens each sitemap of a range in a headless browser and reports whether
 * the given text appears in the rendered source. Independent of the index.
 *
 * Usage:
 *   npm run browse -- "<text>" --start 1 --end 5 --executablePath /usr/bin/google-chrome
 */

import { runBrowseCLI } from "./cli.js";

runBrowseCLI().catch((err) => {
  console.error(err);
  process.exit(1);
});
