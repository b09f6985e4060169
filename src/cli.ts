/**
 * CLI argument parsing and validation
 */

import minimist from "minimist";
import { createBrowserPageSource, scanPages } from "./browser/page-search.js";
import { type ConfigOverrides, DEFAULT_CONFIG, resolveConfig } from "./config.js";
import { type BuildDeps, buildIndex } from "./indexer.js";
import { validateRange } from "./range.js";
import { searchIndex } from "./search.js";

const SEARCH_USAGE =
  "Usage: sitemap-search <title> [--start 1] [--end 60] [--cacheDir sitemaps] [--indexFile movie_urls.txt] [--urlTemplate <url with {index}>] [--delayMs 1000] [--attempts 3] [--timeoutMs 10000]";

const BROWSE_USAGE =
  "Usage: sitemap-browse <text> --start <n> --end <n> [--executablePath <browser>] [--urlTemplate <url with {index}>] [--delayMs 1500]";

type Argv = minimist.ParsedArgs;

/**
 * Read a numeric flag; absent flags give undefined, junk throws
 */
function numberFlag(argv: Argv, name: string): number | undefined {
  const raw: unknown = argv[name];
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`--${name} must be a number, got "${String(raw)}"`);
  }
  return value;
}

function stringFlag(argv: Argv, name: string): string | undefined {
  const raw: unknown = argv[name];
  return typeof raw === "string" && raw.length > 0 ? raw : undefined;
}

function positionalText(argv: Argv): string {
  return argv._.map(String).join(" ").trim();
}

/**
 * Turn sitemap-search arguments into a query and config overrides
 */
export function parseSearchArgs(args: string[]): { query: string; overrides: ConfigOverrides } {
  const argv = minimist(args, {
    string: ["cacheDir", "indexFile", "urlTemplate"],
  });

  const overrides: ConfigOverrides = {
    range: {
      start: numberFlag(argv, "start") ?? DEFAULT_CONFIG.range.start,
      end: numberFlag(argv, "end") ?? DEFAULT_CONFIG.range.end,
    },
    fetch: {},
  };
  const cacheDir = stringFlag(argv, "cacheDir");
  if (cacheDir) overrides.cacheDir = cacheDir;
  const indexFile = stringFlag(argv, "indexFile");
  if (indexFile) overrides.indexFile = indexFile;
  const urlTemplate = stringFlag(argv, "urlTemplate");
  if (urlTemplate) overrides.urlTemplate = urlTemplate;
  const delayMs = numberFlag(argv, "delayMs");
  if (delayMs !== undefined) overrides.requestDelayMs = delayMs;
  const attempts = numberFlag(argv, "attempts");
  if (attempts !== undefined) overrides.fetch = { ...overrides.fetch, maxAttempts: attempts };
  const timeoutMs = numberFlag(argv, "timeoutMs");
  if (timeoutMs !== undefined) overrides.fetch = { ...overrides.fetch, timeoutMs };

  return { query: positionalText(argv), overrides };
}

/**
 * Build (or reuse) the index, then print every URL matching the title
 */
export async function runSearchCLI(
  args = process.argv.slice(2),
  deps: BuildDeps = {},
): Promise<void> {
  const { query, overrides } = parseSearchArgs(args);
  if (!query) {
    console.error(SEARCH_USAGE);
    process.exit(1);
  }

  const config = resolveConfig(overrides);
  await buildIndex(config, deps);

  const matches = await searchIndex(config.indexFile, query);
  if (matches.length === 0) {
    console.log(`No matches found for "${query}".`);
    return;
  }
  console.log(`Found ${matches.length} match(es) for "${query}":`);
  for (const url of matches) console.log(url);
}

/**
 * Render each sitemap in a headless browser and report where the text appears
 */
export async function runBrowseCLI(args = process.argv.slice(2)): Promise<void> {
  const argv = minimist(args, {
    string: ["executablePath", "urlTemplate"],
  });

  const term = positionalText(argv);
  const start = numberFlag(argv, "start");
  const end = numberFlag(argv, "end");
  if (!term || start === undefined || end === undefined) {
    console.error(BROWSE_USAGE);
    process.exit(1);
  }

  const executablePath =
    stringFlag(argv, "executablePath") ?? process.env.PUPPETEER_EXECUTABLE_PATH;
  if (!executablePath) {
    console.error("No browser found: pass --executablePath or set PUPPETEER_EXECUTABLE_PATH");
    process.exit(1);
  }

  const range = validateRange({ start, end });
  const urlTemplate = stringFlag(argv, "urlTemplate") ?? DEFAULT_CONFIG.urlTemplate;
  const source = await createBrowserPageSource({ executablePath });
  const results = await scanPages(range, term, source, {
    urlTemplate,
    delayMs: numberFlag(argv, "delayMs"),
  });

  const hits = results.filter((r) => r.passed).length;
  console.log(`\nSearch complete! ${hits}/${results.length} sitemap(s) matched.`);
}
