import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseSearchArgs, runBrowseCLI, runSearchCLI } from "./cli.js";
import { DEFAULT_CONFIG, resolveConfig } from "./config.js";
import { FakeFetcher, makeTempDir, TEST_TEMPLATE, testUrl, urlset } from "./testing/fixtures.js";

describe("parseSearchArgs", () => {
  it("joins positional words into the query", () => {
    const { query } = parseSearchArgs(["The", "Vampire", "Diaries"]);
    expect(query).toBe("The Vampire Diaries");
  });

  it("maps flags onto configuration overrides", () => {
    const { query, overrides } = parseSearchArgs([
      "Alpha",
      "--start",
      "3",
      "--end",
      "7",
      "--cacheDir",
      "/tmp/maps",
      "--delayMs",
      "0",
      "--attempts",
      "5",
      "--timeoutMs",
      "2500",
    ]);
    const config = resolveConfig(overrides);

    expect(query).toBe("Alpha");
    expect(config.range).toEqual({ start: 3, end: 7 });
    expect(config.cacheDir).toBe("/tmp/maps");
    expect(config.indexFile).toBe(DEFAULT_CONFIG.indexFile);
    expect(config.requestDelayMs).toBe(0);
    expect(config.fetch.maxAttempts).toBe(5);
    expect(config.fetch.timeoutMs).toBe(2500);
    expect(config.fetch.backoffMs).toBe(DEFAULT_CONFIG.fetch.backoffMs);
  });

  it("uses the default range when none is given", () => {
    const { overrides } = parseSearchArgs(["Alpha"]);
    expect(overrides.range).toEqual(DEFAULT_CONFIG.range);
  });

  it("rejects a non-numeric flag", () => {
    expect(() => parseSearchArgs(["Alpha", "--end", "lots"])).toThrow('--end must be a number, got "lots"');
  });
});

describe("runSearchCLI", () => {
  let dir: string;
  let log: ReturnType<typeof spyOnLog>;

  function spyOnLog() {
    return vi.spyOn(console, "log").mockImplementation(() => undefined);
  }

  function flags(): string[] {
    return [
      "--start",
      "1",
      "--end",
      "1",
      "--cacheDir",
      path.join(dir, "sitemaps"),
      "--indexFile",
      path.join(dir, "movie_urls.txt"),
      "--urlTemplate",
      TEST_TEMPLATE,
      "--delayMs",
      "0",
    ];
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    log = spyOnLog();
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });
  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("prints usage and exits 1 without a title", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    await expect(runSearchCLI([])).rejects.toThrow("exit 1");
    expect(String(error.mock.calls[0][0])).toMatch(/^Usage: sitemap-search <title>/);
  });

  it("builds the index and prints matching URLs", async () => {
    const fetcher = new FakeFetcher({
      [testUrl(1)]: urlset("https://cinego.tv/movie/the-vampire-diaries-s01e01", "https://cinego.tv/movie/alpha-1"),
    });

    await runSearchCLI(["The", "Vampire", "Diaries", ...flags()], { fetcher });

    expect(fetcher.calls).toEqual([testUrl(1)]);
    expect(log).toHaveBeenCalledWith('Found 1 match(es) for "The Vampire Diaries":');
    expect(log).toHaveBeenLastCalledWith("https://cinego.tv/movie/the-vampire-diaries-s01e01");
  });

  it("reports when nothing matches", async () => {
    const fetcher = new FakeFetcher({ [testUrl(1)]: urlset("https://cinego.tv/movie/alpha-1") });

    await runSearchCLI(["Nonexistent", "Title", ...flags()], { fetcher });

    expect(log).toHaveBeenLastCalledWith('No matches found for "Nonexistent Title".');
  });
});

describe("runBrowseCLI", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints usage and exits 1 without a range", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    await expect(runBrowseCLI(["vampire", "--start", "1"])).rejects.toThrow("exit 1");
    expect(String(error.mock.calls[0][0])).toMatch(/^Usage: sitemap-browse <text>/);
  });
});
