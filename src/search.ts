/**
 * Title search over the flat URL index
 */

import { createReadStream } from "node:fs";
import readline from "node:readline";
import { fileExists } from "./utils/filesystem.js";

/**
 * "The Vampire   Diaries" -> "the-vampire-diaries".
 * Only whitespace is folded; punctuation and accents are left alone.
 */
export function normalizeQuery(raw: string): string {
  const trimmed = raw.trim().toLowerCase();
  return trimmed ? trimmed.split(/\s+/).join("-") : "";
}

const RAW_PATH = /^[a-z][a-z0-9+.-]*:\/\/[^/?#]*([^?#]*)/i;

/**
 * Lowercased path exactly as written in the line, or null if the line is
 * not a URL. `URL.pathname` would percent-encode non-ASCII characters.
 */
function pathOf(line: string): string | null {
  try {
    new URL(line);
  } catch {
    return null;
  }
  const match = RAW_PATH.exec(line);
  return match ? (match[1] ?? "").toLowerCase() : null;
}

/**
 * URLs from the index whose path contains the normalized query, in file order
 */
export async function searchIndex(indexFile: string, query: string): Promise<string[]> {
  const token = normalizeQuery(query);
  if (!token) return [];

  if (!(await fileExists(indexFile))) {
    console.warn(`No index found at ${indexFile}`);
    return [];
  }

  const matches: string[] = [];
  const lines = readline.createInterface({
    input: createReadStream(indexFile, { encoding: "utf8" }),
    crlfDelay: Infinity,
  });
  for await (const raw of lines) {
    const line = raw.trim();
    if (!line) continue;
    const p = pathOf(line);
    if (p !== null && p.includes(token)) matches.push(line);
  }
  return matches;
}
