/**
 * Filesystem utility functions
 */

import fs from "node:fs/promises";
import path from "node:path";

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

/**
 * True if the path exists. Errors other than ENOENT are rethrown.
 */
export async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return false;
    }
    throw err;
  }
}

/**
 * Write via a sibling temp file and rename so readers never see half a file
 */
export async function writeFileAtomic(file: string, data: Buffer | string): Promise<void> {
  await ensureDir(path.dirname(file));
  const tmp = `${file}.part`;
  await fs.writeFile(tmp, data);
  await fs.rename(tmp, file);
}
