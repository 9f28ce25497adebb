/**
 * Download cache: file naming and maintenance.
 *
 * The cache is a flat directory of raster files named
 * `<YYYYMMDDHHMMSS><token>.<ext>`. Nothing else is stored, so the whole
 * directory can be deleted at any time.
 */

import { randomBytes } from "node:crypto";
import { existsSync, readdirSync, rmSync } from "node:fs";
import { homedir } from "node:os";
import { open } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "../logger.js";

/** Random bytes in the filename token (8 base64url characters) */
const TOKEN_BYTES = 6;

/** Default cache directory */
export function defaultCacheDir(): string {
  return join(homedir(), ".seafloor", "cache");
}

/**
 * Generate a cache filename stem: local timestamp to the second plus a
 * random token. E.g. "20240131235959Ab3_x-9Q".
 */
export function generateFilename(now: Date = new Date()): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, "0");
  const stamp =
    pad(now.getFullYear(), 4) +
    pad(now.getMonth() + 1) +
    pad(now.getDate()) +
    pad(now.getHours()) +
    pad(now.getMinutes()) +
    pad(now.getSeconds());
  return stamp + randomBytes(TOKEN_BYTES).toString("base64url");
}

/**
 * File extension for a declared source format.
 * MIME-style names lose their type prefix: "image/tiff" → "tiff".
 */
export function formatExtension(format: string): string {
  const slash = format.lastIndexOf("/");
  return slash === -1 ? format : format.slice(slash + 1);
}

/**
 * Delete the cache directory and everything in it.
 * Does nothing if the directory does not exist.
 *
 * @returns Number of files removed
 */
export function clearCache(
  cacheDir: string = defaultCacheDir(),
  logger: Logger = console
): number {
  if (!existsSync(cacheDir)) return 0;
  const count = countFiles(cacheDir);
  rmSync(cacheDir, { recursive: true, force: true });
  logger.log(`[cache] Cleared ${count} cached file(s)`);
  return count;
}

function countFiles(dir: string): number {
  let count = 0;
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    count += entry.isDirectory() ? countFiles(join(dir, entry.name)) : 1;
  }
  return count;
}

/**
 * Create an empty, uniquely named cache file and return its path.
 *
 * The file is created exclusively, so a name already taken by another
 * request (same second, same token) is never reused; a fresh name is
 * drawn instead.
 */
export async function reserveCacheFile(
  cacheDir: string,
  extension: string,
  maxAttempts = 5
): Promise<string> {
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const filepath = join(cacheDir, `${generateFilename()}.${extension}`);
    try {
      const handle = await open(filepath, "wx");
      await handle.close();
      return filepath;
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "EEXIST") continue;
      throw err;
    }
  }
  throw new Error(`Could not create a unique cache file in ${cacheDir} after ${maxAttempts} attempts`);
}
