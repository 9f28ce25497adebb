/**
 * Environment-driven defaults for bathymetry requests.
 *
 * | Variable               | Default            |
 * | ---------------------- | ------------------ |
 * | SEAFLOOR_SOURCE        | ncei               |
 * | SEAFLOOR_CACHE_DIR     | ~/.seafloor/cache  |
 * | SEAFLOOR_CLEAR_CACHE   | true               |
 * | SEAFLOOR_TIMEOUT_MS    | 60000              |
 * | SEAFLOOR_CONCURRENCY   | 32                 |
 */

import { defaultCacheDir } from "./request/cache.js";
import { DEFAULT_TIMEOUT_MS } from "./request/download.js";

export const DEFAULT_SOURCE = "ncei";
export const DEFAULT_CONCURRENCY = 32;

export interface SeafloorConfig {
  source: string;
  cacheDir: string;
  clearCache: boolean;
  timeoutMs: number;
  concurrency: number;
}

/**
 * Read configuration from environment variables.
 *
 * @throws Error naming the variable when a value cannot be parsed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SeafloorConfig {
  return {
    source: env["SEAFLOOR_SOURCE"] || DEFAULT_SOURCE,
    cacheDir: env["SEAFLOOR_CACHE_DIR"] || defaultCacheDir(),
    clearCache: parseBoolean(env, "SEAFLOOR_CLEAR_CACHE", true),
    timeoutMs: parsePositiveInt(env, "SEAFLOOR_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
    concurrency: parsePositiveInt(env, "SEAFLOOR_CONCURRENCY", DEFAULT_CONCURRENCY),
  };
}

function parseBoolean(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === "true" || raw === "1" || raw === "yes") return true;
  if (raw === "false" || raw === "0" || raw === "no") return false;
  throw new Error(`${name} must be true or false, got "${env[name]}"`);
}

function parsePositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}
