import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readdirSync, rmSync, statSync, writeFileSync } from "node:fs";
import { basename, join } from "node:path";
import { homedir, tmpdir } from "node:os";
import {
  clearCache,
  defaultCacheDir,
  formatExtension,
  generateFilename,
  reserveCacheFile,
} from "./cache.js";

const quietLogger = () => ({ log: vi.fn(), warn: vi.fn() });

const FILENAME_PATTERN = /^\d{14}[A-Za-z0-9_-]{8}$/;

describe("generateFilename", () => {
  it("is a 14-digit timestamp followed by an 8-character token", () => {
    expect(generateFilename()).toMatch(FILENAME_PATTERN);
  });

  it("starts with the local timestamp to the second", () => {
    const name = generateFilename(new Date(2024, 0, 31, 23, 59, 58));
    expect(name.slice(0, 14)).toBe("20240131235958");
    expect(name).toHaveLength(22);
  });

  it("pads single-digit fields", () => {
    const name = generateFilename(new Date(2023, 4, 6, 7, 8, 9));
    expect(name.slice(0, 14)).toBe("20230506070809");
  });

  it("is unique across 10,000 rapid calls", () => {
    const names = new Set<string>();
    for (let i = 0; i < 10_000; i++) names.add(generateFilename());
    expect(names.size).toBe(10_000);
  });
});

describe("formatExtension", () => {
  it("strips MIME prefixes", () => {
    expect(formatExtension("image/jpeg")).toBe("jpeg");
    expect(formatExtension("image/tiff")).toBe("tiff");
  });

  it("keeps bare formats", () => {
    expect(formatExtension("tiff")).toBe("tiff");
    expect(formatExtension("png")).toBe("png");
  });
});

describe("defaultCacheDir", () => {
  it("lives under the home directory", () => {
    expect(defaultCacheDir()).toBe(join(homedir(), ".seafloor", "cache"));
  });
});

describe("cache directory", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "seafloor-cache-test-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe("reserveCacheFile", () => {
    it("creates an empty file with the given extension", async () => {
      const filepath = await reserveCacheFile(root, "tiff");
      expect(existsSync(filepath)).toBe(true);
      expect(statSync(filepath).size).toBe(0);
      expect(basename(filepath)).toMatch(/^\d{14}[A-Za-z0-9_-]{8}\.tiff$/);
    });

    it("never hands out the same path twice", async () => {
      const paths = await Promise.all(Array.from({ length: 50 }, () => reserveCacheFile(root, "tiff")));
      expect(new Set(paths).size).toBe(50);
      expect(readdirSync(root)).toHaveLength(50);
    });

    it("fails when the directory does not exist", async () => {
      await expect(reserveCacheFile(join(root, "missing"), "tiff")).rejects.toThrow();
    });
  });

  describe("clearCache", () => {
    it("removes the directory and everything in it", () => {
      const dir = join(root, "cache");
      mkdirSync(join(dir, "nested"), { recursive: true });
      writeFileSync(join(dir, "a.tiff"), "a");
      writeFileSync(join(dir, "b.tiff"), "b");
      writeFileSync(join(dir, "nested", "c.tiff"), "c");

      expect(clearCache(dir, quietLogger())).toBe(3);
      expect(existsSync(dir)).toBe(false);
    });

    it("reports the count through the given logger", () => {
      const dir = join(root, "cache");
      mkdirSync(dir);
      writeFileSync(join(dir, "a.tiff"), "a");
      writeFileSync(join(dir, "b.tiff"), "b");
      const logger = quietLogger();

      clearCache(dir, logger);

      expect(logger.log).toHaveBeenCalledTimes(1);
      expect(logger.log).toHaveBeenCalledWith("[cache] Cleared 2 cached file(s)");
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it("is a no-op on a missing directory", () => {
      const dir = join(root, "cache");
      mkdirSync(dir);
      const logger = quietLogger();
      clearCache(dir, logger);
      expect(() => clearCache(dir, logger)).not.toThrow();
      expect(clearCache(dir, logger)).toBe(0);
      expect(logger.log).toHaveBeenCalledTimes(1);
    });
  });
});
