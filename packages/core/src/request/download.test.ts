import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Readable } from "node:stream";
import { DownloadError } from "../errors.js";
import { DEFAULT_TIMEOUT_MS, downloadToFile, type HttpClient } from "./download.js";

const TEST_URL = "https://example.test/raster";

function makeResponse(status: number, statusText: string, data: unknown) {
  return { status, statusText, data, headers: {}, config: {} };
}

describe("downloadToFile", () => {
  let dir: string;
  let filepath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "seafloor-download-test-"));
    filepath = join(dir, "out.tiff");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("streams the body to the file", async () => {
    const get = vi
      .fn()
      .mockResolvedValue(makeResponse(200, "OK", Readable.from([Buffer.from("abc"), Buffer.from("def")])));

    await downloadToFile(TEST_URL, filepath, { http: { get } as unknown as HttpClient });

    expect(readFileSync(filepath, "utf-8")).toBe("abcdef");
    expect(get).toHaveBeenCalledTimes(1);
    expect(get).toHaveBeenCalledWith(
      TEST_URL,
      expect.objectContaining({ responseType: "stream", timeout: DEFAULT_TIMEOUT_MS })
    );
  });

  it("passes a custom timeout through", async () => {
    const get = vi.fn().mockResolvedValue(makeResponse(200, "OK", Readable.from([Buffer.from("x")])));
    await downloadToFile(TEST_URL, filepath, { http: { get } as unknown as HttpClient, timeoutMs: 1500 });
    expect(get).toHaveBeenCalledWith(TEST_URL, expect.objectContaining({ timeout: 1500 }));
  });

  it("throws DownloadError with the status on non-2xx responses", async () => {
    const get = vi
      .fn()
      .mockResolvedValue(makeResponse(404, "Not Found", Readable.from([Buffer.from("missing")])));

    const promise = downloadToFile(TEST_URL, filepath, { http: { get } as unknown as HttpClient });
    await expect(promise).rejects.toBeInstanceOf(DownloadError);
    await expect(promise).rejects.toMatchObject({
      status: 404,
      url: TEST_URL,
      message: `Failed to download ${TEST_URL}: 404 Not Found`,
    });
  });

  it("wraps transport failures without a status", async () => {
    const cause = new Error("connect ECONNREFUSED");
    const get = vi.fn().mockRejectedValue(cause);

    const err = await downloadToFile(TEST_URL, filepath, { http: { get } as unknown as HttpClient }).catch(
      (e: unknown) => e
    );
    expect(err).toBeInstanceOf(DownloadError);
    expect((err as DownloadError).status).toBeUndefined();
    expect((err as DownloadError).cause).toBe(cause);
    expect((err as DownloadError).message).toBe(`Request to ${TEST_URL} failed: connect ECONNREFUSED`);
  });

  it("rejects a response without a stream body", async () => {
    const get = vi.fn().mockResolvedValue(makeResponse(200, "OK", "not a stream"));
    await expect(
      downloadToFile(TEST_URL, filepath, { http: { get } as unknown as HttpClient })
    ).rejects.toThrow(`No response body from ${TEST_URL}`);
  });

  it("reports a stream that fails mid-transfer", async () => {
    const body = new Readable({
      read() {
        this.destroy(new Error("socket hang up"));
      },
    });
    const get = vi.fn().mockResolvedValue(makeResponse(200, "OK", body));
    await expect(
      downloadToFile(TEST_URL, filepath, { http: { get } as unknown as HttpClient })
    ).rejects.toMatchObject({ name: "DownloadError", status: 200 });
  });
});
