/**
 * Streaming HTTP download to a local file.
 */

import { createWriteStream } from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { DownloadError } from "../errors.js";

/** The part of an axios instance used for downloads */
export type HttpClient = Pick<AxiosInstance, "get">;

export interface DownloadOptions {
  /** HTTP client (default: the global axios instance) */
  http?: HttpClient;
  /** Request timeout in milliseconds (default: 60000) */
  timeoutMs?: number;
}

export const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * GET `url` and stream the body into `filepath` (truncating it).
 *
 * @throws DownloadError on a non-2xx status or any transport failure
 */
export async function downloadToFile(
  url: string,
  filepath: string,
  options: DownloadOptions = {}
): Promise<void> {
  const http = options.http ?? axios;

  let response: AxiosResponse<unknown>;
  try {
    response = await http.get<unknown>(url, {
      responseType: "stream",
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      validateStatus: () => true,
    });
  } catch (err) {
    throw new DownloadError(url, `Request to ${url} failed: ${errorMessage(err)}`, undefined, {
      cause: err,
    });
  }

  const body = response.data;

  if (response.status < 200 || response.status >= 300) {
    if (body instanceof Readable) body.destroy();
    throw new DownloadError(
      url,
      `Failed to download ${url}: ${response.status} ${response.statusText}`,
      response.status
    );
  }

  if (!(body instanceof Readable)) {
    throw new DownloadError(url, `No response body from ${url}`, response.status);
  }

  try {
    await pipeline(body, createWriteStream(filepath));
  } catch (err) {
    throw new DownloadError(url, `Download of ${url} interrupted: ${errorMessage(err)}`, response.status, {
      cause: err,
    });
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
