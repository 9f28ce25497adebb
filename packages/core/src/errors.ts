/**
 * Error types raised by sources, downloads, decoding and interpolation.
 */

/** Source identifier is not one of the known sources */
export class InvalidSourceError extends Error {
  readonly source: string;

  constructor(source: string, known: readonly string[]) {
    super(`Invalid source "${source}" (expected one of: ${known.join(", ")})`);
    this.name = "InvalidSourceError";
    this.source = source;
  }
}

/** Source is known but no URL builder exists for it yet */
export class SourceNotImplementedError extends Error {
  readonly source: string;

  constructor(source: string) {
    super(`Source "${source}" is not implemented yet`);
    this.name = "SourceNotImplementedError";
    this.source = source;
  }
}

/**
 * HTTP download failed.
 * `status` is set when the server answered with a non-2xx status and is
 * undefined for transport failures (DNS, refused connection, timeout).
 */
export class DownloadError extends Error {
  readonly url: string;
  readonly status: number | undefined;

  constructor(url: string, message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DownloadError";
    this.url = url;
    this.status = status;
  }
}

/** Downloaded file is not a readable raster */
export class DecodeError extends Error {
  readonly filepath: string;

  constructor(filepath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecodeError";
    this.filepath = filepath;
  }
}

/** Query point outside the grid, unknown method, or malformed grid */
export class InterpolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InterpolationError";
  }
}

/** Non-fatal: a transect asked for more points than the services handle */
export class ExcessivePointsWarning extends Error {
  readonly requested: number;
  readonly used: number;

  constructor(requested: number, used: number) {
    super(
      `${requested} points requested; using ${used}. The server may be unable ` +
        `to handle larger requests. For dense profiles, fetch an area with ` +
        `getArea and interpolate it.`
    );
    this.name = "ExcessivePointsWarning";
    this.requested = requested;
    this.used = used;
  }
}
