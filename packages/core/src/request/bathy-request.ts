/**
 * Bathymetry requests: download a raster around the query, decode it, and
 * interpolate depths at points or along a transect.
 *
 * Usage:
 * ```ts
 * const req = new BathyRequest({ source: "ncei", cacheDir: "./cache" });
 * const { grid, lonvec, latvec } = await req.getArea([-117.43, -117.23], [32.55, 32.75]);
 * const depth = await req.getPoint(-117.43, 32.55);
 * ```
 */

import { mkdirSync, rmSync } from "node:fs";
import { basename } from "node:path";
import type { AreaResult, BoundingBox, Coordinate, ElevationGrid, TransectResult } from "@seafloor/types";
import { DEFAULT_CONCURRENCY, DEFAULT_SOURCE, type SeafloorConfig, loadConfig } from "../config.js";
import { ExcessivePointsWarning } from "../errors.js";
import type { Logger } from "../logger.js";
import { buildSource } from "../sources/factory.js";
import type { PixelSize, SourceOptions } from "../sources/types.js";
import { formBbox } from "./bbox.js";
import { defaultCacheDir, formatExtension, generateFilename, reserveCacheFile } from "./cache.js";
import { DEFAULT_TIMEOUT_MS, downloadToFile, type HttpClient } from "./download.js";
import { geodesicDistance } from "./geodesy.js";
import { interpolateGrid, type InterpMethod } from "./interpolate.js";
import { mapWithConcurrency } from "./pool.js";
import { decodeGeoTiff, getLatLonGrids, type RasterDecoder } from "./raster.js";
import { DEFAULT_TRANSECT_POINTS, MAX_TRANSECT_POINTS, createTransect } from "./transect.js";

export type { Logger };

export interface BathyRequestOptions {
  /** Source identifier (default: "ncei") */
  source?: string;
  /** Directory for downloaded rasters, created on first request (default: ~/.seafloor/cache) */
  cacheDir?: string;
  /** Delete each downloaded file once decoded (default: true) */
  clearCache?: boolean;
  /** HTTP timeout per download in milliseconds (default: 60000) */
  timeoutMs?: number;
  /** Maximum downloads in flight for point batches (default: 32) */
  concurrency?: number;
  /** Injectable HTTP client for testability */
  http?: HttpClient;
  /** Injectable raster decoder (default: GeoTIFF) */
  decode?: RasterDecoder;
  logger?: Logger;
  /** Called when a transect request is clamped (default: logger.warn) */
  onWarning?: (warning: ExcessivePointsWarning) => void;
}

export type AreaOptions = SourceOptions & {
  /** Treat the inputs as one point and fetch a minimal patch around it */
  singlePoint?: boolean;
};

export type PointOptions = SourceOptions & {
  /** Interpolation method (default: "linear") */
  interpMethod?: InterpMethod;
};

export type TransectOptions = PointOptions & {
  /** Points along the transect, at most 800 (default: 100) */
  numPoints?: number;
};

/** Smallest grid that can be interpolated */
const SINGLE_POINT_SIZE: PixelSize = [2, 2];

/** Query coordinates and grid axes are compared at this precision */
const DECIMALS = 5;

const round = (v: number) => Math.round(v * 10 ** DECIMALS) / 10 ** DECIMALS;

function fmtBbox(bbox: BoundingBox): string {
  return `[${bbox.minLng.toFixed(4)},${bbox.minLat.toFixed(4)} → ${bbox.maxLng.toFixed(4)},${bbox.maxLat.toFixed(4)}]`;
}

export class BathyRequest {
  readonly source: string;
  readonly cacheDir: string;
  readonly clearCache: boolean;
  private readonly timeoutMs: number;
  private readonly concurrency: number;
  private readonly http: HttpClient | undefined;
  private readonly decode: RasterDecoder;
  private readonly logger: Logger;
  private readonly onWarning: (warning: ExcessivePointsWarning) => void;

  constructor(options: BathyRequestOptions = {}) {
    this.source = options.source ?? DEFAULT_SOURCE;
    this.cacheDir = options.cacheDir ?? defaultCacheDir();
    this.clearCache = options.clearCache ?? true;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.http = options.http;
    this.decode = options.decode ?? decodeGeoTiff;
    this.logger = options.logger ?? console;
    this.onWarning =
      options.onWarning ?? ((warning) => this.logger.warn(`[transect] ${warning.message}`));
  }

  /** Build a request from SEAFLOOR_* environment variables, with overrides. */
  static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    overrides: BathyRequestOptions = {}
  ): BathyRequest {
    const config: SeafloorConfig = loadConfig(env);
    return new BathyRequest({ ...config, ...overrides });
  }

  static formBbox(
    longitude: number | readonly number[],
    latitude: number | readonly number[],
    singlePoint = false
  ): BoundingBox {
    return formBbox(longitude, latitude, singlePoint);
  }

  static generateFilename(now?: Date): string {
    return generateFilename(now);
  }

  static getLatLonGrids(grid: ElevationGrid): { lonvec: number[]; latvec: number[] } {
    return getLatLonGrids(grid.bounds, grid.values);
  }

  /**
   * Fetch the elevation grid covering the given longitudes and latitudes.
   *
   * 1. Form the bbox (min/max, or point ± 0.001° with `singlePoint`)
   * 2. Build the source URL (2×2 pixels for single points)
   * 3. Download into a new cache file
   * 4. Decode, then delete the file unless the cache is retained
   * 5. Derive the column longitudes and row latitudes
   *
   * @throws InvalidSourceError / SourceNotImplementedError for bad sources
   * @throws DownloadError when the service cannot be reached or answers non-2xx
   * @throws DecodeError when the downloaded file is not a readable raster
   */
  async getArea(
    longitude: number | readonly number[],
    latitude: number | readonly number[],
    options: AreaOptions = {}
  ): Promise<AreaResult> {
    const { singlePoint = false, ...sourceOptions } = options;

    mkdirSync(this.cacheDir, { recursive: true });

    const bbox = formBbox(longitude, latitude, singlePoint);
    const source = buildSource(
      bbox,
      this.source,
      singlePoint ? { ...sourceOptions, size: SINGLE_POINT_SIZE } : sourceOptions
    );

    const filepath = await reserveCacheFile(this.cacheDir, formatExtension(source.format));
    this.logger.log(`[request] ${source.name} bbox=${fmtBbox(bbox)} → ${basename(filepath)}`);

    try {
      await downloadToFile(source.url, filepath, { http: this.http, timeoutMs: this.timeoutMs });
    } catch (err) {
      rmSync(filepath, { force: true });
      throw err;
    }

    let grid: ElevationGrid;
    try {
      grid = await this.decode(filepath);
    } finally {
      if (this.clearCache) rmSync(filepath, { force: true });
    }

    const { lonvec, latvec } = getLatLonGrids(grid.bounds, grid.values);
    return { grid, lonvec, latvec };
  }

  /**
   * Elevation at a single point.
   *
   * A 2×2 patch around the point is downloaded and interpolated. The point
   * and grid axes are rounded to 5 decimals first: the patch edges are
   * computed from the point itself, and float round-off could otherwise
   * put the point just outside them.
   *
   * @throws InterpolationError if the point falls outside the returned grid
   */
  async getPoint(longitude: number, latitude: number, options: PointOptions = {}): Promise<number> {
    const { interpMethod = "linear", ...sourceOptions } = options;
    const { grid, lonvec, latvec } = await this.getArea(longitude, latitude, {
      ...sourceOptions,
      singlePoint: true,
    });
    return interpolateGrid(
      latvec.map(round),
      lonvec.map(round),
      grid.values,
      { lat: round(latitude), lng: round(longitude) },
      interpMethod
    );
  }

  /**
   * Elevation at each point, one download per point, run concurrently.
   * Results follow the input order. The first failure rejects the batch.
   */
  async getPoints(points: readonly Coordinate[], options: PointOptions = {}): Promise<number[]> {
    return mapWithConcurrency(points, this.concurrency, (point) =>
      this.getPoint(point.lng, point.lat, options)
    );
  }

  /**
   * Depth profile between two points.
   *
   * Requests above 800 points are clamped to 800 with an
   * {@link ExcessivePointsWarning}. Distances are geodesic (WGS84) in km
   * from `point1`.
   */
  async getTransect(
    point1: Coordinate,
    point2: Coordinate,
    options: TransectOptions = {}
  ): Promise<TransectResult> {
    const { numPoints = DEFAULT_TRANSECT_POINTS, ...pointOptions } = options;
    if (!Number.isInteger(numPoints) || numPoints < 1) {
      throw new RangeError(`numPoints must be a positive integer, got ${numPoints}`);
    }

    let count = numPoints;
    if (numPoints > MAX_TRANSECT_POINTS) {
      this.onWarning(new ExcessivePointsWarning(numPoints, MAX_TRANSECT_POINTS));
      count = MAX_TRANSECT_POINTS;
    }

    const points = createTransect(point1, point2, count);
    const values = await this.getPoints(points, pointOptions);
    const distances = points.map((point) => geodesicDistance(point1, point));

    return { points, values, distances };
  }
}
