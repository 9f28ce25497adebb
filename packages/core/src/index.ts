/**
 * @seafloor/core
 *
 * Fetch bathymetry from public seafloor elevation services.
 *
 * Pipeline:
 * 1. Form a bounding box around the query
 * 2. Build the source request URL (NCEI or GEBCO)
 * 3. Download the raster into the cache directory
 * 4. Decode it into an elevation grid
 * 5. Interpolate at points or along a transect
 */

// Requests
export {
  BathyRequest,
  type BathyRequestOptions,
  type AreaOptions,
  type PointOptions,
  type TransectOptions,
  type Logger,
  formBbox,
  POINT_BUFFER_DEG,
  clearCache,
  defaultCacheDir,
  formatExtension,
  generateFilename,
  reserveCacheFile,
  downloadToFile,
  DEFAULT_TIMEOUT_MS,
  type HttpClient,
  type DownloadOptions,
  decodeGeoTiff,
  getLatLonGrids,
  linspace,
  type RasterDecoder,
  interpolateGrid,
  isInterpMethod,
  INTERP_METHODS,
  type InterpMethod,
  geodesicDistance,
  haversineDistance,
  createTransect,
  MAX_TRANSECT_POINTS,
  DEFAULT_TRANSECT_POINTS,
  mapWithConcurrency,
} from "./request/index.js";

// Sources
export {
  SOURCE_NAMES,
  isSourceName,
  buildSource,
  buildNceiSource,
  buildGebcoSource,
  NCEI_BASE_URL,
  GEBCO_BASE_URL,
  type SourceName,
  type ImplementedSourceName,
  type PixelSize,
  type Source,
  type SourceOptions,
  type NceiOptions,
  type GebcoOptions,
} from "./sources/index.js";

// Configuration
export { loadConfig, DEFAULT_SOURCE, DEFAULT_CONCURRENCY, type SeafloorConfig } from "./config.js";

// Errors
export {
  InvalidSourceError,
  SourceNotImplementedError,
  DownloadError,
  DecodeError,
  InterpolationError,
  ExcessivePointsWarning,
} from "./errors.js";

export type {
  AreaResult,
  BoundingBox,
  Coordinate,
  ElevationGrid,
  TransectResult,
} from "@seafloor/types";
