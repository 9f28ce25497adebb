export {
  BathyRequest,
  type BathyRequestOptions,
  type AreaOptions,
  type PointOptions,
  type TransectOptions,
  type Logger,
} from "./bathy-request.js";
export { formBbox, POINT_BUFFER_DEG } from "./bbox.js";
export {
  clearCache,
  defaultCacheDir,
  formatExtension,
  generateFilename,
  reserveCacheFile,
} from "./cache.js";
export {
  downloadToFile,
  DEFAULT_TIMEOUT_MS,
  type HttpClient,
  type DownloadOptions,
} from "./download.js";
export { decodeGeoTiff, getLatLonGrids, linspace, type RasterDecoder } from "./raster.js";
export {
  interpolateGrid,
  isInterpMethod,
  INTERP_METHODS,
  type InterpMethod,
} from "./interpolate.js";
export { geodesicDistance, haversineDistance } from "./geodesy.js";
export { createTransect, MAX_TRANSECT_POINTS, DEFAULT_TRANSECT_POINTS } from "./transect.js";
export { mapWithConcurrency } from "./pool.js";
