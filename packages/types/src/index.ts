/**
 * @seafloor/types
 *
 * Shared types for bathymetry requests.
 *
 * - Geo: coordinates and bounding boxes
 * - Raster: decoded elevation grids and transect profiles
 */

export * from "./geo.js";
export * from "./raster.js";
