/**
 * Raster and profile types produced by bathymetry requests.
 */

import type { BoundingBox, Coordinate } from "./geo.js";

/**
 * A decoded elevation raster.
 *
 * `values[row][col]`: rows run south → north, columns west → east.
 * Elevations are in meters; depths are negative.
 */
export interface ElevationGrid {
  values: number[][];
  /** Geographic extent covered by the outermost samples */
  bounds: BoundingBox;
}

/** An elevation grid with the coordinate of each row and column */
export interface AreaResult {
  grid: ElevationGrid;
  /** Longitude of each column (length = columns) */
  lonvec: number[];
  /** Latitude of each row (length = rows) */
  latvec: number[];
}

/** Depth profile sampled between two points */
export interface TransectResult {
  points: Coordinate[];
  /** Interpolated elevation at each point (meters) */
  values: number[];
  /** Geodesic distance from the first point (km) */
  distances: number[];
}
