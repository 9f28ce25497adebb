/**
 * Transect point generation.
 */

import type { Coordinate } from "@seafloor/types";
import { linspace } from "./raster.js";

/** Upper bound on points per transect; the services reject larger batches */
export const MAX_TRANSECT_POINTS = 800;

export const DEFAULT_TRANSECT_POINTS = 100;

/**
 * `numPoints` points from `start` to `end` inclusive.
 *
 * Longitude and latitude are interpolated independently, which
 * approximates (but does not follow) the great circle between the ends.
 */
export function createTransect(
  start: Coordinate,
  end: Coordinate,
  numPoints: number = DEFAULT_TRANSECT_POINTS
): Coordinate[] {
  if (!Number.isInteger(numPoints) || numPoints < 1) {
    throw new RangeError(`numPoints must be a positive integer, got ${numPoints}`);
  }
  const lngs = linspace(start.lng, end.lng, numPoints);
  const lats = linspace(start.lat, end.lat, numPoints);
  return lngs.map((lng, i) => ({ lat: lats[i] ?? end.lat, lng }));
}
