/**
 * Bounding boxes for area and single-point queries.
 */

import type { BoundingBox } from "@seafloor/types";

/** Half-width (degrees) of the box fetched around a single point */
export const POINT_BUFFER_DEG = 0.001;

/**
 * Form a bounding box from query longitudes and latitudes.
 *
 * Area mode takes the min/max of each sequence. Single-point mode expands
 * the point by {@link POINT_BUFFER_DEG} in every direction.
 */
export function formBbox(
  longitude: number | readonly number[],
  latitude: number | readonly number[],
  singlePoint = false
): BoundingBox {
  if (singlePoint) {
    const lng = toScalar(longitude, "longitude");
    const lat = toScalar(latitude, "latitude");
    return {
      minLng: lng - POINT_BUFFER_DEG,
      minLat: lat - POINT_BUFFER_DEG,
      maxLng: lng + POINT_BUFFER_DEG,
      maxLat: lat + POINT_BUFFER_DEG,
    };
  }

  const [minLng, maxLng] = extent(toArray(longitude, "longitude"));
  const [minLat, maxLat] = extent(toArray(latitude, "latitude"));
  return { minLng, minLat, maxLng, maxLat };
}

/** [min, max] in one pass, without spreading into call arguments */
function extent(values: readonly number[]): [number, number] {
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return [min, max];
}

function toScalar(value: number | readonly number[], label: string): number {
  if (typeof value === "number") return value;
  const [only] = value;
  if (value.length !== 1 || only === undefined) {
    throw new RangeError(`Single-point ${label} must be one value, got ${value.length}`);
  }
  return only;
}

function toArray(value: number | readonly number[], label: string): readonly number[] {
  if (typeof value === "number") return [value];
  if (value.length === 0) {
    throw new RangeError(`${label} must contain at least one value`);
  }
  return value;
}
