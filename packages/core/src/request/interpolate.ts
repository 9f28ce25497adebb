/**
 * Interpolation on a rectilinear grid.
 *
 * Axes are strictly increasing coordinate vectors; `values[i][j]` is the
 * sample at (`latvec[i]`, `lonvec[j]`). Points outside the grid are an
 * error, never extrapolated.
 */

import type { Coordinate } from "@seafloor/types";
import { InterpolationError } from "../errors.js";

export const INTERP_METHODS = ["linear", "nearest"] as const;

export type InterpMethod = (typeof INTERP_METHODS)[number];

export function isInterpMethod(value: string): value is InterpMethod {
  return INTERP_METHODS.some((method) => method === value);
}

/** Cell containing a coordinate along one axis */
interface AxisPosition {
  /** Index of the lower grid line */
  index: number;
  /** Fraction of the way to the next grid line (0..1) */
  t: number;
}

/**
 * Interpolate `values` at `point`.
 *
 * - linear: bilinear between the 4 surrounding samples
 * - nearest: the closest sample (ties go to the lower index)
 *
 * @throws InterpolationError for unknown methods, malformed grids, or
 *   points outside the axes
 */
export function interpolateGrid(
  latvec: readonly number[],
  lonvec: readonly number[],
  values: readonly (readonly number[])[],
  point: Coordinate,
  method: InterpMethod = "linear"
): number {
  if (!isInterpMethod(method)) {
    throw new InterpolationError(
      `Unknown interpolation method "${String(method)}" (expected one of: ${INTERP_METHODS.join(", ")})`
    );
  }
  checkAxis(latvec, "latitude");
  checkAxis(lonvec, "longitude");
  if (values.length !== latvec.length || values.some((row) => row.length !== lonvec.length)) {
    throw new InterpolationError(
      `Grid shape does not match axes (${latvec.length} latitudes x ${lonvec.length} longitudes)`
    );
  }

  const lat = locate(latvec, point.lat, "latitude");
  const lng = locate(lonvec, point.lng, "longitude");

  if (method === "nearest") {
    const row = lat.t <= 0.5 ? lat.index : lat.index + 1;
    const col = lng.t <= 0.5 ? lng.index : lng.index + 1;
    return sample(values, row, col);
  }

  const v00 = sample(values, lat.index, lng.index);
  const v01 = sample(values, lat.index, lng.index + 1);
  const v10 = sample(values, lat.index + 1, lng.index);
  const v11 = sample(values, lat.index + 1, lng.index + 1);

  return (
    v00 * (1 - lat.t) * (1 - lng.t) +
    v01 * (1 - lat.t) * lng.t +
    v10 * lat.t * (1 - lng.t) +
    v11 * lat.t * lng.t
  );
}

function checkAxis(axis: readonly number[], label: string): void {
  if (axis.length < 2) {
    throw new InterpolationError(`The ${label} axis needs at least 2 samples, got ${axis.length}`);
  }
  for (let i = 1; i < axis.length; i++) {
    const prev = axis[i - 1];
    const curr = axis[i];
    if (prev === undefined || curr === undefined || !(curr > prev)) {
      throw new InterpolationError(`The ${label} axis must be strictly increasing`);
    }
  }
}

/** Binary search for the cell holding `x`. Axis is already checked. */
function locate(axis: readonly number[], x: number, label: string): AxisPosition {
  const first = axis[0] ?? Number.NaN;
  const last = axis[axis.length - 1] ?? Number.NaN;
  if (!(x >= first && x <= last)) {
    throw new InterpolationError(
      `The ${label} ${x} is outside the grid range [${first}, ${last}]`
    );
  }

  let lo = 0;
  let hi = axis.length - 2;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if ((axis[mid] ?? Number.NaN) <= x) lo = mid;
    else hi = mid - 1;
  }

  const x0 = axis[lo] ?? Number.NaN;
  const x1 = axis[lo + 1] ?? Number.NaN;
  return { index: lo, t: (x - x0) / (x1 - x0) };
}

function sample(values: readonly (readonly number[])[], row: number, col: number): number {
  const v = values[row]?.[col];
  if (v === undefined) {
    throw new InterpolationError(`No sample at row ${row}, column ${col}`);
  }
  return v;
}
