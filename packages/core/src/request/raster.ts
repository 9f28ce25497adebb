/**
 * GeoTIFF decoding and grid coordinates.
 */

import { readFile } from "node:fs/promises";
import { fromArrayBuffer } from "geotiff";
import type { BoundingBox, ElevationGrid } from "@seafloor/types";
import { DecodeError } from "../errors.js";

/** Turns a downloaded file into an elevation grid */
export type RasterDecoder = (filepath: string) => Promise<ElevationGrid>;

/**
 * Read the first band of a GeoTIFF.
 *
 * Rows are returned south → north, so north-up images (the usual case,
 * negative y resolution) are flipped.
 *
 * @throws DecodeError if the file is missing, not a TIFF, or not georeferenced
 */
export async function decodeGeoTiff(filepath: string): Promise<ElevationGrid> {
  try {
    const buffer = await readFile(filepath);
    const arrayBuffer = new ArrayBuffer(buffer.byteLength);
    new Uint8Array(arrayBuffer).set(buffer);

    const tiff = await fromArrayBuffer(arrayBuffer);
    const image = await tiff.getImage();
    const width = image.getWidth();
    const height = image.getHeight();
    const [minLng, minLat, maxLng, maxLat] = image.getBoundingBox();
    if (minLng === undefined || minLat === undefined || maxLng === undefined || maxLat === undefined) {
      throw new DecodeError(filepath, `No bounding box in ${filepath}`);
    }

    const rasters = await image.readRasters({ samples: [0] });
    const band: ArrayLike<number> | undefined = Array.isArray(rasters) ? rasters[0] : rasters;
    if (!band || band.length !== width * height) {
      throw new DecodeError(filepath, `Expected ${width}x${height} samples in ${filepath}`);
    }

    const samples = Array.from(band);
    const values: number[][] = [];
    for (let row = 0; row < height; row++) {
      values.push(samples.slice(row * width, (row + 1) * width));
    }

    const [, resY] = image.getResolution();
    if ((resY ?? -1) < 0) values.reverse();

    return { values, bounds: { minLng, minLat, maxLng, maxLat } };
  } catch (err) {
    if (err instanceof DecodeError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new DecodeError(filepath, `Could not decode ${filepath}: ${reason}`, { cause: err });
  }
}

/**
 * `n` evenly spaced values from `start` to `stop` inclusive.
 * The last value is exactly `stop`.
 */
export function linspace(start: number, stop: number, n: number): number[] {
  if (n <= 0) return [];
  if (n === 1) return [start];
  const step = (stop - start) / (n - 1);
  const out = Array.from({ length: n }, (_, i) => start + i * step);
  out[n - 1] = stop;
  return out;
}

/**
 * Longitude of each column and latitude of each row, spread evenly
 * across the bounds.
 */
export function getLatLonGrids(
  bounds: BoundingBox,
  values: readonly (readonly number[])[]
): { lonvec: number[]; latvec: number[] } {
  const columns = values[0]?.length ?? 0;
  return {
    lonvec: linspace(bounds.minLng, bounds.maxLng, columns),
    latvec: linspace(bounds.minLat, bounds.maxLat, values.length),
  };
}
