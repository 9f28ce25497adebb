/**
 * Query-string formatting shared by the source builders.
 */

import type { BoundingBox } from "@seafloor/types";
import type { PixelSize } from "./types.js";

const BBOX_DECIMALS = 5;

/** Bbox as "minLng,minLat,maxLng,maxLat" with 5 decimals */
export function formatBbox(bbox: BoundingBox): string {
  const ordered = [bbox.minLng, bbox.minLat, bbox.maxLng, bbox.maxLat];
  for (const v of ordered) {
    if (!Number.isFinite(v)) {
      throw new RangeError(`Bounding box values must be finite, got ${ordered.join(",")}`);
    }
  }
  return ordered.map((v) => v.toFixed(BBOX_DECIMALS)).join(",");
}

/** Pixel size as "width,height" */
export function formatSize(size: PixelSize): string {
  assertSize(size);
  return size.join(",");
}

export function assertSize(size: PixelSize): void {
  if (!size.every((n) => Number.isInteger(n) && n > 0)) {
    throw new RangeError(`Pixel size must be positive integers, got ${size.join(",")}`);
  }
}

/**
 * Encode parameters in insertion order, skipping unset values.
 */
export function encodeQuery(params: Readonly<Record<string, string | undefined>>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) search.append(key, value);
  }
  return search.toString();
}
