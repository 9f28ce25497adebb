/**
 * NCEI DEM Global Mosaic source.
 *
 * Requests a raster from the ArcGIS ImageServer `exportImage` operation.
 * Documentation: https://gis.ngdc.noaa.gov/arcgis/sdk/rest/
 */

import type { BoundingBox } from "@seafloor/types";
import { encodeQuery, formatBbox, formatSize } from "./format.js";
import type { NceiOptions, PixelSize, Source } from "./types.js";

/** Path components of the exportImage endpoint, joined by "/" */
export const NCEI_BASE = {
  host: "https://gis.ngdc.noaa.gov",
  context: "arcgis",
  endpoint: "rest/services",
  folder: "DEM_mosaics",
  serviceName: "DEM_global_mosaic",
  serviceType: "ImageServer",
  operation: "exportImage",
} as const;

export const NCEI_BASE_URL = Object.values(NCEI_BASE).join("/");

/** Resolved NCEI parameters (defaults applied) */
export interface NceiParams {
  bbox: BoundingBox;
  size: PixelSize;
  format: string;
  pixelType: string;
  bboxSR: number | undefined;
  imageSR: number | undefined;
  nodata: number;
  interpolation: string;
  compression: string;
  renderingRule: string | undefined;
  f: string;
}

export const NCEI_DEFAULTS = {
  size: [400, 400],
  format: "tiff",
  pixelType: "F32",
  nodata: 0,
  interpolation: "RSP_NearestNeighbor",
  compression: "LZ77",
  f: "image",
} as const satisfies Partial<NceiParams>;

export function resolveNceiParams(bbox: BoundingBox, options: NceiOptions = {}): NceiParams {
  return {
    bbox,
    size: options.size ?? NCEI_DEFAULTS.size,
    format: options.format ?? NCEI_DEFAULTS.format,
    pixelType: options.pixelType ?? NCEI_DEFAULTS.pixelType,
    bboxSR: options.bboxSR,
    imageSR: options.imageSR,
    nodata: options.nodata ?? NCEI_DEFAULTS.nodata,
    interpolation: options.interpolation ?? NCEI_DEFAULTS.interpolation,
    compression: options.compression ?? NCEI_DEFAULTS.compression,
    renderingRule: options.renderingRule,
    f: options.f ?? NCEI_DEFAULTS.f,
  };
}

/**
 * Format parameters as query-string values, in the order the
 * ImageServer documents them. Unset optional parameters are undefined.
 */
export function formatNceiParams(params: NceiParams): Readonly<Record<string, string | undefined>> {
  return {
    bbox: formatBbox(params.bbox),
    size: formatSize(params.size),
    format: params.format,
    pixelType: params.pixelType,
    bboxSR: params.bboxSR?.toString(),
    imageSR: params.imageSR?.toString(),
    nodata: String(params.nodata),
    interpolation: params.interpolation,
    compression: params.compression,
    renderingRule: params.renderingRule,
    f: params.f,
  };
}

/**
 * Build an NCEI exportImage request for a bounding box.
 *
 * ```ts
 * const source = buildNceiSource({ minLng: -117.43, minLat: 32.55, maxLng: -117.23, maxLat: 32.75 });
 * source.url; // https://gis.ngdc.noaa.gov/arcgis/.../exportImage?bbox=...
 * ```
 */
export function buildNceiSource(bbox: BoundingBox, options: NceiOptions = {}): Source {
  const params = resolveNceiParams(bbox, options);
  const query = encodeQuery(formatNceiParams(params));
  return {
    name: "ncei",
    url: `${NCEI_BASE_URL}?${query}`,
    format: params.format,
  };
}
