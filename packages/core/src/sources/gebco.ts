/**
 * GEBCO Web Map Service source (WMS 1.3.0 getmap).
 */

import type { BoundingBox } from "@seafloor/types";
import { assertSize, encodeQuery, formatBbox } from "./format.js";
import type { GebcoOptions, PixelSize, Source } from "./types.js";

export const GEBCO_BASE_URL =
  "https://www.gebco.net/data_and_products/gebco_web_services/web_map_service/mapserv";

/** Resolved GEBCO parameters (defaults applied) */
export interface GebcoParams {
  bbox: BoundingBox;
  size: PixelSize;
  crs: string;
  format: string;
  layers: string;
  version: string;
}

export const GEBCO_DEFAULTS = {
  size: [400, 400],
  crs: "EPSG:4326",
  format: "image/tiff",
  layers: "gebco_latest_sub_ice_topo",
  version: "1.3.0",
} as const satisfies Partial<GebcoParams>;

export function resolveGebcoParams(bbox: BoundingBox, options: GebcoOptions = {}): GebcoParams {
  return {
    bbox,
    size: options.size ?? GEBCO_DEFAULTS.size,
    crs: options.crs ?? GEBCO_DEFAULTS.crs,
    format: options.format ?? GEBCO_DEFAULTS.format,
    layers: options.layers ?? GEBCO_DEFAULTS.layers,
    version: options.version ?? GEBCO_DEFAULTS.version,
  };
}

export function formatGebcoParams(params: GebcoParams): Readonly<Record<string, string>> {
  assertSize(params.size);
  const [width, height] = params.size;
  return {
    BBOX: formatBbox(params.bbox),
    request: "getmap",
    service: "wms",
    crs: params.crs,
    format: params.format,
    layers: params.layers,
    width: String(width),
    height: String(height),
    version: params.version,
  };
}

/** Build a GEBCO getmap request for a bounding box. */
export function buildGebcoSource(bbox: BoundingBox, options: GebcoOptions = {}): Source {
  const params = resolveGebcoParams(bbox, options);
  return {
    name: "gebco",
    url: `${GEBCO_BASE_URL}?${encodeQuery(formatGebcoParams(params))}`,
    format: params.format,
  };
}
