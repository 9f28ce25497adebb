/**
 * Source identifiers and the options each service understands.
 */

/** Every source identifier the factory recognizes */
export const SOURCE_NAMES = ["ncei", "gebco", "blue_topo"] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

/** Sources with a working URL builder */
export type ImplementedSourceName = Exclude<SourceName, "blue_topo">;

/** Image size in pixels: [width (longitude), height (latitude)] */
export type PixelSize = readonly [width: number, height: number];

/** A built request: where to download and what file format comes back */
export interface Source {
  readonly name: ImplementedSourceName;
  readonly url: string;
  /** Format as declared in the request (e.g. "tiff", "image/tiff") */
  readonly format: string;
}

/**
 * NCEI ImageServer exportImage options.
 * See https://gis.ngdc.noaa.gov/arcgis/sdk/rest/ for the full parameter list.
 */
export interface NceiOptions {
  size?: PixelSize;
  format?: string;
  pixelType?: string;
  bboxSR?: number;
  imageSR?: number;
  nodata?: number;
  interpolation?: string;
  compression?: string;
  renderingRule?: string;
  f?: string;
}

/** GEBCO WMS getmap options */
export interface GebcoOptions {
  size?: PixelSize;
  format?: string;
  crs?: string;
  layers?: string;
  version?: string;
}

/** Options accepted by any source; each builder reads the keys it knows */
export type SourceOptions = NceiOptions & GebcoOptions;

export function isSourceName(value: string): value is SourceName {
  return SOURCE_NAMES.some((name) => name === value);
}
