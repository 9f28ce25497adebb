export {
  SOURCE_NAMES,
  isSourceName,
  type SourceName,
  type ImplementedSourceName,
  type PixelSize,
  type Source,
  type SourceOptions,
  type NceiOptions,
  type GebcoOptions,
} from "./types.js";
export { formatBbox, formatSize, encodeQuery } from "./format.js";
export {
  NCEI_BASE,
  NCEI_BASE_URL,
  NCEI_DEFAULTS,
  resolveNceiParams,
  formatNceiParams,
  buildNceiSource,
  type NceiParams,
} from "./ncei.js";
export {
  GEBCO_BASE_URL,
  GEBCO_DEFAULTS,
  resolveGebcoParams,
  formatGebcoParams,
  buildGebcoSource,
  type GebcoParams,
} from "./gebco.js";
export { buildSource } from "./factory.js";
