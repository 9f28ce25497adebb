/**
 * Source factory: picks the URL builder for a source identifier.
 */

import type { BoundingBox } from "@seafloor/types";
import { InvalidSourceError, SourceNotImplementedError } from "../errors.js";
import { buildGebcoSource } from "./gebco.js";
import { buildNceiSource } from "./ncei.js";
import { SOURCE_NAMES, isSourceName, type Source, type SourceOptions } from "./types.js";

/**
 * Build the request for `sourceName` over `bbox`.
 *
 * @throws InvalidSourceError if the name is not a known source
 * @throws SourceNotImplementedError if the source is known but has no builder
 */
export function buildSource(
  bbox: BoundingBox,
  sourceName: string = "ncei",
  options: SourceOptions = {}
): Source {
  if (!isSourceName(sourceName)) {
    throw new InvalidSourceError(sourceName, SOURCE_NAMES);
  }

  switch (sourceName) {
    case "ncei":
      return buildNceiSource(bbox, options);
    case "gebco":
      return buildGebcoSource(bbox, options);
    case "blue_topo":
      throw new SourceNotImplementedError(sourceName);
  }
}
