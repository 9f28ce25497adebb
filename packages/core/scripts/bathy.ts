/**
 * Bathymetry query CLI.
 *
 * Usage:
 *   npx tsx scripts/bathy.ts point <lng> <lat>
 *   npx tsx scripts/bathy.ts area <lng1> <lat1> <lng2> <lat2>
 *   npx tsx scripts/bathy.ts transect <lng1> <lat1> <lng2> <lat2> [numPoints]
 *   npx tsx scripts/bathy.ts clear-cache
 *
 * Results are printed as CSV. SEAFLOOR_* environment variables choose the
 * source and cache settings (see src/config.ts); SEAFLOOR_INTERP picks
 * "linear" or "nearest" for point and transect queries.
 */
import { BathyRequest, clearCache, isInterpMethod, loadConfig } from "../src/index.js";

const USAGE = [
  "Usage:",
  "  npx tsx scripts/bathy.ts point <lng> <lat>",
  "  npx tsx scripts/bathy.ts area <lng1> <lat1> <lng2> <lat2>",
  "  npx tsx scripts/bathy.ts transect <lng1> <lat1> <lng2> <lat2> [numPoints]",
  "  npx tsx scripts/bathy.ts clear-cache",
].join("\n");

// ── Helpers ──────────────────────────────────────────────────────────

function num(value: string | undefined, label: string): number {
  const n = Number(value);
  if (value === undefined || value.trim() === "" || !Number.isFinite(n)) {
    throw new Error(`${label} must be a number, got "${value ?? ""}"`);
  }
  return n;
}

function interpMethod() {
  const raw = process.env["SEAFLOOR_INTERP"] ?? "linear";
  if (!isInterpMethod(raw)) {
    throw new Error(`SEAFLOOR_INTERP must be "linear" or "nearest", got "${raw}"`);
  }
  return raw;
}

// ── Commands ─────────────────────────────────────────────────────────

async function run(command: string | undefined, args: string[]): Promise<void> {
  switch (command) {
    case "point": {
      const lng = num(args[0], "lng");
      const lat = num(args[1], "lat");
      const depth = await BathyRequest.fromEnv().getPoint(lng, lat, { interpMethod: interpMethod() });
      console.log("lng,lat,depth");
      console.log(`${lng},${lat},${depth}`);
      return;
    }
    case "area": {
      const lngs = [num(args[0], "lng1"), num(args[2], "lng2")];
      const lats = [num(args[1], "lat1"), num(args[3], "lat2")];
      const { grid, lonvec, latvec } = await BathyRequest.fromEnv().getArea(lngs, lats);
      console.log("lng,lat,depth");
      grid.values.forEach((row, r) => {
        row.forEach((depth, c) => {
          console.log(`${lonvec[c]},${latvec[r]},${depth}`);
        });
      });
      return;
    }
    case "transect": {
      const start = { lng: num(args[0], "lng1"), lat: num(args[1], "lat1") };
      const end = { lng: num(args[2], "lng2"), lat: num(args[3], "lat2") };
      const numPoints = args[4] === undefined ? undefined : num(args[4], "numPoints");
      const { points, values, distances } = await BathyRequest.fromEnv().getTransect(start, end, {
        numPoints,
        interpMethod: interpMethod(),
      });
      console.log("distance_km,lng,lat,depth");
      points.forEach((p, i) => {
        console.log(`${distances[i]?.toFixed(3)},${p.lng},${p.lat},${values[i]}`);
      });
      return;
    }
    case "clear-cache":
      clearCache(loadConfig().cacheDir);
      return;
    default:
      console.error(USAGE);
      process.exit(1);
  }
}

// ── Main ─────────────────────────────────────────────────────────────

const [command, ...args] = process.argv.slice(2);

run(command, args).catch((err: unknown) => {
  console.error(`[error] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
