/**
 * Build the terrain profile of a route file and print a summary.
 *
 * Usage: npx tsx scripts/profile-route.ts <route.json> --tiles <dir> [--out <file.geojson>]
 *                                         [--width 800] [--height 300] [--config <name>]
 *
 * Options:
 *   --tiles    Directory with SRTM .hgt tiles (required)
 *   --out      Write the profile as GeoJSON
 *   --width    Viewport width for the projection summary (default 800)
 *   --height   Viewport height for the projection summary (default 300)
 *   --config   Name of a config in configs/profile (default "default")
 */

import { readFileSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { DemTerrainSource } from "@aeroprofile/terrain";
import {
  buildElevationLegList,
  loadProfileConfig,
  parseRouteJson,
  profileToGeoJson,
  projectProfile,
} from "../src/index.js";

const args = process.argv.slice(2);

function option(name: string): string | undefined {
  const i = args.indexOf(`--${name}`);
  return i >= 0 ? args[i + 1] : undefined;
}

function numberOption(name: string, fallback: number): number {
  const raw = option(name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new Error(`--${name} must be a number, got ${raw}`);
  return value;
}

const optionValues = new Set(
  ["tiles", "out", "width", "height", "config"].map((name) => option(name)),
);
const positional = args.filter((a) => !a.startsWith("--") && !optionValues.has(a));

async function main() {
  const routePath = positional[0];
  const tilesDir = option("tiles");
  if (!routePath || !tilesDir) {
    throw new Error("Usage: profile-route.ts <route.json> --tiles <dir> [--out <file>]");
  }

  const config = loadProfileConfig(option("config") ?? "default");
  const route = parseRouteJson(JSON.parse(readFileSync(resolve(routePath), "utf-8")));
  const terrain = new DemTerrainSource({ dem: { tilesDir: resolve(tilesDir) } });

  console.log(`Building profile for ${route.getWaypoints().length} waypoints...`);
  const start = Date.now();
  const profile = await buildElevationLegList(
    route.getWaypoints(),
    terrain,
    new AbortController().signal,
    config,
  );
  if (!profile) throw new Error("Profile build was cancelled");
  console.log(`Built in ${Date.now() - start}ms`);

  const projection = projectProfile(
    {
      profile,
      viewport: { width: numberOption("width", 800), height: numberOption("height", 300) },
      cruiseAltitudeFt: route.getCruiseAltitudeFt(),
    },
    config,
  );
  if (projection) {
    console.log(
      `Safe altitude ${projection.maxRouteElevationRoundedFt} ft, axis ${projection.axisMaxFt} ft, ` +
        `${projection.polygon.length} polygon points`,
    );
  } else {
    console.log("No route to draw");
  }

  const outputPath = option("out");
  if (outputPath) {
    writeFileSync(resolve(outputPath), JSON.stringify(profileToGeoJson(profile), null, 2));
    console.log(`Written to: ${outputPath}`);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
