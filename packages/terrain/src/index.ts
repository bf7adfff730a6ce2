/**
 * @aeroprofile/terrain
 *
 * Terrain access for the profile engine: the sampler adapter every profile
 * build goes through, great-circle helpers, and a DEM-backed source.
 */

export {
  metersToNm,
  metersToFeet,
  haversineDistance,
  distanceNm,
  intermediatePoint,
  interpolatePosition,
} from "./geo.js";

export { sampleTerrain, type TerrainSource } from "./sampler.js";

export { DemReader, type DemConfig } from "./hgt-reader.js";

export { DemTerrainSource, type DemTerrainOptions } from "./dem-source.js";
