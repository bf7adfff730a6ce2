/**
 * Terrain sampler adapter.
 *
 * Wraps an external elevation source behind a single call that always yields
 * a usable sample sequence between two route points.
 */

import type { Coordinate, ElevationSample } from "@aeroprofile/types";

/**
 * Source of terrain heights, e.g. a DEM tile set or a map engine's
 * elevation model. Must be safe to call while the live route is being edited.
 */
export interface TerrainSource {
  /**
   * Ordered terrain samples from `from` to `to`, altitudes in meters.
   * May return an empty list when no data is loaded for the area.
   */
  heightProfile(
    from: Coordinate,
    to: Coordinate,
  ): readonly ElevationSample[] | Promise<readonly ElevationSample[]>;

  /** Drop cached lookups so newly arrived terrain data is read */
  refresh?(): void;
}

/**
 * Sample the terrain between two points.
 *
 * When the source has nothing for the segment, returns a flat two-point
 * sequence at 0 m on the endpoints so the leg still spans its distance.
 */
export async function sampleTerrain(
  source: TerrainSource,
  from: Coordinate,
  to: Coordinate,
): Promise<ElevationSample[]> {
  const samples = await source.heightProfile(from, to);
  if (samples.length > 0) return [...samples];

  return [
    { lat: from.lat, lng: from.lng, altitudeMeters: 0 },
    { lat: to.lat, lng: to.lng, altitudeMeters: 0 },
  ];
}
