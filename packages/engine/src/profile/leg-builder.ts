/**
 * Leg builder: terrain samples between two waypoints → one ElevationLeg.
 *
 * Samples are converted to feet and thinned: once enough legs of the route
 * have been built, a sample whose altitude is within the tolerance of the
 * last kept sample is dropped. The first and last sample of a leg are always
 * kept. Distances are cumulative along the whole route.
 */

import type { ElevationLeg, ElevationSample, Position, RouteWaypoint } from "@aeroprofile/types";
import { distanceNm, metersToFeet, sampleTerrain, type TerrainSource } from "@aeroprofile/terrain";
import type { ProfileConfig } from "../config.js";

/** Route-wide bookkeeping threaded from leg to leg */
export interface LegBuildState {
  /** Legs already accumulated in the containing list */
  legsBuilt: number;
  /** Route distance at the start of this leg, in NM */
  totalDistanceNm: number;
}

export interface LegBuildResult {
  leg: ElevationLeg;
  /** Route distance at the end of this leg, in NM */
  totalDistanceNm: number;
}

/**
 * Fetch terrain for one leg and build it.
 *
 * @returns null if the signal was aborted; the caller must discard the leg.
 */
export async function buildElevationLeg(
  terrain: TerrainSource,
  from: RouteWaypoint,
  to: RouteWaypoint,
  state: LegBuildState,
  signal: AbortSignal,
  config: ProfileConfig,
): Promise<LegBuildResult | null> {
  const samples = await sampleTerrain(terrain, from.position, to.position);
  return buildLegFromSamples(samples, state, signal, config);
}

/** Thin and measure already fetched samples. */
export function buildLegFromSamples(
  samples: readonly ElevationSample[],
  state: LegBuildState,
  signal: AbortSignal,
  config: ProfileConfig,
): LegBuildResult | null {
  const leg: ElevationLeg = { elevation: [], distances: [], maxElevationFt: 0 };
  const thinning = state.legsBuilt >= config.thinningMinLegs;
  const lastIndex = samples.length - 1;

  let total = state.totalDistanceNm;
  let lastPos: Position | null = null;

  for (let j = 0; j < samples.length; j++) {
    if (signal.aborted) return null;

    const sample = samples[j]!;
    const pos: Position = {
      lat: sample.lat,
      lng: sample.lng,
      altitudeFt: metersToFeet(sample.altitudeMeters),
    };

    if (
      thinning &&
      lastPos &&
      j !== 0 &&
      j !== lastIndex &&
      Math.abs(pos.altitudeFt - lastPos.altitudeFt) < config.altitudeToleranceFt
    ) {
      continue;
    }

    if (pos.altitudeFt > leg.maxElevationFt) leg.maxElevationFt = pos.altitudeFt;
    if (lastPos) total += distanceNm(lastPos, pos);

    leg.elevation.push(pos);
    leg.distances.push(total);
    lastPos = pos;
  }

  return { leg, totalDistanceNm: total };
}
