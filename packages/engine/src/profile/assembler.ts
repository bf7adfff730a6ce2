/**
 * Route profile assembler.
 *
 * Builds the full ElevationLegList for a route snapshot, one leg per
 * consecutive waypoint pair. Cancellation is checked before every leg and
 * after every terrain fetch; a cancelled build yields null, never a partial
 * list.
 */

import type { ElevationLegList, RouteWaypoint } from "@aeroprofile/types";
import type { TerrainSource } from "@aeroprofile/terrain";
import type { ProfileConfig, ProfileLogger } from "../config.js";
import { ProfileContractError } from "../errors.js";
import { buildElevationLeg } from "./leg-builder.js";

/** A well-formed list with no legs and zero totals */
export function emptyLegList(waypoints: RouteWaypoint[] = []): ElevationLegList {
  return {
    legs: [],
    waypoints,
    totalDistanceNm: 0,
    totalNumPoints: 0,
    maxRouteElevationFt: 0,
  };
}

/** Deep copy of the route so later edits of the live model cannot leak in */
export function snapshotWaypoints(waypoints: readonly RouteWaypoint[]): RouteWaypoint[] {
  return waypoints.map((wp) => ({
    ident: wp.ident,
    kind: wp.kind,
    position: { ...wp.position },
  }));
}

/** Throws ProfileContractError for waypoints without a usable position. */
export function assertRouteContract(waypoints: readonly RouteWaypoint[]): void {
  waypoints.forEach((wp, i) => {
    const { lat, lng } = wp.position;
    if (!Number.isFinite(lat) || !Number.isFinite(lng) || Math.abs(lat) > 90 || Math.abs(lng) > 180) {
      throw new ProfileContractError(
        `Waypoint ${i} (${wp.ident}) has an invalid position: lat=${lat}, lng=${lng}`,
      );
    }
  });
}

/**
 * Build the elevation profile of a route.
 *
 * @returns the profile, or null if `signal` was aborted during the build.
 */
export async function buildElevationLegList(
  route: readonly RouteWaypoint[],
  terrain: TerrainSource,
  signal: AbortSignal,
  config: ProfileConfig,
  logger: ProfileLogger = console,
): Promise<ElevationLegList | null> {
  assertRouteContract(route);
  const list = emptyLegList(snapshotWaypoints(route));
  const waypoints = list.waypoints;

  for (let i = 1; i < waypoints.length; i++) {
    if (signal.aborted) return null;

    const result = await buildElevationLeg(
      terrain,
      waypoints[i - 1]!,
      waypoints[i]!,
      { legsBuilt: list.legs.length, totalDistanceNm: list.totalDistanceNm },
      signal,
      config,
    );
    if (!result || signal.aborted) return null;

    list.legs.push(result.leg);
    list.totalDistanceNm = result.totalDistanceNm;
    list.totalNumPoints += result.leg.elevation.length;
    if (result.leg.maxElevationFt > list.maxRouteElevationFt) {
      list.maxRouteElevationFt = result.leg.maxElevationFt;
    }
  }

  logger.log(
    `[profile] ${list.legs.length} legs, ${list.totalNumPoints} points, ` +
      `${list.totalDistanceNm.toFixed(1)} NM, max elevation ${Math.round(list.maxRouteElevationFt)} ft`,
  );
  return list;
}
