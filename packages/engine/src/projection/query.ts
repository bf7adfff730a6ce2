/**
 * Interactive query: pixel x → leg, distance, ground altitude and position.
 */

import type {
  ElevationLegList,
  ProfileQueryResult,
  ProjectionState,
  RouteWaypoint,
  WaypointTag,
} from "@aeroprofile/types";
import { interpolatePosition } from "@aeroprofile/terrain";
import { safeAltitudeFt, type ProfileConfig } from "../config.js";

/** Index of the first element >= value, or values.length */
export function lowerBound(values: readonly number[], value: number): number {
  let lo = 0;
  let hi = values.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (values[mid]! < value) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** Index of the first element > value, or values.length */
export function upperBound(values: readonly number[], value: number): number {
  let lo = 0;
  let hi = values.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (values[mid]! <= value) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

function tag(wp: RouteWaypoint): WaypointTag {
  return { ident: wp.ident, kind: wp.kind };
}

/**
 * Probe the profile at a pixel column.
 *
 * x outside the viewport, or a query against an empty profile, yields null.
 * Inside the viewport x is clamped to the plot area.
 *
 * The ground altitude is the mean of the two samples bracketing the distance
 * (`abs(a + b) / 2`), not a distance-weighted interpolation. The position is
 * interpolated on the straight line between the leg's first and last sample.
 */
export function queryProfile(
  profile: ElevationLegList | null,
  projection: ProjectionState | null,
  x: number,
  config: ProfileConfig,
): ProfileQueryResult | null {
  if (!profile || !projection || profile.legs.length === 0) return null;
  if (!Number.isFinite(x) || x < 0 || x > projection.viewport.width) return null;

  const left = projection.leftMargin;
  const clampedX = Math.min(Math.max(x, left), projection.viewport.width - left);

  let legIndex = 0;
  const wpIndex = lowerBound(projection.waypointX, clampedX);
  if (wpIndex < projection.waypointX.length) {
    legIndex = Math.max(0, wpIndex - 1);
  }
  legIndex = Math.min(legIndex, profile.legs.length - 1);

  const leg = profile.legs[legIndex]!;
  const from = profile.waypoints[legIndex];
  const to = profile.waypoints[legIndex + 1];
  if (!from || !to || leg.elevation.length === 0) return null;

  const distanceNm =
    projection.horizScale > 0 ? (clampedX - left) / projection.horizScale : 0;

  const lastIndex = leg.distances.length - 1;
  const lowIndex = Math.min(lowerBound(leg.distances, distanceNm), lastIndex);
  const upperIndex = Math.min(upperBound(leg.distances, distanceNm), lastIndex);
  const alt1 = leg.elevation[lowIndex]!.altitudeFt;
  const alt2 = leg.elevation[upperIndex]!.altitudeFt;
  const groundAltitudeFt = Math.abs(alt1 + alt2) / 2;

  const legStart = leg.distances[0]!;
  const legLength = leg.distances[lastIndex]! - legStart;
  const fraction =
    legLength > 0 ? Math.min(1, Math.max(0, (distanceNm - legStart) / legLength)) : 0;
  const position = interpolatePosition(leg.elevation[0]!, leg.elevation[lastIndex]!, fraction);

  return {
    x: clampedX,
    legIndex,
    from: tag(from),
    to: tag(to),
    distanceNm,
    groundAltitudeFt,
    aboveGroundFt: projection.cruiseAltitudeFt - groundAltitudeFt,
    legSafeAltitudeFt: safeAltitudeFt(leg.maxElevationFt, config),
    position,
  };
}

/**
 * One-line summary of a query for a status label, e.g.
 * `EDDF -> SPESA, 12.3 nm, Ground Altitude 410 ft, ...`
 */
export function describeProfileQuery(result: ProfileQueryResult): string {
  const distance = result.distanceNm.toFixed(result.distanceNm < 100 ? 1 : 0);
  return (
    `${result.from.ident} -> ${result.to.ident}, ${distance} nm, ` +
    `Ground Altitude ${result.groundAltitudeFt.toFixed(0)} ft, ` +
    `Above Ground Altitude ${result.aboveGroundFt.toFixed(0)} ft, ` +
    `Leg Safe Altitude ${result.legSafeAltitudeFt.toFixed(0)} ft`
  );
}
