/**
 * Where along the route a live aircraft is.
 */

import type { Coordinate, RouteWaypoint } from "@aeroprofile/types";
import { distanceNm } from "@aeroprofile/terrain";

const METERS_PER_DEGREE = 111_194.93;

/**
 * Distance in meters from `p` to the segment a-b on a local flat projection
 * centered on `p`. Good enough to rank legs against each other.
 */
function distanceToSegment(p: Coordinate, a: Coordinate, b: Coordinate): number {
  const cosLat = Math.cos((p.lat * Math.PI) / 180);
  const ax = (a.lng - p.lng) * cosLat * METERS_PER_DEGREE;
  const ay = (a.lat - p.lat) * METERS_PER_DEGREE;
  const bx = (b.lng - p.lng) * cosLat * METERS_PER_DEGREE;
  const by = (b.lat - p.lat) * METERS_PER_DEGREE;

  const dx = bx - ax;
  const dy = by - ay;
  const lenSq = dx * dx + dy * dy;
  const t = lenSq > 0 ? Math.min(1, Math.max(0, -(ax * dx + ay * dy) / lenSq)) : 0;
  return Math.hypot(ax + t * dx, ay + t * dy);
}

/**
 * Index of the waypoint that ends the leg closest to `position`, or -1 for
 * routes with fewer than two waypoints. Ties go to the earlier leg.
 */
export function nearestLegIndex(
  waypoints: readonly RouteWaypoint[],
  position: Coordinate,
): number {
  let best = -1;
  let bestDistance = Infinity;
  for (let i = 1; i < waypoints.length; i++) {
    const d = distanceToSegment(position, waypoints[i - 1]!.position, waypoints[i]!.position);
    if (d < bestDistance) {
      bestDistance = d;
      best = i;
    }
  }
  return best;
}

/**
 * Along-route distance of the aircraft from the departure in NM: route length
 * up to the end of the nearest leg, minus what is left to fly to that leg's
 * end waypoint. Null when the route has no legs.
 */
export function aircraftDistanceFromStart(
  waypoints: readonly RouteWaypoint[],
  position: Coordinate,
): number | null {
  const index = nearestLegIndex(waypoints, position);
  if (index === -1) return null;

  let total = 0;
  for (let i = 1; i <= index; i++) {
    total += distanceNm(waypoints[i - 1]!.position, waypoints[i]!.position);
  }
  return total - distanceNm(waypoints[index]!.position, position);
}
