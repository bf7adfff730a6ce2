/**
 * In-memory route source and the JSON route file format used by the CLI.
 *
 * ```json
 * {
 *   "cruiseAltitudeFt": 9000,
 *   "waypoints": [
 *     { "ident": "LOWI", "kind": "airport", "lat": 47.26, "lng": 11.34, "altitudeFt": 1906 }
 *   ]
 * }
 * ```
 */

import type { RouteSource, RouteWaypoint, WaypointKind } from "@aeroprofile/types";
import { ProfileContractError } from "../errors.js";

const WAYPOINT_KINDS: readonly WaypointKind[] = [
  "airport",
  "vor",
  "ndb",
  "waypoint",
  "user",
  "invalid",
];

function isWaypointKind(value: unknown): value is WaypointKind {
  return typeof value === "string" && WAYPOINT_KINDS.some((k) => k === value);
}

/** A mutable route held in memory, e.g. loaded from a file or edited in tests. */
export class StaticRouteSource implements RouteSource {
  private waypoints: RouteWaypoint[];
  private cruiseAltitudeFt: number;

  constructor(waypoints: RouteWaypoint[] = [], cruiseAltitudeFt = 0) {
    this.waypoints = waypoints;
    this.cruiseAltitudeFt = cruiseAltitudeFt;
  }

  getWaypoints(): readonly RouteWaypoint[] {
    return this.waypoints;
  }

  getCruiseAltitudeFt(): number {
    return this.cruiseAltitudeFt;
  }

  isEmpty(): boolean {
    return this.waypoints.length === 0;
  }

  setWaypoints(waypoints: RouteWaypoint[]): void {
    this.waypoints = waypoints;
  }

  setCruiseAltitudeFt(altitudeFt: number): void {
    this.cruiseAltitudeFt = altitudeFt;
  }
}

function numberField(obj: object, key: string, where: string): number {
  const value: unknown = Reflect.get(obj, key);
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ProfileContractError(`${where}: "${key}" must be a finite number`);
  }
  return value;
}

/** Parse a route file's JSON into a route source. */
export function parseRouteJson(raw: unknown): StaticRouteSource {
  if (raw === null || typeof raw !== "object") {
    throw new ProfileContractError("Route file: expected a JSON object");
  }
  const cruise = numberField(raw, "cruiseAltitudeFt", "Route file");
  const list: unknown = Reflect.get(raw, "waypoints");
  if (!Array.isArray(list)) {
    throw new ProfileContractError('Route file: "waypoints" must be an array');
  }

  const waypoints = list.map((entry: unknown, i): RouteWaypoint => {
    const where = `Waypoint ${i}`;
    if (entry === null || typeof entry !== "object") {
      throw new ProfileContractError(`${where}: expected an object`);
    }
    const ident: unknown = Reflect.get(entry, "ident");
    const kind: unknown = Reflect.get(entry, "kind") ?? "waypoint";
    if (typeof ident !== "string") {
      throw new ProfileContractError(`${where}: "ident" must be a string`);
    }
    if (!isWaypointKind(kind)) {
      throw new ProfileContractError(`${where}: unknown kind ${String(kind)}`);
    }
    return {
      ident,
      kind,
      position: {
        lat: numberField(entry, "lat", where),
        lng: numberField(entry, "lng", where),
        altitudeFt: "altitudeFt" in entry ? numberField(entry, "altitudeFt", where) : 0,
      },
    };
  });

  return new StaticRouteSource(waypoints, cruise);
}
