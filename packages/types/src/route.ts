/**
 * Flight route inputs - what the route model hands to the profile engine.
 *
 * A route is an ordered list of waypoints. The engine never mutates it; every
 * profile computation works on a deep copy taken when it starts.
 */

import type { Position } from "./geo.js";

/** What kind of navigation object a waypoint refers to */
export type WaypointKind =
  | "airport"
  | "vor"
  | "ndb"
  | "waypoint"
  | "user"
  | "invalid";

/** One entry of a flight route */
export interface RouteWaypoint {
  /** Display identifier, e.g. "EDDF" or "WP1" */
  ident: string;
  kind: WaypointKind;
  /** Position with the waypoint's altitude (airport elevation, user altitude) */
  position: Position;
}

/** Source of the live route, implemented by the route/flightplan model */
export interface RouteSource {
  /** Ordered waypoints of the current flight plan */
  getWaypoints(): readonly RouteWaypoint[];
  /** Planned cruise altitude in feet */
  getCruiseAltitudeFt(): number;
  /** True when no flight plan is loaded */
  isEmpty(): boolean;
}

/** Live aircraft data from a connected simulator */
export interface AircraftState {
  /** Aircraft position; altitude is the indicated altitude in feet */
  position: Position;
  /** Whether the map currently shows the user aircraft */
  visible: boolean;
}
