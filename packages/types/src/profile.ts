/**
 * Elevation profile results.
 *
 * An ElevationLegList is the product of one background computation; a
 * ProjectionState is that list laid out in a viewport; a ProfileQueryResult
 * answers a pixel probe against both.
 */

import type { Position } from "./geo.js";
import type { RouteWaypoint, WaypointKind } from "./route.js";

/** Terrain profile between two consecutive route waypoints */
export interface ElevationLeg {
  /** Retained terrain samples, altitude in feet */
  elevation: Position[];
  /** Cumulative route distance in nautical miles, parallel to `elevation` */
  distances: number[];
  /** Highest retained sample of this leg in feet (never below 0) */
  maxElevationFt: number;
}

/** Full route profile */
export interface ElevationLegList {
  legs: ElevationLeg[];
  /** Snapshot of the route the profile was built from */
  waypoints: RouteWaypoint[];
  totalDistanceNm: number;
  totalNumPoints: number;
  maxRouteElevationFt: number;
}

/** A pixel-space point */
export interface ScreenPoint {
  x: number;
  y: number;
}

/** Viewport size in pixels */
export interface Viewport {
  width: number;
  height: number;
}

/** User aircraft projected into the profile */
export interface AircraftMarker extends ScreenPoint {
  altitudeFt: number;
  distanceFromStartNm: number;
}

/** Pixel geometry of a profile in a given viewport */
export interface ProjectionState {
  viewport: Viewport;
  /** Left/right margin in pixels */
  leftMargin: number;
  /** Top margin in pixels */
  topMargin: number;
  /** Drawable width (viewport width minus both side margins) */
  plotWidth: number;
  /** Drawable height (viewport height minus the top margin) */
  plotHeight: number;
  /** Pixels per foot */
  vertScale: number;
  /** Pixels per nautical mile */
  horizScale: number;
  /** Closed terrain silhouette, starting and ending on the baseline */
  polygon: ScreenPoint[];
  /** One x per route waypoint */
  waypointX: number[];
  /** Max route elevation plus safety buffer, rounded up */
  maxRouteElevationRoundedFt: number;
  cruiseAltitudeFt: number;
  /** Top of the altitude axis */
  axisMaxFt: number;
  /** Pixel row of the cruise altitude line */
  flightplanY: number;
  /** Pixel row of the rounded max elevation line */
  maxElevationY: number;
  /** Pixel rows of the departure and destination altitude labels */
  startAltitudeY: number;
  destinationAltitudeY: number;
  aircraft: AircraftMarker | null;
}

/** Tagged reference to a waypoint for display */
export interface WaypointTag {
  ident: string;
  kind: WaypointKind;
}

/** Answer to a pixel probe along the profile */
export interface ProfileQueryResult {
  /** The clamped x actually used */
  x: number;
  legIndex: number;
  from: WaypointTag;
  to: WaypointTag;
  /** Distance from the route start in nautical miles */
  distanceNm: number;
  groundAltitudeFt: number;
  /** Cruise altitude minus ground altitude */
  aboveGroundFt: number;
  /** Leg maximum elevation plus safety buffer, rounded up */
  legSafeAltitudeFt: number;
  position: Position;
}
