/**
 * Screen projector: ElevationLegList + viewport → pixel geometry.
 *
 * The terrain silhouette is thinned a second time in pixel space: a point is
 * kept only if it is the first one, ends its leg, or moved more than the
 * pixel tolerance (Manhattan distance) from the last kept point.
 */

import type {
  AircraftMarker,
  ElevationLegList,
  ProjectionState,
  ScreenPoint,
  Viewport,
} from "@aeroprofile/types";
import { safeAltitudeFt, type ProfileConfig } from "../config.js";
import { ProfileContractError } from "../errors.js";

/** Live aircraft along the route, already filtered for visibility */
export interface AircraftAlongRoute {
  altitudeFt: number;
  distanceFromStartNm: number;
}

export interface ProjectionInput {
  profile: ElevationLegList;
  viewport: Viewport;
  cruiseAltitudeFt: number;
  aircraft?: AircraftAlongRoute | null;
}

export function assertViewport(viewport: Viewport): void {
  const { width, height } = viewport;
  if (!Number.isFinite(width) || !Number.isFinite(height) || width < 0 || height < 0) {
    throw new ProfileContractError(`Invalid viewport ${width}x${height}`);
  }
}

/**
 * Lay out a profile in a viewport.
 *
 * @returns null when there is nothing to draw (no legs, no waypoints, or a
 *   viewport smaller than its margins, or an altitude axis of zero height);
 *   render a placeholder instead.
 */
export function projectProfile(
  input: ProjectionInput,
  config: ProfileConfig,
): ProjectionState | null {
  const { profile, viewport, cruiseAltitudeFt } = input;
  assertViewport(viewport);
  if (profile.legs.length === 0 || profile.waypoints.length === 0) return null;

  const { leftMargin, topMargin } = config;
  const w = viewport.width - leftMargin * 2;
  const h = viewport.height - topMargin;
  if (w <= 0 || h <= 0) return null;

  const maxRouteElevationRoundedFt = safeAltitudeFt(profile.maxRouteElevationFt, config);
  let axisMaxFt = Math.max(maxRouteElevationRoundedFt, cruiseAltitudeFt);
  const aircraft = input.aircraft ?? null;
  if (aircraft && Number.isFinite(aircraft.altitudeFt)) {
    axisMaxFt = Math.max(axisMaxFt, aircraft.altitudeFt);
  }
  if (axisMaxFt <= 0) return null;

  const vertScale = h / axisMaxFt;
  const horizScale = profile.totalDistanceNm > 0 ? w / profile.totalDistanceNm : 0;
  const toX = (distanceNm: number): number => leftMargin + Math.trunc(distanceNm * horizScale);
  const toY = (altitudeFt: number): number => topMargin + Math.trunc(h - altitudeFt * vertScale);

  const baseline = h + topMargin;
  const polygon: ScreenPoint[] = [{ x: leftMargin, y: baseline }];
  const waypointX: number[] = [];
  let lastPt: ScreenPoint | null = null;

  for (const leg of profile.legs) {
    waypointX.push(toX(leg.distances[0] ?? 0));

    const lastIndex = leg.elevation.length - 1;
    for (let i = 0; i <= lastIndex; i++) {
      const pt: ScreenPoint = {
        x: toX(leg.distances[i]!),
        y: toY(leg.elevation[i]!.altitudeFt),
      };
      if (
        lastPt === null ||
        i === lastIndex ||
        Math.abs(pt.x - lastPt.x) + Math.abs(pt.y - lastPt.y) > config.pixelTolerance
      ) {
        polygon.push(pt);
        lastPt = pt;
      }
    }
  }
  waypointX.push(leftMargin + w);
  polygon.push({ x: leftMargin + w, y: baseline });

  const first = profile.waypoints[0]!;
  const last = profile.waypoints[profile.waypoints.length - 1]!;

  const state: ProjectionState = {
    viewport: { ...viewport },
    leftMargin,
    topMargin,
    plotWidth: w,
    plotHeight: h,
    vertScale,
    horizScale,
    polygon,
    waypointX,
    maxRouteElevationRoundedFt,
    cruiseAltitudeFt,
    axisMaxFt,
    flightplanY: toY(cruiseAltitudeFt),
    maxElevationY: toY(maxRouteElevationRoundedFt),
    startAltitudeY: toY(first.position.altitudeFt),
    destinationAltitudeY: toY(last.position.altitudeFt),
    aircraft: null,
  };
  return withAircraft(state, aircraft);
}

/**
 * Place (or remove) the aircraft marker without re-projecting the terrain.
 * Only valid while the aircraft stays below `axisMaxFt`.
 */
export function withAircraft(
  state: ProjectionState,
  aircraft: AircraftAlongRoute | null,
): ProjectionState {
  let marker: AircraftMarker | null = null;
  if (aircraft && Number.isFinite(aircraft.altitudeFt) && Number.isFinite(aircraft.distanceFromStartNm)) {
    marker = {
      x: state.leftMargin + Math.trunc(aircraft.distanceFromStartNm * state.horizScale),
      y: state.topMargin + Math.trunc(state.plotHeight - aircraft.altitudeFt * state.vertScale),
      altitudeFt: aircraft.altitudeFt,
      distanceFromStartNm: aircraft.distanceFromStartNm,
    };
  }
  return { ...state, aircraft: marker };
}
