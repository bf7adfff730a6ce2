/**
 * GeoJSON export for elevation profiles.
 *
 * Each leg becomes a 3D LineString (`[lng, lat, altitudeFt]`) of its retained
 * terrain samples; each waypoint becomes a Point. Useful for checking a
 * profile in QGIS or geojson.io.
 */

import type { ElevationLegList } from "@aeroprofile/types";

export interface ProfileLegFeature {
  type: "Feature";
  geometry: { type: "LineString"; coordinates: [number, number, number][] };
  properties: {
    kind: "leg";
    legIndex: number;
    from: string;
    to: string;
    startDistanceNm: number;
    endDistanceNm: number;
    maxElevationFt: number;
    points: number;
  };
}

export interface ProfileWaypointFeature {
  type: "Feature";
  geometry: { type: "Point"; coordinates: [number, number, number] };
  properties: {
    kind: "waypoint";
    index: number;
    ident: string;
    waypointKind: string;
  };
}

export interface ProfileGeoJsonCollection {
  type: "FeatureCollection";
  features: (ProfileLegFeature | ProfileWaypointFeature)[];
  properties: {
    totalDistanceNm: number;
    totalNumPoints: number;
    maxRouteElevationFt: number;
  };
}

/** Export a profile as a GeoJSON FeatureCollection, legs first. */
export function profileToGeoJson(profile: ElevationLegList): ProfileGeoJsonCollection {
  const features: (ProfileLegFeature | ProfileWaypointFeature)[] = [];

  profile.legs.forEach((leg, legIndex) => {
    features.push({
      type: "Feature",
      geometry: {
        type: "LineString",
        coordinates: leg.elevation.map((p) => [p.lng, p.lat, p.altitudeFt]),
      },
      properties: {
        kind: "leg",
        legIndex,
        from: profile.waypoints[legIndex]?.ident ?? "",
        to: profile.waypoints[legIndex + 1]?.ident ?? "",
        startDistanceNm: leg.distances[0] ?? 0,
        endDistanceNm: leg.distances[leg.distances.length - 1] ?? 0,
        maxElevationFt: leg.maxElevationFt,
        points: leg.elevation.length,
      },
    });
  });

  profile.waypoints.forEach((wp, index) => {
    features.push({
      type: "Feature",
      geometry: {
        type: "Point",
        coordinates: [wp.position.lng, wp.position.lat, wp.position.altitudeFt],
      },
      properties: { kind: "waypoint", index, ident: wp.ident, waypointKind: wp.kind },
    });
  });

  return {
    type: "FeatureCollection",
    features,
    properties: {
      totalDistanceNm: profile.totalDistanceNm,
      totalNumPoints: profile.totalNumPoints,
      maxRouteElevationFt: profile.maxRouteElevationFt,
    },
  };
}
