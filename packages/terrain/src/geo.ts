/**
 * Great-circle and unit helpers shared by the terrain adapter and the
 * profile engine.
 */

import type { Coordinate, Position } from "@aeroprofile/types";

const EARTH_RADIUS_METERS = 6_371_000;

const METERS_PER_NM = 1852;
const FEET_PER_METER = 3.2808399;

export function metersToNm(meters: number): number {
  return meters / METERS_PER_NM;
}

export function metersToFeet(meters: number): number {
  return meters * FEET_PER_METER;
}

/**
 * Haversine distance between two coordinates in meters.
 */
export function haversineDistance(a: Coordinate, b: Coordinate): number {
  const toRad = Math.PI / 180;
  const dLat = (b.lat - a.lat) * toRad;
  const dLng = (b.lng - a.lng) * toRad;
  const sinHalfLat = Math.sin(dLat / 2);
  const sinHalfLng = Math.sin(dLng / 2);
  const h =
    sinHalfLat * sinHalfLat +
    Math.cos(a.lat * toRad) * Math.cos(b.lat * toRad) * sinHalfLng * sinHalfLng;
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.min(1, Math.sqrt(h)));
}

/** Great-circle distance between two coordinates in nautical miles. */
export function distanceNm(a: Coordinate, b: Coordinate): number {
  return metersToNm(haversineDistance(a, b));
}

/**
 * Point at `fraction` (0..1) of the way along the great circle from a to b.
 */
export function intermediatePoint(
  a: Coordinate,
  b: Coordinate,
  fraction: number,
): Coordinate {
  const toRad = Math.PI / 180;
  const toDeg = 180 / Math.PI;
  const delta = haversineDistance(a, b) / EARTH_RADIUS_METERS;
  if (delta === 0) return { lat: a.lat, lng: a.lng };

  const lat1 = a.lat * toRad;
  const lng1 = a.lng * toRad;
  const lat2 = b.lat * toRad;
  const lng2 = b.lng * toRad;

  const sinDelta = Math.sin(delta);
  const fa = Math.sin((1 - fraction) * delta) / sinDelta;
  const fb = Math.sin(fraction * delta) / sinDelta;

  const x = fa * Math.cos(lat1) * Math.cos(lng1) + fb * Math.cos(lat2) * Math.cos(lng2);
  const y = fa * Math.cos(lat1) * Math.sin(lng1) + fb * Math.cos(lat2) * Math.sin(lng2);
  const z = fa * Math.sin(lat1) + fb * Math.sin(lat2);

  return {
    lat: Math.atan2(z, Math.sqrt(x * x + y * y)) * toDeg,
    lng: Math.atan2(y, x) * toDeg,
  };
}

/**
 * Straight-line interpolation between two positions, altitude included.
 * Not a great-circle interpolation: fine for the short spans of a single leg.
 */
export function interpolatePosition(
  a: Position,
  b: Position,
  fraction: number,
): Position {
  return {
    lat: a.lat + (b.lat - a.lat) * fraction,
    lng: a.lng + (b.lng - a.lng) * fraction,
    altitudeFt: a.altitudeFt + (b.altitudeFt - a.altitudeFt) * fraction,
  };
}
