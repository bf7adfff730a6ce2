/**
 * Geographic utility types.
 */

/** A WGS84 coordinate in degrees */
export interface Coordinate {
  lat: number;
  lng: number;
}

/** A coordinate with an altitude in feet */
export interface Position extends Coordinate {
  altitudeFt: number;
}

/** A raw terrain sample as delivered by an elevation source */
export interface ElevationSample extends Coordinate {
  altitudeMeters: number;
}

/**
 * Sentinel for "no position", e.g. a cleared profile highlight or a
 * disconnected simulator.
 */
export const INVALID_POSITION: Readonly<Position> = Object.freeze({
  lat: Number.NaN,
  lng: Number.NaN,
  altitudeFt: Number.NaN,
});

/** True when the position has finite coordinates (altitude may be unknown) */
export function isValidPosition(pos: Coordinate): boolean {
  return Number.isFinite(pos.lat) && Number.isFinite(pos.lng);
}
