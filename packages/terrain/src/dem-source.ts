/**
 * Terrain source backed by local SRTM tiles.
 *
 * Samples the great circle between two points at a fixed spacing and looks
 * each point up in the DEM. Points without data are left out; a segment with
 * no data at all yields an empty profile.
 */

import type { Coordinate, ElevationSample } from "@aeroprofile/types";
import { DemReader, type DemConfig } from "./hgt-reader.js";
import { haversineDistance, intermediatePoint } from "./geo.js";
import type { TerrainSource } from "./sampler.js";

/** Options for the DEM terrain source */
export interface DemTerrainOptions {
  dem: DemConfig;
  /** Distance between samples in meters (default: 90, about SRTM3 spacing) */
  sampleSpacingMeters?: number;
  /** Upper bound on samples per segment (default: 2000) */
  maxSamplesPerSegment?: number;
}

export class DemTerrainSource implements TerrainSource {
  readonly reader: DemReader;
  private readonly spacing: number;
  private readonly maxSamples: number;

  constructor(options: DemTerrainOptions) {
    this.reader = new DemReader(options.dem);
    this.spacing = options.sampleSpacingMeters ?? 90;
    this.maxSamples = Math.max(2, options.maxSamplesPerSegment ?? 2000);
    if (!(this.spacing > 0)) {
      throw new Error(`sampleSpacingMeters must be positive, got ${this.spacing}`);
    }
  }

  /** Number of samples, endpoints included, for a segment of the given length */
  sampleCount(lengthMeters: number): number {
    const count = Math.ceil(lengthMeters / this.spacing) + 1;
    return Math.min(this.maxSamples, Math.max(2, count));
  }

  /** Forget cached tiles, including ones that were missing before. */
  refresh(): void {
    this.reader.clearCache();
  }

  heightProfile(from: Coordinate, to: Coordinate): ElevationSample[] {
    const count = this.sampleCount(haversineDistance(from, to));
    const samples: ElevationSample[] = [];

    for (let i = 0; i < count; i++) {
      const point =
        i === 0 ? from : i === count - 1 ? to : intermediatePoint(from, to, i / (count - 1));
      const elev = this.reader.getElevation(point.lat, point.lng);
      if (elev == null) continue;
      samples.push({ lat: point.lat, lng: point.lng, altitudeMeters: elev });
    }

    return samples;
  }
}
