/**
 * SRTM HGT file reader for terrain lookups.
 *
 * Reads SRTM tiles in the standard .hgt binary format: signed 16-bit
 * big-endian integers, row 0 on the north edge. Both resolutions are
 * accepted and told apart by file size:
 * - SRTM1: 1 arcsecond, 3601 × 3601 samples
 * - SRTM3: 3 arcseconds, 1201 × 1201 samples
 *
 * Missing tiles and void samples (-32768) read as null.
 */

import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";

/** Configuration for the DEM reader */
export interface DemConfig {
  /** Directory containing .hgt files */
  tilesDir: string;
  /** Maximum number of tiles to cache (default: 4) */
  maxCachedTiles?: number;
}

/** Void value in SRTM data */
const SRTM_VOID = -32768;

/** Samples per row/column for the supported tile resolutions */
const SRTM1_SIZE = 3601;
const SRTM3_SIZE = 1201;

interface Tile {
  data: DataView;
  size: number;
}

interface CachedTile extends Tile {
  lastUsed: number;
}

/**
 * DEM reader with LRU tile cache.
 *
 * ```ts
 * const dem = new DemReader({ tilesDir: "./srtm" });
 * const meters = dem.getElevation(47.2602, 11.3439);
 * ```
 */
export class DemReader {
  private readonly tilesDir: string;
  private readonly maxCachedTiles: number;
  private readonly cache: Map<string, CachedTile | null> = new Map();
  private accessCounter = 0;

  constructor(config: DemConfig) {
    this.tilesDir = config.tilesDir;
    this.maxCachedTiles = config.maxCachedTiles ?? 4;
  }

  /**
   * Elevation in meters for a single coordinate, or null if the tile is
   * missing or the point is void.
   */
  getElevation(lat: number, lng: number): number | null {
    const tile = this.loadTile(lat, lng);
    if (!tile) return null;
    return this.interpolate(tile, lat, lng);
  }

  /**
   * Forget cached tiles and known-missing tiles, e.g. after new tiles were
   * copied into the directory.
   */
  clearCache(): void {
    this.cache.clear();
  }

  /** Number of tiles currently held in memory */
  get cachedTileCount(): number {
    let count = 0;
    for (const tile of this.cache.values()) {
      if (tile) count++;
    }
    return count;
  }

  /**
   * The .hgt filename for a coordinate.
   * E.g., (47.26, 11.34) → "N47E011.hgt"
   */
  static tileFilename(lat: number, lng: number): string {
    const latFloor = Math.floor(lat);
    const lngFloor = Math.floor(lng);
    const latPrefix = latFloor >= 0 ? "N" : "S";
    const lngPrefix = lngFloor >= 0 ? "E" : "W";
    const latStr = String(Math.abs(latFloor)).padStart(2, "0");
    const lngStr = String(Math.abs(lngFloor)).padStart(3, "0");
    return `${latPrefix}${latStr}${lngPrefix}${lngStr}.hgt`;
  }

  /** Samples per side for a tile of the given byte length, or null */
  static tileSize(byteLength: number): number | null {
    if (byteLength === SRTM1_SIZE * SRTM1_SIZE * 2) return SRTM1_SIZE;
    if (byteLength === SRTM3_SIZE * SRTM3_SIZE * 2) return SRTM3_SIZE;
    return null;
  }

  private loadTile(lat: number, lng: number): Tile | null {
    const key = DemReader.tileFilename(lat, lng);

    const cached = this.cache.get(key);
    if (cached !== undefined) {
      if (cached) cached.lastUsed = ++this.accessCounter;
      return cached;
    }

    const tile = this.readTile(key);
    if (tile && this.cachedTileCount >= this.maxCachedTiles) {
      this.evictLru();
    }
    // Missing tiles are remembered too, so a route over the sea does not hit
    // the filesystem for every sample.
    this.cache.set(key, tile ? { ...tile, lastUsed: ++this.accessCounter } : null);
    return tile;
  }

  private readTile(key: string): Tile | null {
    const filePath = join(this.tilesDir, key);
    if (!existsSync(filePath)) return null;

    const buffer = readFileSync(filePath);
    const size = DemReader.tileSize(buffer.byteLength);
    if (size === null) {
      console.warn(`[dem] Ignoring ${key}: unexpected size ${buffer.byteLength} bytes`);
      return null;
    }

    return {
      data: new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength),
      size,
    };
  }

  private evictLru(): void {
    let oldestKey: string | undefined;
    let oldestTime = Infinity;
    for (const [key, tile] of this.cache) {
      if (tile && tile.lastUsed < oldestTime) {
        oldestTime = tile.lastUsed;
        oldestKey = key;
      }
    }
    if (oldestKey) {
      this.cache.delete(oldestKey);
    }
  }

  /**
   * Bilinear interpolation between the 4 nearest grid points.
   * Returns null if any corner is void.
   */
  private interpolate(tile: Tile, lat: number, lng: number): number | null {
    const last = tile.size - 1;
    const fracLat = lat - Math.floor(lat);
    const fracLng = lng - Math.floor(lng);

    const row = (1 - fracLat) * last;
    const col = fracLng * last;

    const r0 = Math.floor(row);
    const c0 = Math.floor(col);
    const r1 = Math.min(r0 + 1, last);
    const c1 = Math.min(c0 + 1, last);

    const dr = row - r0;
    const dc = col - c0;

    const e00 = this.getSample(tile, r0, c0);
    const e01 = this.getSample(tile, r0, c1);
    const e10 = this.getSample(tile, r1, c0);
    const e11 = this.getSample(tile, r1, c1);

    if (e00 === null || e01 === null || e10 === null || e11 === null) {
      return null;
    }

    return (
      e00 * (1 - dr) * (1 - dc) +
      e01 * (1 - dr) * dc +
      e10 * dr * (1 - dc) +
      e11 * dr * dc
    );
  }

  private getSample(tile: Tile, row: number, col: number): number | null {
    const offset = (row * tile.size + col) * 2;
    const value = tile.data.getInt16(offset, false);
    return value === SRTM_VOID ? null : value;
  }
}
