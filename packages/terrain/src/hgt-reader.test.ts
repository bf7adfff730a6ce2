import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DemReader } from "./hgt-reader.js";

const SRTM3_SIZE = 1201;
const SRTM_VOID = -32768;

/** Write a synthetic SRTM3 tile whose samples come from `valueAt`. */
function writeSrtm3Tile(
  dir: string,
  name: string,
  valueAt: (row: number, col: number) => number,
): void {
  const buf = Buffer.alloc(SRTM3_SIZE * SRTM3_SIZE * 2);
  for (let row = 0; row < SRTM3_SIZE; row++) {
    for (let col = 0; col < SRTM3_SIZE; col++) {
      buf.writeInt16BE(valueAt(row, col), (row * SRTM3_SIZE + col) * 2);
    }
  }
  writeFileSync(join(dir, name), buf);
}

let tilesDir: string;

beforeAll(() => {
  tilesDir = mkdtempSync(join(tmpdir(), "hgt-reader-"));
  // Elevation equals the column index; one void sample in the middle
  writeSrtm3Tile(tilesDir, "N47E011.hgt", (row, col) =>
    row === 600 && col === 600 ? SRTM_VOID : col,
  );
  writeSrtm3Tile(tilesDir, "N46E011.hgt", () => 250);
  writeFileSync(join(tilesDir, "N48E011.hgt"), Buffer.alloc(10));
});

afterAll(() => {
  rmSync(tilesDir, { recursive: true, force: true });
});

// ─── tileFilename (unit, no I/O) ────────────────────────────────────────────

describe("tileFilename", () => {
  it("N47 E011 → N47E011.hgt", () => {
    expect(DemReader.tileFilename(47, 11)).toBe("N47E011.hgt");
  });

  it("fractional coords: (47.26, 11.34) → N47E011.hgt", () => {
    expect(DemReader.tileFilename(47.26, 11.34)).toBe("N47E011.hgt");
  });

  it("negative fractional lat: (-0.5, 10.2) → S01E010.hgt", () => {
    expect(DemReader.tileFilename(-0.5, 10.2)).toBe("S01E010.hgt");
  });

  it("pads longitude to 3 digits for the western hemisphere", () => {
    expect(DemReader.tileFilename(47.6, -122.3)).toBe("N47W123.hgt");
  });
});

describe("tileSize", () => {
  it("recognizes SRTM1 and SRTM3 byte lengths", () => {
    expect(DemReader.tileSize(3601 * 3601 * 2)).toBe(3601);
    expect(DemReader.tileSize(1201 * 1201 * 2)).toBe(1201);
  });

  it("rejects anything else", () => {
    expect(DemReader.tileSize(10)).toBeNull();
  });
});

// ─── getElevation ───────────────────────────────────────────────────────────

describe("getElevation", () => {
  it("reads an exact grid sample", () => {
    const dem = new DemReader({ tilesDir });
    expect(dem.getElevation(47.5, 11.25)).toBe(300);
  });

  it("interpolates between columns", () => {
    const dem = new DemReader({ tilesDir });
    expect(dem.getElevation(47.5, 11.2505)).toBeCloseTo(300.6, 6);
  });

  it("returns null when a corner sample is void", () => {
    const dem = new DemReader({ tilesDir });
    expect(dem.getElevation(47.5, 11.5)).toBeNull();
  });

  it("returns null when the tile is missing", () => {
    const dem = new DemReader({ tilesDir });
    expect(dem.getElevation(50, 11.5)).toBeNull();
  });

  it("ignores files of the wrong size", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const dem = new DemReader({ tilesDir });
    expect(dem.getElevation(48.5, 11.5)).toBeNull();
    expect(warn).toHaveBeenCalledWith(
      "[dem] Ignoring N48E011.hgt: unexpected size 10 bytes",
    );
    warn.mockRestore();
  });
});

describe("tile lookup", () => {
  it("reads each coordinate from its own tile", () => {
    const dem = new DemReader({ tilesDir });
    expect(dem.getElevation(47.5, 11.25)).toBe(300);
    expect(dem.getElevation(46.5, 11.5)).toBe(250);
    expect(dem.getElevation(50, 11.5)).toBeNull();
  });
});

describe("tile cache", () => {
  it("keeps at most maxCachedTiles tiles in memory", () => {
    const dem = new DemReader({ tilesDir, maxCachedTiles: 1 });
    dem.getElevation(47.5, 11.25);
    dem.getElevation(46.5, 11.25);
    expect(dem.cachedTileCount).toBe(1);
    // The evicted tile is loaded again on demand
    expect(dem.getElevation(47.5, 11.25)).toBe(300);
  });

  it("clearCache drops every tile", () => {
    const dem = new DemReader({ tilesDir });
    dem.getElevation(47.5, 11.25);
    dem.clearCache();
    expect(dem.cachedTileCount).toBe(0);
  });
});
