/**
 * Layered JSON config for the profile engine.
 *
 * Hard-coded defaults, overlaid by `configs/profile/<name>.json` when present,
 * overlaid by explicit overrides from the host.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import { ProfileConfigError } from "./errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProfileConfig {
  /** Debounce delay between a route change and the rebuild, in ms */
  updateDelayMs: number;
  /** Samples closer than this to the last kept altitude are dropped, in feet */
  altitudeToleranceFt: number;
  /** Altitude thinning starts once this many legs have been built */
  thinningMinLegs: number;
  /** Polygon points within this Manhattan distance of the last kept one are dropped */
  pixelTolerance: number;
  /** Buffer added on top of the highest terrain before rounding, in feet */
  safetyBufferFt: number;
  /** Safe altitudes are rounded up to a multiple of this, in feet */
  altitudeRoundingFt: number;
  /** Left and right margin of the plot area, in pixels */
  leftMargin: number;
  /** Top margin of the plot area, in pixels */
  topMargin: number;
}

/** Where engine components write their log lines */
export interface ProfileLogger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const DEFAULT_PROFILE_CONFIG: Readonly<ProfileConfig> = Object.freeze({
  updateDelayMs: 1000,
  altitudeToleranceFt: 10,
  thinningMinLegs: 2,
  pixelTolerance: 2,
  safetyBufferFt: 1000,
  altitudeRoundingFt: 500,
  leftMargin: 65,
  topMargin: 14,
});

const CONFIG_KEYS: readonly (keyof ProfileConfig)[] = [
  "updateDelayMs",
  "altitudeToleranceFt",
  "thinningMinLegs",
  "pixelTolerance",
  "safetyBufferFt",
  "altitudeRoundingFt",
  "leftMargin",
  "topMargin",
];

/** Keys that may legitimately be zero */
const NON_NEGATIVE_KEYS: ReadonlySet<keyof ProfileConfig> = new Set([
  "updateDelayMs",
  "altitudeToleranceFt",
  "thinningMinLegs",
  "pixelTolerance",
  "safetyBufferFt",
  "leftMargin",
  "topMargin",
]);

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Pick the known config keys out of parsed JSON.
 * Unknown keys are ignored, known keys must be numbers.
 */
export function parseProfileConfig(raw: unknown, source: string): Partial<ProfileConfig> {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new ProfileConfigError(`${source}: expected a JSON object`);
  }

  const result: Partial<ProfileConfig> = {};
  for (const key of CONFIG_KEYS) {
    if (!(key in raw)) continue;
    const value: unknown = Reflect.get(raw, key);
    if (typeof value !== "number") {
      throw new ProfileConfigError(`${source}: "${key}" must be a number`);
    }
    result[key] = value;
  }
  return result;
}

/** Throw if any value is out of range. */
export function validateProfileConfig(config: ProfileConfig): ProfileConfig {
  for (const key of CONFIG_KEYS) {
    const value = config[key];
    const ok = NON_NEGATIVE_KEYS.has(key)
      ? Number.isFinite(value) && value >= 0
      : Number.isFinite(value) && value > 0;
    if (!ok) {
      throw new ProfileConfigError(`Invalid profile config: ${key}=${value}`);
    }
  }
  return config;
}

/** Merge overrides on top of the defaults and validate the result. */
export function resolveProfileConfig(
  ...layers: Partial<ProfileConfig>[]
): ProfileConfig {
  const merged: ProfileConfig = { ...DEFAULT_PROFILE_CONFIG };
  for (const layer of layers) {
    for (const key of CONFIG_KEYS) {
      const value = layer[key];
      if (value !== undefined) merged[key] = value;
    }
  }
  return validateProfileConfig(merged);
}

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Walk up directories to find `configs/profile/`.
 * Works from both source (packages/engine/src/) and compiled (dist/) paths.
 */
export function findConfigsRoot(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "profile");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  // Fallback: repo root relative to packages/engine/src
  const repoRoot = resolve(__dirname, "..", "..", "..");
  return join(repoRoot, "configs", "profile");
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/**
 * Load a named config file and apply overrides on top.
 * A missing file falls back to the defaults; a malformed one throws.
 */
export function loadProfileConfig(
  name = "default",
  overrides: Partial<ProfileConfig> = {},
): ProfileConfig {
  const filePath = join(findConfigsRoot(), `${name}.json`);
  if (!existsSync(filePath)) {
    return resolveProfileConfig(overrides);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ProfileConfigError(
      `${filePath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return resolveProfileConfig(parseProfileConfig(raw, filePath), overrides);
}

/** Ceil `(altitude + buffer)` to the next rounding step */
export function safeAltitudeFt(elevationFt: number, config: ProfileConfig): number {
  return (
    Math.ceil((elevationFt + config.safetyBufferFt) / config.altitudeRoundingFt) *
    config.altitudeRoundingFt
  );
}
