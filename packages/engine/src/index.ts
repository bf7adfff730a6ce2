/**
 * @aeroprofile/engine
 *
 * Route elevation profile engine.
 *
 * Pipeline:
 * 1. Route change → debounced, single-flight scheduler
 * 2. Background build: terrain per leg, altitude thinning → ElevationLegList
 * 3. Projection into a viewport, pixel thinning → ProjectionState
 * 4. Pointer probes against the projection → ProfileQueryResult
 */

// Configuration
export {
  DEFAULT_PROFILE_CONFIG,
  loadProfileConfig,
  resolveProfileConfig,
  parseProfileConfig,
  validateProfileConfig,
  findConfigsRoot,
  safeAltitudeFt,
  type ProfileConfig,
  type ProfileLogger,
} from "./config.js";

export { ProfileContractError, ProfileConfigError } from "./errors.js";

// Building
export {
  buildElevationLeg,
  buildLegFromSamples,
  type LegBuildState,
  type LegBuildResult,
} from "./profile/leg-builder.js";
export {
  buildElevationLegList,
  emptyLegList,
  snapshotWaypoints,
  assertRouteContract,
} from "./profile/assembler.js";

// Scheduling
export {
  ProfileScheduler,
  type SchedulerOptions,
  type SchedulerState,
  type TriggerReason,
  type ProfileTask,
} from "./schedule/scheduler.js";

// Projection and queries
export {
  projectProfile,
  withAircraft,
  assertViewport,
  type ProjectionInput,
  type AircraftAlongRoute,
} from "./projection/projector.js";
export {
  queryProfile,
  describeProfileQuery,
  lowerBound,
  upperBound,
} from "./projection/query.js";

// Aircraft
export { nearestLegIndex, aircraftDistanceFromStart } from "./aircraft/progress.js";

// Controller
export { ProfileController, type ProfileControllerOptions } from "./controller/profile-controller.js";

// Routes
export { StaticRouteSource, parseRouteJson } from "./route/static-route.js";

// Export
export {
  profileToGeoJson,
  type ProfileGeoJsonCollection,
  type ProfileLegFeature,
  type ProfileWaypointFeature,
} from "./export/profile-geojson.js";
