/**
 * Profile controller - the consumer side of the engine.
 *
 * Owns the visible ElevationLegList and its ProjectionState, wires route,
 * terrain, viewport and simulator notifications into the scheduler, and
 * answers pointer probes. Rendering reads `getProjection()` after every
 * `onUpdate`; a null projection means "draw the no-route placeholder".
 */

import {
  INVALID_POSITION,
  isValidPosition,
  type AircraftState,
  type ElevationLegList,
  type Position,
  type ProfileQueryResult,
  type ProjectionState,
  type RouteSource,
  type Viewport,
} from "@aeroprofile/types";
import type { TerrainSource } from "@aeroprofile/terrain";
import { DEFAULT_PROFILE_CONFIG, type ProfileConfig, type ProfileLogger } from "../config.js";
import { buildElevationLegList, emptyLegList } from "../profile/assembler.js";
import { ProfileScheduler } from "../schedule/scheduler.js";
import {
  assertViewport,
  projectProfile,
  withAircraft,
  type AircraftAlongRoute,
} from "../projection/projector.js";
import { queryProfile } from "../projection/query.js";
import { aircraftDistanceFromStart } from "../aircraft/progress.js";

export interface ProfileControllerOptions {
  route: RouteSource;
  terrain: TerrainSource;
  config?: ProfileConfig;
  logger?: ProfileLogger;
  /** Initial viewport (default: 0x0 until the first resize) */
  viewport?: Viewport;
  /** Called whenever the projection or aircraft marker changed */
  onUpdate?: (projection: ProjectionState | null) => void;
  /** Called with the probed position, or INVALID_POSITION when the pointer leaves */
  onHighlight?: (position: Position) => void;
  /** Called when a profile build failed */
  onError?: (err: unknown) => void;
}

export class ProfileController {
  readonly scheduler: ProfileScheduler<ElevationLegList>;

  private readonly route: RouteSource;
  private readonly terrain: TerrainSource;
  private readonly config: ProfileConfig;
  private readonly logger: ProfileLogger;
  private readonly onUpdate: (projection: ProjectionState | null) => void;
  private readonly onHighlight: (position: Position) => void;

  private profile: ElevationLegList = emptyLegList();
  private projection: ProjectionState | null = null;
  private viewport: Viewport;
  private aircraft: AircraftAlongRoute | null = null;

  constructor(options: ProfileControllerOptions) {
    this.route = options.route;
    this.terrain = options.terrain;
    this.config = options.config ?? DEFAULT_PROFILE_CONFIG;
    this.logger = options.logger ?? console;
    this.viewport = options.viewport ?? { width: 0, height: 0 };
    this.onUpdate = options.onUpdate ?? (() => {});
    this.onHighlight = options.onHighlight ?? (() => {});

    this.scheduler = new ProfileScheduler<ElevationLegList>({
      task: (signal) =>
        buildElevationLegList(
          this.route.getWaypoints(),
          this.terrain,
          signal,
          this.config,
          this.logger,
        ),
      onCompleted: (profile) => {
        this.profile = profile;
        this.updateScreenCoords();
      },
      onError: options.onError,
      delayMs: this.config.updateDelayMs,
      logger: this.logger,
    });
  }

  /** The profile currently shown */
  getProfile(): ElevationLegList {
    return this.profile;
  }

  /** Pixel geometry of the current profile, or null for the placeholder */
  getProjection(): ProjectionState | null {
    return this.projection;
  }

  /**
   * Route model changed. Geometry changes rebuild the profile after the
   * debounce delay; metadata changes (e.g. cruise altitude) only re-project.
   */
  routeChanged(geometryChanged: boolean): void {
    if (!this.scheduler.isVisible) return;

    if (geometryChanged) {
      this.scheduler.trigger("route");
    } else {
      this.updateScreenCoords();
    }
  }

  /**
   * New terrain data arrived (tiles loaded, DEM directory refreshed). The
   * terrain source drops its cached lookups before the rebuild is scheduled.
   */
  terrainUpdated(): void {
    this.terrain.refresh?.();
    this.scheduler.trigger("terrain");
  }

  setVisible(visible: boolean): void {
    this.scheduler.setVisible(visible);
  }

  resize(width: number, height: number): void {
    const viewport = { width, height };
    assertViewport(viewport);
    this.viewport = viewport;
    this.updateScreenCoords();
  }

  /**
   * Live aircraft moved. Only the marker moves unless the aircraft climbs
   * above the altitude axis, which needs a full re-projection.
   */
  aircraftChanged(state: AircraftState | null): void {
    const next = this.trackAircraft(state);
    if (next === null) {
      const hadAircraft = this.aircraft !== null;
      this.aircraft = null;
      if (hadAircraft && this.projection) {
        this.projection = withAircraft(this.projection, null);
        this.onUpdate(this.projection);
      }
      return;
    }

    this.aircraft = next;
    if (!this.projection || next.altitudeFt > this.projection.axisMaxFt) {
      this.updateScreenCoords();
    } else {
      this.projection = withAircraft(this.projection, next);
      this.onUpdate(this.projection);
    }
  }

  /** Simulator connection lost: drop the aircraft and re-project */
  simulatorDisconnected(): void {
    this.aircraft = null;
    this.updateScreenCoords();
  }

  /** Probe the profile at a pixel column and highlight the position found. */
  query(x: number): ProfileQueryResult | null {
    const result = queryProfile(this.profile, this.projection, x, this.config);
    if (result) this.onHighlight(result.position);
    return result;
  }

  /** Pointer left the profile: clear the highlight */
  leave(): void {
    this.onHighlight(INVALID_POSITION);
  }

  /** Abort any running build and wait for it before returning. */
  async dispose(): Promise<void> {
    await this.scheduler.shutdown();
  }

  private trackAircraft(state: AircraftState | null): AircraftAlongRoute | null {
    if (!state || !state.visible || this.route.isEmpty() || !isValidPosition(state.position)) {
      return null;
    }
    const distance = aircraftDistanceFromStart(this.route.getWaypoints(), state.position);
    if (distance === null) return null;
    return { altitudeFt: state.position.altitudeFt, distanceFromStartNm: distance };
  }

  private updateScreenCoords(): void {
    this.projection = projectProfile(
      {
        profile: this.profile,
        viewport: this.viewport,
        cruiseAltitudeFt: this.route.getCruiseAltitudeFt(),
        aircraft: this.aircraft,
      },
      this.config,
    );
    this.onUpdate(this.projection);
  }
}
