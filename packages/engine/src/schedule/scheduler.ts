/**
 * Debounced, single-flight scheduler for profile builds.
 *
 * idle → scheduled → running → (completed | cancelled) → idle
 *
 * Triggers restart a debounce timer. When it fires, a running build is
 * aborted and awaited before the next one starts, so at most one build is in
 * flight and only the most recently started one can complete.
 */

import type { ProfileLogger } from "../config.js";

export type SchedulerState = "idle" | "scheduled" | "running";

/** Why a rebuild was requested */
export type TriggerReason = "route" | "terrain" | "visible";

/** A cancellable build; resolves to null when it observed the abort */
export type ProfileTask<T> = (signal: AbortSignal) => Promise<T | null>;

export interface SchedulerOptions<T> {
  task: ProfileTask<T>;
  /** Receives the result of every build that finished without cancellation */
  onCompleted: (result: T) => void;
  /** Receives errors thrown by the task (default: log them) */
  onError?: (err: unknown) => void;
  /** Debounce delay in ms */
  delayMs: number;
  /** Whether the consumer starts out visible (default false) */
  visible?: boolean;
  logger?: ProfileLogger;
}

interface RunningBuild {
  controller: AbortController;
  done: Promise<void>;
}

export class ProfileScheduler<T> {
  private readonly task: ProfileTask<T>;
  private readonly onCompleted: (result: T) => void;
  private readonly onError: (err: unknown) => void;
  private readonly delayMs: number;
  private readonly logger: ProfileLogger;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private running: RunningBuild | null = null;
  private readonly starts = new Set<Promise<void>>();
  private generation = 0;
  private visible = false;
  private stopped = false;

  private completed = 0;
  private cancelled = 0;

  constructor(options: SchedulerOptions<T>) {
    this.task = options.task;
    this.onCompleted = options.onCompleted;
    this.delayMs = options.delayMs;
    this.visible = options.visible ?? false;
    this.logger = options.logger ?? console;
    this.onError =
      options.onError ??
      ((err) =>
        this.logger.error(
          `[scheduler] Profile build failed: ${err instanceof Error ? err.message : String(err)}`,
        ));
  }

  get state(): SchedulerState {
    if (this.timer) return "scheduled";
    if (this.running) return "running";
    return "idle";
  }

  get isVisible(): boolean {
    return this.visible;
  }

  /** Builds that delivered a result */
  get completedCount(): number {
    return this.completed;
  }

  /** Builds that were aborted or whose result was discarded */
  get cancelledCount(): number {
    return this.cancelled;
  }

  /**
   * Request a rebuild after the debounce delay. Repeated calls restart the
   * delay. Ignored while hidden or after shutdown.
   *
   * @returns whether a rebuild was scheduled
   */
  trigger(reason: TriggerReason, delayMs = this.delayMs): boolean {
    if (this.stopped || !this.visible) return false;

    this.clearTimer();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.track(this.runNow());
    }, delayMs);
    this.logger.log(`[scheduler] ${reason} update, rebuilding in ${delayMs}ms`);
    return true;
  }

  /**
   * Show or hide the consumer. Hiding drops a pending trigger; showing
   * schedules an immediate rebuild to refresh stale state.
   */
  setVisible(visible: boolean): void {
    this.visible = visible;
    if (visible) {
      this.trigger("visible", 0);
    } else {
      this.clearTimer();
    }
  }

  /**
   * Start a build now. A running build is aborted and awaited first.
   * Resolves when this build has settled, or immediately if a newer request
   * superseded it while waiting.
   */
  async runNow(): Promise<void> {
    if (this.stopped) return;
    const generation = ++this.generation;

    const previous = this.running;
    if (previous) {
      this.logger.log("[scheduler] Cancelling running profile build");
      previous.controller.abort();
      await previous.done;
    }
    if (generation !== this.generation || this.stopped) return;

    const build: RunningBuild = {
      controller: new AbortController(),
      done: Promise.resolve(),
    };
    this.running = build;
    build.done = this.execute(build);
    await build.done;
  }

  /** Drop a pending trigger and abort the running build, if any. */
  cancel(): void {
    this.clearTimer();
    this.running?.controller.abort();
  }

  /** Resolves once no build is running or waiting to start. */
  async settled(): Promise<void> {
    while (this.starts.size > 0 || this.running) {
      await Promise.all([...this.starts, this.running?.done]);
    }
  }

  /**
   * Stop scheduling, abort the running build and wait for it to settle.
   * Later triggers are ignored.
   */
  async shutdown(): Promise<void> {
    this.stopped = true;
    this.cancel();
    await this.settled();
  }

  private async execute(build: RunningBuild): Promise<void> {
    const { signal } = build.controller;
    try {
      const result = await this.task(signal);
      if (result === null || signal.aborted) {
        this.cancelled++;
        this.logger.log("[scheduler] Profile build cancelled");
        return;
      }
      if (!this.visible) {
        this.cancelled++;
        this.logger.log("[scheduler] Hidden, discarding profile build");
        return;
      }
      this.completed++;
      this.onCompleted(result);
    } catch (err) {
      this.onError(err);
    } finally {
      if (this.running === build) this.running = null;
    }
  }

  private track(start: Promise<void>): void {
    this.starts.add(start);
    void start
      .catch((err: unknown) => this.onError(err))
      .finally(() => this.starts.delete(start));
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
