import { describe, it, expect, vi, afterEach } from "vitest";
import type { ProfileLogger } from "../config.js";
import { ProfileScheduler, type ProfileTask } from "./scheduler.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function silentLogger(): ProfileLogger {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

interface PendingBuild {
  signal: AbortSignal;
  resolve: (value: number | null) => void;
}

/** A task whose builds finish when the test says so, or when aborted */
function controllableTask() {
  const builds: PendingBuild[] = [];
  let active = 0;
  let maxActive = 0;

  const task: ProfileTask<number> = (signal) =>
    new Promise<number | null>((resolve) => {
      let done = false;
      const finish = (value: number | null) => {
        if (done) return;
        done = true;
        active--;
        resolve(value);
      };
      active++;
      maxActive = Math.max(maxActive, active);
      signal.addEventListener("abort", () => finish(null), { once: true });
      builds.push({ signal, resolve: finish });
    });

  return { task, builds, maxActive: () => maxActive };
}

afterEach(() => {
  vi.useRealTimers();
});

// ─── Debounce ───────────────────────────────────────────────────────────────

describe("ProfileScheduler - debounce", () => {
  it("coalesces a burst of triggers into one build after the last delay", async () => {
    vi.useFakeTimers();
    const task = vi.fn(async (_signal: AbortSignal) => 1);
    const onCompleted = vi.fn();
    const scheduler = new ProfileScheduler<number>({
      task,
      onCompleted,
      delayMs: 1000,
      visible: true,
      logger: silentLogger(),
    });

    scheduler.trigger("route");
    await vi.advanceTimersByTimeAsync(500);
    scheduler.trigger("route");
    await vi.advanceTimersByTimeAsync(500);
    scheduler.trigger("route");
    await vi.advanceTimersByTimeAsync(999);
    expect(task).not.toHaveBeenCalled();
    expect(scheduler.state).toBe("scheduled");

    await vi.advanceTimersByTimeAsync(1);
    await scheduler.settled();

    expect(task).toHaveBeenCalledTimes(1);
    expect(onCompleted).toHaveBeenCalledTimes(1);
    expect(onCompleted).toHaveBeenCalledWith(1);
    expect(scheduler.state).toBe("idle");
  });

  it("logs the trigger reason and delay", () => {
    vi.useFakeTimers();
    const logger = silentLogger();
    const scheduler = new ProfileScheduler<number>({
      task: async () => 1,
      onCompleted: () => {},
      delayMs: 1000,
      visible: true,
      logger,
    });
    scheduler.trigger("terrain");
    expect(logger.log).toHaveBeenCalledWith("[scheduler] terrain update, rebuilding in 1000ms");
  });

  it("drops a pending trigger on cancel", async () => {
    vi.useFakeTimers();
    const task = vi.fn(async (_signal: AbortSignal) => 1);
    const onCompleted = vi.fn();
    const scheduler = new ProfileScheduler<number>({
      task,
      onCompleted,
      delayMs: 1000,
      visible: true,
      logger: silentLogger(),
    });

    scheduler.trigger("route");
    scheduler.cancel();
    await vi.advanceTimersByTimeAsync(5000);

    expect(task).not.toHaveBeenCalled();
    expect(onCompleted).not.toHaveBeenCalled();
    expect(scheduler.state).toBe("idle");
  });
});

// ─── Visibility ─────────────────────────────────────────────────────────────

describe("ProfileScheduler - visibility", () => {
  it("ignores triggers while hidden", async () => {
    vi.useFakeTimers();
    const task = vi.fn(async (_signal: AbortSignal) => 1);
    const scheduler = new ProfileScheduler<number>({
      task,
      onCompleted: () => {},
      delayMs: 1000,
      logger: silentLogger(),
    });

    expect(scheduler.trigger("route")).toBe(false);
    await vi.advanceTimersByTimeAsync(5000);
    expect(task).not.toHaveBeenCalled();
  });

  it("rebuilds without the debounce delay when shown", async () => {
    vi.useFakeTimers();
    const task = vi.fn(async (_signal: AbortSignal) => 1);
    const onCompleted = vi.fn();
    const scheduler = new ProfileScheduler<number>({
      task,
      onCompleted,
      delayMs: 1000,
      logger: silentLogger(),
    });

    scheduler.setVisible(true);
    await vi.advanceTimersByTimeAsync(1);
    await scheduler.settled();

    expect(task).toHaveBeenCalledTimes(1);
    expect(onCompleted).toHaveBeenCalledWith(1);
  });

  it("drops a pending trigger when hidden", async () => {
    vi.useFakeTimers();
    const task = vi.fn(async (_signal: AbortSignal) => 1);
    const scheduler = new ProfileScheduler<number>({
      task,
      onCompleted: () => {},
      delayMs: 1000,
      visible: true,
      logger: silentLogger(),
    });

    scheduler.trigger("route");
    scheduler.setVisible(false);
    await vi.advanceTimersByTimeAsync(5000);
    expect(task).not.toHaveBeenCalled();
  });

  it("discards a result that finishes while hidden", async () => {
    const { task, builds } = controllableTask();
    const onCompleted = vi.fn();
    const scheduler = new ProfileScheduler<number>({
      task,
      onCompleted,
      delayMs: 1000,
      visible: true,
      logger: silentLogger(),
    });

    const run = scheduler.runNow();
    scheduler.setVisible(false);
    builds[0]!.resolve(7);
    await run;

    expect(onCompleted).not.toHaveBeenCalled();
    expect(scheduler.cancelledCount).toBe(1);
  });
});

// ─── Single flight ──────────────────────────────────────────────────────────

describe("ProfileScheduler - single flight", () => {
  it("aborts the running build before starting the next one", async () => {
    const { task, builds, maxActive } = controllableTask();
    const onCompleted = vi.fn();
    const scheduler = new ProfileScheduler<number>({
      task,
      onCompleted,
      delayMs: 1000,
      visible: true,
      logger: silentLogger(),
    });

    const first = scheduler.runNow();
    const second = scheduler.runNow();
    const third = scheduler.runNow();

    expect(builds[0]!.signal.aborted).toBe(true);
    await vi.waitFor(() => expect(builds).toHaveLength(2));

    builds[1]!.resolve(42);
    await Promise.all([first, second, third]);

    expect(maxActive()).toBe(1);
    expect(builds).toHaveLength(2);
    expect(onCompleted).toHaveBeenCalledTimes(1);
    expect(onCompleted).toHaveBeenCalledWith(42);
    expect(scheduler.completedCount).toBe(1);
    expect(scheduler.cancelledCount).toBe(1);
  });

  it("discards the result of a cancelled build", async () => {
    const { task } = controllableTask();
    const onCompleted = vi.fn();
    const scheduler = new ProfileScheduler<number>({
      task,
      onCompleted,
      delayMs: 1000,
      visible: true,
      logger: silentLogger(),
    });

    const run = scheduler.runNow();
    expect(scheduler.state).toBe("running");
    scheduler.cancel();
    await run;

    expect(onCompleted).not.toHaveBeenCalled();
    expect(scheduler.cancelledCount).toBe(1);
    expect(scheduler.state).toBe("idle");
  });

  it("discards a result returned after the abort", async () => {
    const onCompleted = vi.fn();
    const scheduler = new ProfileScheduler<number>({
      task: async () => {
        await Promise.resolve();
        return 5;
      },
      onCompleted,
      delayMs: 1000,
      visible: true,
      logger: silentLogger(),
    });

    const run = scheduler.runNow();
    scheduler.cancel();
    await run;

    expect(onCompleted).not.toHaveBeenCalled();
  });
});

// ─── Errors and shutdown ────────────────────────────────────────────────────

describe("ProfileScheduler - errors", () => {
  it("reports task failures to onError", async () => {
    const onCompleted = vi.fn();
    const onError = vi.fn();
    const error = new Error("boom");
    const scheduler = new ProfileScheduler<number>({
      task: async () => {
        throw error;
      },
      onCompleted,
      onError,
      delayMs: 1000,
      visible: true,
      logger: silentLogger(),
    });

    await scheduler.runNow();

    expect(onError).toHaveBeenCalledWith(error);
    expect(onCompleted).not.toHaveBeenCalled();
    expect(scheduler.state).toBe("idle");
  });

  it("logs failures by default", async () => {
    const logger = silentLogger();
    const scheduler = new ProfileScheduler<number>({
      task: async () => {
        throw new Error("boom");
      },
      onCompleted: () => {},
      delayMs: 1000,
      visible: true,
      logger,
    });

    await scheduler.runNow();
    expect(logger.error).toHaveBeenCalledWith("[scheduler] Profile build failed: boom");
  });
});

describe("ProfileScheduler - shutdown", () => {
  it("aborts and awaits the running build", async () => {
    const { task, builds } = controllableTask();
    const onCompleted = vi.fn();
    const scheduler = new ProfileScheduler<number>({
      task,
      onCompleted,
      delayMs: 1000,
      visible: true,
      logger: silentLogger(),
    });

    const run = scheduler.runNow();
    await scheduler.shutdown();

    expect(builds[0]!.signal.aborted).toBe(true);
    expect(scheduler.state).toBe("idle");
    await run;
    expect(onCompleted).not.toHaveBeenCalled();
  });

  it("ignores requests after shutdown", async () => {
    const { task, builds } = controllableTask();
    const scheduler = new ProfileScheduler<number>({
      task,
      onCompleted: () => {},
      delayMs: 1000,
      visible: true,
      logger: silentLogger(),
    });

    await scheduler.shutdown();

    expect(scheduler.trigger("route")).toBe(false);
    await scheduler.runNow();
    expect(builds).toHaveLength(0);
  });
});
