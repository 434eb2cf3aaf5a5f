import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { IntervalTask } from "../src/application/background-task.js";
import type { EngineLogger } from "../src/infra/logger.js";
import { silentLogger } from "./helpers.js";

describe("IntervalTask", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("ticks on every interval and once up front when asked", async () => {
    const tick = vi.fn(async () => undefined);
    const task = new IntervalTask(tick, silentLogger, { name: "poll", intervalMs: 1000, runImmediately: true });

    task.start();
    expect(tick).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(2000);
    expect(tick).toHaveBeenCalledTimes(3);

    await task.stop();
    expect(task.isRunning()).toBe(false);
    await vi.advanceTimersByTimeAsync(5000);
    expect(tick).toHaveBeenCalledTimes(3);
  });

  it("skips a tick while the previous one is still running", async () => {
    let release: () => void = () => undefined;
    const tick = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
    );
    const task = new IntervalTask(tick, silentLogger, { name: "sweep", intervalMs: 1000 });

    task.start();
    await vi.advanceTimersByTimeAsync(3000);
    expect(tick).toHaveBeenCalledTimes(1);

    release();
    await vi.advanceTimersByTimeAsync(1000);
    expect(tick).toHaveBeenCalledTimes(2);

    release();
    await task.stop();
  });

  it("logs a failing tick and keeps the schedule", async () => {
    const error = vi.fn();
    const logger: EngineLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error };
    const tick = vi.fn(async () => {
      throw new Error("store offline");
    });
    const task = new IntervalTask(tick, logger, { name: "credit_recovery", intervalMs: 1000 });

    task.start();
    await vi.advanceTimersByTimeAsync(2000);
    await task.stop();

    expect(tick).toHaveBeenCalledTimes(2);
    expect(error).toHaveBeenCalledWith(
      { task: "credit_recovery", err: "store offline" },
      "background task failed",
    );
  });
});
