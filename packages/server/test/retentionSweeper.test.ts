import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { startRetentionSweeper } from "../src/board/retentionSweeper.js";
import type { LogEvent } from "../src/log.js";

describe("retentionSweeper", () => {
  let events: LogEvent[];

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    events = [];
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("sweeps at start and then on every interval until stopped", async () => {
    const sweep = vi.fn(async () => 2);
    const sweeper = startRetentionSweeper({ sweep, intervalMs: 1000, log: (e) => events.push(e) });

    expect(sweep).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1000);
    expect(sweep).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(2000);
    expect(sweep).toHaveBeenCalledTimes(4);

    sweeper.stop();
    await vi.advanceTimersByTimeAsync(5000);
    expect(sweep).toHaveBeenCalledTimes(4);
    expect(events[0]).toEqual({ type: "retention_sweep", removed: 2, durationMs: 0 });
  });

  it("skips a tick while the previous sweep is still running", async () => {
    let finish: (removed: number) => void = () => undefined;
    const sweep = vi.fn(
      () =>
        new Promise<number>((resolve) => {
          finish = resolve;
        }),
    );
    const sweeper = startRetentionSweeper({ sweep, intervalMs: 1000, log: (e) => events.push(e) });

    await vi.advanceTimersByTimeAsync(1000);
    expect(sweep).toHaveBeenCalledTimes(1);
    expect(events).toEqual([{ type: "retention_sweep_skipped" }]);

    finish(0);
    await vi.advanceTimersByTimeAsync(1000);
    expect(sweep).toHaveBeenCalledTimes(2);

    sweeper.stop();
  });

  it("logs a failed sweep and keeps the timer running", async () => {
    const sweep = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new Error("disk gone"))
      .mockResolvedValue(1);
    const sweeper = startRetentionSweeper({ sweep, intervalMs: 1000, log: (e) => events.push(e) });

    await vi.advanceTimersByTimeAsync(1000);

    expect(sweep).toHaveBeenCalledTimes(2);
    expect(events).toEqual([
      { type: "retention_sweep_failed", error: { name: "Error", message: "disk gone" } },
      { type: "retention_sweep", removed: 1, durationMs: 0 },
    ]);

    sweeper.stop();
  });

  it("rejects a non-positive interval", () => {
    expect(() =>
      startRetentionSweeper({ sweep: async () => 0, intervalMs: 0, log: () => undefined }),
    ).toThrow("intervalMs must be positive");
  });
});
