import { describeError, type Log } from "../log.js";

export type RetentionSweeperHandle = Readonly<{
  stop: () => void;
}>;

export type StartRetentionSweeperOptions = Readonly<{
  /** Resolves with the number of files removed. */
  sweep: () => Promise<number>;
  intervalMs: number;
  log: Log;
}>;

/**
 * Runs `sweep` once right away, then every `intervalMs`.
 *
 * A tick that finds the previous sweep still running is skipped. The timer does not keep the
 * process alive.
 */
export function startRetentionSweeper(options: StartRetentionSweeperOptions): RetentionSweeperHandle {
  if (options.intervalMs <= 0) throw new Error("intervalMs must be positive");

  const { log } = options;
  let running = false;
  let stopped = false;

  const tick = () => {
    if (stopped) return;
    if (running) {
      log({ type: "retention_sweep_skipped" });
      return;
    }

    void runSweep();
  };

  const runSweep = async () => {
    running = true;
    const startedAtMs = Date.now();
    try {
      const removed = await options.sweep();
      log({ type: "retention_sweep", removed, durationMs: Date.now() - startedAtMs });
    } catch (err: unknown) {
      log({ type: "retention_sweep_failed", error: describeError(err) });
    } finally {
      running = false;
    }
  };

  const interval = setInterval(tick, options.intervalMs);
  interval.unref();
  tick();

  const stop = () => {
    if (stopped) return;
    stopped = true;
    clearInterval(interval);
  };

  return { stop };
}
