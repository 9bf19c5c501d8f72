import type { PoolHandle } from "../../core/pool/pool";
import { failCount, progress } from "../../core/work/signals";
import type { WorkItem } from "../../core/work/workItem";
import type { Log } from "../../shared/logging/logger";

export const reportProgress = <T extends WorkItem>(handle: PoolHandle<T>, log: Log): void => {
  const { percent, ...counts } = progress(handle.signals);
  log("info", {
    event: "pool.progress",
    pool: handle.name,
    ...counts,
    percent: Math.round(percent * 10) / 10,
    failed: failCount(handle.signals),
    counters: handle.signals.counters()
  });
};

/** Logs the pool's progress every `intervalMs` until the returned stop function is called. */
export const startProgressReporter = <T extends WorkItem>(
  handle: PoolHandle<T>,
  intervalMs: number,
  log: Log
): (() => void) => {
  const timer = setInterval(() => reportProgress(handle, log), intervalMs);
  timer.unref();
  return () => clearInterval(timer);
};
