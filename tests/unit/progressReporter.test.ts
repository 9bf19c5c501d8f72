import { reportProgress, startProgressReporter } from "../../src/application/migration/progressReporter";
import type { PoolHandle } from "../../src/core/pool/pool";
import { SignalStore } from "../../src/core/work/signals";
import type { WorkItem } from "../../src/core/work/workItem";

const handleWith = (signals: SignalStore<WorkItem>): PoolHandle<WorkItem> => ({
  name: "bulk-copy",
  signals,
  kill: () => undefined,
  joined: Promise.resolve(signals)
});

const threeItems = () => {
  const item: WorkItem = { label: "x", retries: 0, timeoutMs: 1000 };
  const signals = new SignalStore([item, item, item]);
  signals.dispatchNext();
  signals.land();
  signals.increment("events", 12);
  return signals;
};

describe("progress reporter", () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it("logs one progress event", () => {
    const log = jest.fn();

    reportProgress(handleWith(threeItems()), log);

    expect(log).toHaveBeenCalledWith("info", {
      event: "pool.progress",
      pool: "bulk-copy",
      pending: 2,
      inFlight: 0,
      landed: 1,
      total: 3,
      percent: 33.3,
      failed: 0,
      counters: { events: 12 }
    });
  });

  it("reports on an interval until stopped", () => {
    jest.useFakeTimers();
    const log = jest.fn();

    const stop = startProgressReporter(handleWith(threeItems()), 1000, log);
    jest.advanceTimersByTime(2500);
    expect(log).toHaveBeenCalledTimes(2);

    stop();
    jest.advanceTimersByTime(5000);
    expect(log).toHaveBeenCalledTimes(2);
  });
});
