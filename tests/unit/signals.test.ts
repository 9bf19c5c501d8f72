import { SignalStore, failCount, progress, retryList } from "../../src/core/work/signals";
import type { WorkItem } from "../../src/core/work/workItem";

const item = (label: string): WorkItem => ({ label, retries: 1, timeoutMs: 1000 });

describe("SignalStore", () => {
  it("moves items from pending to in flight to landed", () => {
    const signals = new SignalStore([item("a"), item("b")]);
    expect(signals.enqueued).toBe(2);

    expect(signals.dispatchNext()).toEqual(item("a"));
    expect(signals.pending).toEqual([item("b")]);
    expect(signals.inFlight).toBe(1);

    signals.land();
    expect(signals.inFlight).toBe(0);
    expect(signals.landed).toBe(1);
  });

  it("returns undefined without touching in flight when nothing is pending", () => {
    const signals = new SignalStore<WorkItem>([]);

    expect(signals.dispatchNext()).toBeUndefined();
    expect(signals.inFlight).toBe(0);
  });

  it("counts follow-ups as enqueued, cancelled or not", () => {
    const signals = new SignalStore([item("a")]);
    signals.enqueue([item("b"), item("c")]);
    signals.enqueueCancelled([item("d")]);

    expect(signals.enqueued).toBe(4);
    expect(signals.pending.map((work) => work.label)).toEqual(["a", "b", "c"]);
    expect(signals.cancelled).toEqual([item("d")]);
  });

  it("records only unsuccessful replies as failures", () => {
    const signals = new SignalStore<WorkItem>([]);
    signals.recordFailure({ item: item("ok"), outcome: { status: "success", payload: 1 } });
    signals.recordFailure({ item: item("slow"), outcome: { status: "timeout" } });

    expect(signals.failed).toEqual([{ item: item("slow"), outcome: { status: "timeout" } }]);
  });

  it("cancels everything pending", () => {
    const signals = new SignalStore([item("a"), item("b")]);

    expect(signals.cancelPending()).toBe(2);
    expect(signals.pending).toEqual([]);
    expect(signals.cancelled).toEqual([item("a"), item("b")]);
  });

  it("keeps named counters", () => {
    const signals = new SignalStore<WorkItem>([]);
    expect(signals.counter("rows")).toBe(0);

    signals.increment("rows", 40);
    expect(signals.increment("rows", 2)).toBe(42);
    signals.increment("attach");

    expect(signals.counters()).toEqual({ rows: 42, attach: 1 });
  });
});

describe("signal helpers", () => {
  it("reports progress over known work", () => {
    const signals = new SignalStore([item("a"), item("b"), item("c"), item("d")]);
    signals.dispatchNext();
    signals.dispatchNext();
    signals.land();

    expect(progress(signals)).toEqual({ pending: 2, inFlight: 1, landed: 1, total: 4, percent: 25 });
  });

  it("reports an empty pool as done", () => {
    expect(progress(new SignalStore<WorkItem>([])).percent).toBe(100);
  });

  it("collects failed then cancelled items for a retry run", () => {
    const signals = new SignalStore([item("a"), item("b")]);
    signals.dispatchNext();
    signals.land();
    signals.recordFailure({ item: item("a"), outcome: { status: "error", error: new Error("x") } });
    signals.cancelPending();

    expect(failCount(signals)).toBe(1);
    expect(retryList(signals)).toEqual([item("a"), item("b")]);
  });
});
