import type { Outcome, Reply, WorkItem } from "./workItem";

export type PoolStatus = "running" | "stopping" | "completed" | "killed" | "aborted";

export type FailedWork<T extends WorkItem> = {
  item: T;
  outcome: Exclude<Outcome<unknown>, { status: "success" }>;
};

/**
 * Read-only view of a running pool, safe to hand to callers for progress
 * reporting and post-run inspection.
 */
export interface PoolSignals<T extends WorkItem> {
  readonly status: PoolStatus;
  readonly pending: readonly T[];
  readonly inFlight: number;
  readonly landed: number;
  readonly enqueued: number;
  readonly failed: readonly FailedWork<T>[];
  readonly cancelled: readonly T[];
  readonly error?: unknown;
  counter(key: string): number;
  counters(): Record<string, number>;
}

/** What a finalize callback may change: its own counters, nothing else. */
export interface FinalizeSignals<T extends WorkItem> extends PoolSignals<T> {
  increment(key: string, by?: number): number;
}

/**
 * Mutable pool state. Only the supervisor holds this class; everyone else
 * sees it through `PoolSignals`/`FinalizeSignals`.
 */
export class SignalStore<T extends WorkItem> implements FinalizeSignals<T> {
  private queue: T[];
  private inFlightCount = 0;
  private landedCount = 0;
  private enqueuedCount: number;
  private readonly failedItems: FailedWork<T>[] = [];
  private readonly cancelledItems: T[] = [];
  private readonly counterValues = new Map<string, number>();
  private statusValue: PoolStatus = "running";
  private errorValue?: unknown;

  constructor(pending: Iterable<T>) {
    this.queue = Array.from(pending);
    this.enqueuedCount = this.queue.length;
  }

  get status(): PoolStatus {
    return this.statusValue;
  }

  get pending(): readonly T[] {
    return this.queue;
  }

  get inFlight(): number {
    return this.inFlightCount;
  }

  get landed(): number {
    return this.landedCount;
  }

  get enqueued(): number {
    return this.enqueuedCount;
  }

  get failed(): readonly FailedWork<T>[] {
    return this.failedItems;
  }

  get cancelled(): readonly T[] {
    return this.cancelledItems;
  }

  get error(): unknown {
    return this.errorValue;
  }

  counter(key: string): number {
    return this.counterValues.get(key) ?? 0;
  }

  counters(): Record<string, number> {
    return Object.fromEntries(this.counterValues);
  }

  increment(key: string, by = 1): number {
    const value = this.counter(key) + by;
    this.counterValues.set(key, value);
    return value;
  }

  dispatchNext(): T | undefined {
    const next = this.queue.shift();
    if (next !== undefined) this.inFlightCount += 1;
    return next;
  }

  land(): void {
    this.inFlightCount -= 1;
    this.landedCount += 1;
  }

  enqueue(items: readonly T[]): void {
    this.queue.push(...items);
    this.enqueuedCount += items.length;
  }

  /** Follow-ups produced while shutting down go straight to `cancelled`. */
  enqueueCancelled(items: readonly T[]): void {
    this.cancelledItems.push(...items);
    this.enqueuedCount += items.length;
  }

  recordFailure(reply: Reply<T, unknown>): void {
    if (reply.outcome.status === "success") return;
    this.failedItems.push({ item: reply.item, outcome: reply.outcome });
  }

  cancelPending(): number {
    const cancelled = this.queue;
    this.queue = [];
    this.cancelledItems.push(...cancelled);
    return cancelled.length;
  }

  setStatus(status: PoolStatus): void {
    this.statusValue = status;
  }

  setError(error: unknown): void {
    this.errorValue = error;
  }
}

export type PoolProgress = {
  pending: number;
  inFlight: number;
  landed: number;
  total: number;
  percent: number;
};

/**
 * Heuristic progress: only exact when landed work spawns no follow-ups.
 */
export const progress = (signals: PoolSignals<WorkItem>): PoolProgress => {
  const pending = signals.pending.length;
  const total = pending + signals.inFlight + signals.landed;
  return {
    pending,
    inFlight: signals.inFlight,
    landed: signals.landed,
    total,
    percent: total === 0 ? 100 : (signals.landed / total) * 100
  };
};

export const failCount = (signals: PoolSignals<WorkItem>): number => signals.failed.length;

/** Work an operator can re-supply as the pending list of a new run. */
export const retryList = <T extends WorkItem>(signals: PoolSignals<T>): T[] => [
  ...signals.failed.map((failure) => failure.item),
  ...signals.cancelled
];
