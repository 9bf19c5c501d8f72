import type { PoolSignals, PoolStatus } from "../../core/work/signals";
import type { WorkItem } from "../../core/work/workItem";

export type MigrationFailureCode = "work_failed" | "pool_aborted" | "pool_killed";

export type MigrationRunSummary = {
  pool: string;
  status: PoolStatus;
  landed: number;
  enqueued: number;
  failed: number;
  cancelled: number;
  counters: Record<string, number>;
};

export type MigrationErrorContext = Pick<MigrationRunSummary, "pool" | "failed" | "cancelled"> & {
  retryFile?: string;
};

export class MigrationIncompleteError extends Error {
  readonly code: MigrationFailureCode;
  readonly context: MigrationErrorContext;

  constructor(args: { code: MigrationFailureCode; message: string; context: MigrationErrorContext; cause?: unknown }) {
    super(args.message, { cause: args.cause });
    this.name = "MigrationIncompleteError";
    this.code = args.code;
    this.context = args.context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const summarizeRun = (pool: string, signals: PoolSignals<WorkItem>): MigrationRunSummary => ({
  pool,
  status: signals.status,
  landed: signals.landed,
  enqueued: signals.enqueued,
  failed: signals.failed.length,
  cancelled: signals.cancelled.length,
  counters: signals.counters()
});

/**
 * A finished run is incomplete when it was cut short or left work behind;
 * returns the error to raise, or undefined when everything landed.
 */
export const checkRunCompleted = (
  summary: MigrationRunSummary,
  opts: { retryFile?: string; cause?: unknown } = {}
): MigrationIncompleteError | undefined => {
  const context: MigrationErrorContext = {
    pool: summary.pool,
    failed: summary.failed,
    cancelled: summary.cancelled
  };
  if (opts.retryFile) context.retryFile = opts.retryFile;

  if (summary.status === "aborted") {
    return new MigrationIncompleteError({
      code: "pool_aborted",
      message: `Pool ${summary.pool} wound down after an unrecoverable condition`,
      context,
      cause: opts.cause
    });
  }

  if (summary.status === "killed") {
    return new MigrationIncompleteError({
      code: "pool_killed",
      message: `Pool ${summary.pool} was killed with ${summary.cancelled} item(s) cancelled`,
      context
    });
  }

  if (summary.failed > 0 || summary.cancelled > 0) {
    return new MigrationIncompleteError({
      code: "work_failed",
      message: `Pool ${summary.pool} finished with ${summary.failed} failed item(s)`,
      context
    });
  }

  return undefined;
};
