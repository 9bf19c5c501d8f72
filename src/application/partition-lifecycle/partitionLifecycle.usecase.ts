import { startPool, type PoolHandle } from "../../core/pool/pool";
import type { Finalize } from "../../core/pool/supervisor";
import { escalateDeadline, retryOnError, splitRange } from "../../core/policies/retryPolicies";
import { nextPhase, rangeBatches, type Partition, type PartitionPhase } from "../../core/partition/partition";
import type { FinalizeSignals } from "../../core/work/signals";
import { describeRange, type KeyRange, type WorkItem } from "../../core/work/workItem";
import type { Log } from "../../shared/logging/logger";
import type { PartitionLifecycleTarget } from "../../ports/PartitionLifecycleTarget";
import { freshBudget, renewBudget, resolveMigrationConfig, toEscalation, type MigrationConfigInput } from "../migration/migration.config";

type PhaseParams = {
  "autovacuum-disable": Record<never, never>;
  "bulk-copy": KeyRange;
  constrain: Record<never, never>;
  "build-index": { index: number };
  attach: Record<never, never>;
  "drop-range-check": Record<never, never>;
  "autovacuum-reset": Record<never, never>;
  analyze: Record<never, never>;
};

export type PartitionTask = {
  [J in PartitionPhase]: WorkItem & { job: J; partition: Partition } & PhaseParams[J];
}[PartitionPhase];

type SimplePhase = Exclude<PartitionPhase, "bulk-copy" | "build-index">;

export type PartitionLifecycleDeps = {
  target: PartitionLifecycleTarget;
  partitions: readonly Partition[];
  config?: MigrationConfigInput;
  /** Failed and cancelled tasks of an earlier run; replaces the initial work. */
  retry?: readonly PartitionTask[];
  log?: Log;
};

const assertNever = (value: never): never => {
  throw new Error(`Unhandled partition task: ${JSON.stringify(value)}`);
};

export const partitionLabel = (partition: Partition, job: PartitionPhase, detail = ""): string =>
  `partition-${partition.id}:${job}${detail}`;

const copyLabel = (partition: Partition, range: KeyRange): string =>
  partitionLabel(partition, "bulk-copy", describeRange(range));

const runPhase = (target: PartitionLifecycleTarget) => async (task: PartitionTask): Promise<number> => {
  const { partition, timeoutMs } = task;
  switch (task.job) {
    case "autovacuum-disable":
      await target.disableAutovacuum(partition, timeoutMs);
      return 0;
    case "bulk-copy":
      return target.copyRange(partition, { lo: task.lo, hi: task.hi }, timeoutMs);
    case "constrain":
      await target.constrain(partition, timeoutMs);
      return 0;
    case "build-index":
      await target.buildIndex(partition, task.index, timeoutMs);
      return 0;
    case "attach":
      await target.attach(partition, timeoutMs);
      return 0;
    case "drop-range-check":
      await target.dropRangeCheck(partition, timeoutMs);
      return 0;
    case "autovacuum-reset":
      await target.resetAutovacuum(partition, timeoutMs);
      return 0;
    case "analyze":
      await target.analyze(partition, timeoutMs);
      return 0;
    default:
      return assertNever(task);
  }
};

/**
 * Drives every partition through the fixed phase chain. A phase is only
 * created while finalizing the success of the one before it, so no
 * partition is attached before its rows are copied and its indexes exist.
 */
export const runPartitionLifecycle = (deps: PartitionLifecycleDeps): PoolHandle<PartitionTask> => {
  const { target } = deps;
  const config = resolveMigrationConfig(deps.config);
  const escalation = toEscalation(config);

  // Copy batches of each partition that have not landed yet.
  const outstanding = new Map<number, number>();

  const simpleTask = (partition: Partition, job: SimplePhase): PartitionTask => ({
    job,
    partition,
    label: partitionLabel(partition, job),
    ...freshBudget(config)
  });

  const indexTask = (partition: Partition, index: number): PartitionTask => ({
    job: "build-index",
    index,
    partition,
    label: partitionLabel(partition, "build-index", `#${index}`),
    ...freshBudget(config)
  });

  const copyTasks = (partition: Partition): PartitionTask[] =>
    rangeBatches(partition.lo, partition.hi, config.batchSize).map((range): PartitionTask => ({
      job: "bulk-copy",
      ...range,
      partition,
      label: copyLabel(partition, range),
      ...freshBudget(config)
    }));

  const enter = (partition: Partition, phase: PartitionPhase | undefined): PartitionTask[] => {
    if (phase === undefined) return [];

    switch (phase) {
      case "bulk-copy": {
        const batches = copyTasks(partition);
        if (batches.length === 0) return enter(partition, nextPhase(phase));
        outstanding.set(partition.id, (outstanding.get(partition.id) ?? 0) + batches.length);
        return batches;
      }
      case "build-index":
        return target.indexCount > 0 ? [indexTask(partition, 0)] : enter(partition, nextPhase(phase));
      default:
        return [simpleTask(partition, phase)];
    }
  };

  const advance = (task: PartitionTask, rows: number, signals: FinalizeSignals<PartitionTask>): PartitionTask[] => {
    const { partition } = task;

    if (task.job === "bulk-copy") {
      signals.increment("rows", rows);
      const left = (outstanding.get(partition.id) ?? 1) - 1;
      if (left > 0) {
        outstanding.set(partition.id, left);
        return [];
      }
      outstanding.delete(partition.id);
    }

    if (task.job === "build-index") {
      signals.increment(task.job);
      if (task.index + 1 < target.indexCount) return [indexTask(partition, task.index + 1)];
      return enter(partition, nextPhase(task.job));
    }

    signals.increment(task.job);
    return enter(partition, nextPhase(task.job));
  };

  const finalize: Finalize<PartitionTask, number> = (reply, signals) => {
    const { item, outcome } = reply;

    switch (outcome.status) {
      case "success":
        return advance(item, outcome.payload, signals);
      case "timeout":
        if (item.job === "bulk-copy") {
          const split = splitRange(item, escalation);
          if (split.length > 1) {
            outstanding.set(item.partition.id, (outstanding.get(item.partition.id) ?? 1) + split.length - 1);
          }
          return split.map((task) => ({ ...task, label: copyLabel(task.partition, task) }));
        }
        return escalateDeadline(item, escalation);
      case "error":
        return retryOnError(item);
    }
  };

  const pending = deps.retry
    ? renewBudget(deps.retry, config)
    : deps.partitions.flatMap((partition) => enter(partition, "autovacuum-disable"));
  if (deps.retry) {
    for (const task of deps.retry) {
      if (task.job === "bulk-copy") {
        outstanding.set(task.partition.id, (outstanding.get(task.partition.id) ?? 0) + 1);
      }
    }
  }

  return startPool<PartitionTask, number>({
    name: "partition-lifecycle",
    workers: config.workers,
    pending,
    workerFn: runPhase(target),
    finalize,
    log: deps.log
  });
};
