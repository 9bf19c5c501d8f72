import { startPool, type PoolHandle } from "../../core/pool/pool";
import { deadlineEscalationPolicy } from "../../core/policies/retryPolicies";
import type { Partition } from "../../core/partition/partition";
import type { WorkItem } from "../../core/work/workItem";
import type { Log } from "../../shared/logging/logger";
import type { TableSetupTarget } from "../../ports/TableSetupTarget";
import { freshBudget, renewBudget, resolveMigrationConfig, toEscalation, type MigrationConfigInput } from "../migration/migration.config";

export type TableSetupTask =
  | (WorkItem & { job: "create-parent" })
  | (WorkItem & { job: "create-partition"; partition: Partition })
  | (WorkItem & { job: "drop-table"; table: string });

export type TableSetupDeps = {
  target: TableSetupTarget;
  partitions: readonly Partition[];
  config?: MigrationConfigInput;
  retry?: readonly TableSetupTask[];
  log?: Log;
};

const runSetupTask = (target: TableSetupTarget) => async (task: TableSetupTask): Promise<void> => {
  switch (task.job) {
    case "create-parent":
      return target.createParent(task.timeoutMs);
    case "create-partition":
      return target.createPartition(task.partition, task.timeoutMs);
    case "drop-table":
      return target.dropTable(task.table, task.timeoutMs);
  }
};

type Budget = ReturnType<typeof freshBudget>;

const startSetupPool = (
  name: string,
  deps: TableSetupDeps,
  initial: (budget: Budget) => TableSetupTask[]
): PoolHandle<TableSetupTask> => {
  const config = resolveMigrationConfig(deps.config);

  return startPool<TableSetupTask, void>({
    name,
    // Small jobs: more workers than tables would only sit idle.
    workers: Math.max(1, Math.min(config.workers, deps.partitions.length + 1)),
    pending: deps.retry ? renewBudget(deps.retry, config) : initial(freshBudget(config)),
    workerFn: runSetupTask(deps.target),
    finalize: deadlineEscalationPolicy<TableSetupTask, void>({
      escalation: toEscalation(config),
      onSuccess: (_reply, signals) => {
        signals.increment("done");
        return [];
      }
    }),
    log: deps.log
  });
};

/**
 * Creates the partitioned parent (with its partitioned indexes) and one
 * unconstrained table per partition with autovacuum off.
 */
export const createTables = (deps: TableSetupDeps): PoolHandle<TableSetupTask> =>
  startSetupPool("create-tables", deps, (budget) => [
    { job: "create-parent", label: deps.target.parentTable, ...budget },
    ...deps.partitions.map((partition): TableSetupTask => ({
      job: "create-partition",
      partition,
      label: deps.target.partitionTable(partition),
      ...budget
    }))
  ]);

export const dropTables = (deps: TableSetupDeps): PoolHandle<TableSetupTask> =>
  startSetupPool("drop-tables", deps, (budget) =>
    [...deps.partitions.map((partition) => deps.target.partitionTable(partition)), deps.target.parentTable].map(
      (table): TableSetupTask => ({ job: "drop-table", table, label: table, ...budget })
    )
  );
