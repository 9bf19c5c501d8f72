import { startPool, type PoolHandle } from "../../core/pool/pool";
import { rangeSplittingPolicy } from "../../core/policies/retryPolicies";
import type { CopyTableSpec } from "../../core/tables/tableSpec";
import { describeRange, type KeyRange, type WorkItem } from "../../core/work/workItem";
import type { Log } from "../../shared/logging/logger";
import type { TableCopyTarget } from "../../ports/TableCopyTarget";
import { freshBudget, renewBudget, resolveMigrationConfig, toEscalation, type MigrationConfigInput } from "../migration/migration.config";

export type CopyBatch = WorkItem & KeyRange & {
  job: "copy";
  table: CopyTableSpec;
};

export type BulkCopyDeps = {
  target: TableCopyTarget;
  tables: readonly CopyTableSpec[];
  batches: readonly KeyRange[];
  config?: MigrationConfigInput;
  retry?: readonly CopyBatch[];
  log?: Log;
};

const batchLabel = (table: CopyTableSpec, range: KeyRange): string => `${table.to}${describeRange(range)}`;

/**
 * Copies every batch of every table. Batches that time out are halved
 * until they fit in the deadline; rows copied are counted per target table.
 */
export const bulkCopy = (deps: BulkCopyDeps): PoolHandle<CopyBatch> => {
  const config = resolveMigrationConfig(deps.config);

  const pending = deps.retry
    ? renewBudget(deps.retry, config)
    : deps.tables.flatMap((table) =>
        deps.batches.map((range): CopyBatch => ({
          job: "copy",
          table,
          ...range,
          label: batchLabel(table, range),
          ...freshBudget(config)
        }))
      );

  const policy = rangeSplittingPolicy<CopyBatch, number>({
    escalation: toEscalation(config),
    onSuccess: (reply, signals) => {
      signals.increment(reply.item.table.to, reply.outcome.payload);
      return [];
    }
  });

  return startPool<CopyBatch, number>({
    name: "bulk-copy",
    workers: config.workers,
    pending,
    workerFn: (batch) => deps.target.copyRows(batch.table, { lo: batch.lo, hi: batch.hi }, batch.timeoutMs),
    // Halves of a split batch are labelled by their own range.
    finalize: (reply, signals) =>
      policy(reply, signals).map((batch) => ({ ...batch, label: batchLabel(batch.table, batch) })),
    log: deps.log
  });
};
