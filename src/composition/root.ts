import { readFile } from "fs/promises";
import { bulkCopy } from "../application/bulk-copy/bulkCopy.usecase";
import { checkRunCompleted, summarizeRun } from "../application/migration/migration.error-handler";
import { reportProgress, startProgressReporter } from "../application/migration/progressReporter";
import {
  clearRetryList,
  isCopyBatch,
  isPartitionTask,
  isTableSetupTask,
  readRetryList,
  writeRetryList
} from "../application/migration/retryFile";
import { runPartitionLifecycle } from "../application/partition-lifecycle/partitionLifecycle.usecase";
import { createTables, dropTables } from "../application/table-setup/tableSetup.usecase";
import { partitionBounds, rangeBatches } from "../core/partition/partition";
import type { PoolHandle } from "../core/pool/pool";
import { parseTableSpec, type TableSpec } from "../core/tables/tableSpec";
import { retryList } from "../core/work/signals";
import type { WorkItem } from "../core/work/workItem";
import { PostgresMigrationDatabase } from "../infrastructure/postgres/PostgresMigrationDatabase";
import { createPgPool } from "../infrastructure/postgres/PostgresPoolFactory";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv, type RuntimeConfig } from "../shared/config/runtime.config";
import { consoleLog, type Log } from "../shared/logging/logger";

export const migrationCommands = ["create", "lifecycle", "copy", "drop"] as const;

export type MigrationCommand = (typeof migrationCommands)[number];

export const isMigrationCommand = (value: unknown): value is MigrationCommand =>
  migrationCommands.some((command) => command === value);

export const loadTableSpec = async (path: string): Promise<TableSpec> =>
  parseTableSpec(JSON.parse(await readFile(path, "utf8")));

/**
 * Waits for a pool to finish, killing it on SIGINT/SIGTERM, then writes
 * whatever is left to retry and throws if the run was incomplete.
 */
export const superviseRun = async <T extends WorkItem>(
  handle: PoolHandle<T>,
  runtime: RuntimeConfig,
  log: Log = consoleLog
): Promise<void> => {
  const stopReporting = startProgressReporter(handle, runtime.progressMs, log);
  const onSignal = (signal: NodeJS.Signals) => {
    log("warn", { event: "migrate.interrupted", pool: handle.name, signal });
    handle.kill();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    const signals = await handle.joined;
    reportProgress(handle, log);

    const retry = retryList(signals);
    if (retry.length > 0) {
      await writeRetryList(runtime.retryOut, { pool: handle.name, items: retry });
      log("warn", { event: "migrate.retry_written", pool: handle.name, path: runtime.retryOut, items: retry.length });
    } else {
      await clearRetryList(runtime.retryOut);
    }

    const summary = summarizeRun(handle.name, signals);
    log("info", { event: "migrate.completed", ...summary });

    const incomplete = checkRunCompleted(summary, {
      retryFile: retry.length > 0 ? runtime.retryOut : undefined,
      cause: signals.error
    });
    if (incomplete) throw incomplete;
  } finally {
    stopReporting();
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
};

export const runMigration = async (command: MigrationCommand, env: NodeJS.ProcessEnv = process.env): Promise<void> => {
  const runtime = loadRuntimeConfigFromEnv(env);
  const dbEnv = loadEnv(env);
  const spec = await loadTableSpec(runtime.tableSpecPath);
  const config = runtime.migrationConfig;
  const partitions = partitionBounds(spec.partitions.lo, spec.partitions.hi, spec.partitions.size, spec.partitions.firstId);

  const db = new PostgresMigrationDatabase(spec, () => createPgPool(dbEnv, config.workers));
  const { retryFile } = runtime;

  try {
    switch (command) {
      case "create":
        return await superviseRun(
          createTables({
            target: db,
            partitions,
            config,
            retry: retryFile ? await readRetryList(retryFile, "create-tables", isTableSetupTask) : undefined
          }),
          runtime
        );
      case "lifecycle":
        return await superviseRun(
          runPartitionLifecycle({
            target: db,
            partitions,
            config,
            retry: retryFile ? await readRetryList(retryFile, "partition-lifecycle", isPartitionTask) : undefined
          }),
          runtime
        );
      case "copy":
        return await superviseRun(
          bulkCopy({
            target: db,
            tables: spec.copyTables,
            batches: rangeBatches(spec.partitions.lo, spec.partitions.hi, config.batchSize),
            config,
            retry: retryFile ? await readRetryList(retryFile, "bulk-copy", isCopyBatch) : undefined
          }),
          runtime
        );
      case "drop":
        return await superviseRun(
          dropTables({
            target: db,
            partitions,
            config,
            retry: retryFile ? await readRetryList(retryFile, "drop-tables", isTableSetupTask) : undefined
          }),
          runtime
        );
    }
  } finally {
    await db.close();
  }
};
