import { readFile, rm, writeFile } from "fs/promises";
import { partitionPhases, type Partition } from "../../core/partition/partition";
import type { WorkItem } from "../../core/work/workItem";
import type { CopyBatch } from "../bulk-copy/bulkCopy.usecase";
import type { PartitionTask } from "../partition-lifecycle/partitionLifecycle.usecase";
import type { TableSetupTask } from "../table-setup/tableSetup.usecase";

export type RetryFile<T extends WorkItem> = {
  pool: string;
  items: T[];
};

export class RetryFileError extends Error {
  readonly code = "invalid_retry_file";
  readonly context: { path: string; index?: number };

  constructor(path: string, message: string, index?: number) {
    super(`Invalid retry file ${path}: ${message}`);
    this.name = "RetryFileError";
    this.context = index == null ? { path } : { path, index };
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

type Guard<T> = (value: unknown) => value is T;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isInteger = (value: unknown, min: number): value is number =>
  typeof value === "number" && Number.isSafeInteger(value) && value >= min;

const isWorkItem = (value: Record<string, unknown>): boolean =>
  typeof value.label === "string" && isInteger(value.retries, 0) && isInteger(value.timeoutMs, 1);

const isRange = (value: Record<string, unknown>): boolean =>
  isInteger(value.lo, Number.MIN_SAFE_INTEGER) && isInteger(value.hi, Number.MIN_SAFE_INTEGER) && value.lo < value.hi;

const isPartition = (value: unknown): value is Partition =>
  isRecord(value) && isInteger(value.id, 0) && isRange(value);

const isPhase = (value: unknown): boolean => partitionPhases.some((phase) => phase === value);

export const isPartitionTask: Guard<PartitionTask> = (value): value is PartitionTask => {
  if (!isRecord(value) || !isWorkItem(value) || !isPhase(value.job) || !isPartition(value.partition)) return false;
  if (value.job === "bulk-copy") return isRange(value);
  if (value.job === "build-index") return isInteger(value.index, 0);
  return true;
};

export const isTableSetupTask: Guard<TableSetupTask> = (value): value is TableSetupTask => {
  if (!isRecord(value) || !isWorkItem(value)) return false;
  switch (value.job) {
    case "create-parent":
      return true;
    case "create-partition":
      return isPartition(value.partition);
    case "drop-table":
      return typeof value.table === "string" && value.table !== "";
    default:
      return false;
  }
};

export const isCopyBatch: Guard<CopyBatch> = (value): value is CopyBatch => {
  if (!isRecord(value) || !isWorkItem(value) || value.job !== "copy" || !isRange(value)) return false;
  const table = value.table;
  return (
    isRecord(table) && typeof table.from === "string" && typeof table.to === "string" && typeof table.key === "string"
  );
};

/** Reads the failed and cancelled work an earlier run of `pool` left behind. */
export const readRetryList = async <T extends WorkItem>(path: string, pool: string, isItem: Guard<T>): Promise<T[]> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf8"));
  } catch (err) {
    throw new RetryFileError(path, err instanceof Error ? err.message : String(err));
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.items)) {
    throw new RetryFileError(path, "expected an object with an items array");
  }
  if (parsed.pool !== pool) {
    throw new RetryFileError(path, `written by pool ${String(parsed.pool)}, not ${pool}`);
  }

  return parsed.items.map((item: unknown, index) => {
    if (!isItem(item)) throw new RetryFileError(path, "malformed work item", index);
    return item;
  });
};

export const writeRetryList = async <T extends WorkItem>(path: string, file: RetryFile<T>): Promise<void> => {
  await writeFile(path, `${JSON.stringify(file, null, 2)}\n`, "utf8");
};

/** Removes the retry file of an earlier run, if there is one. */
export const clearRetryList = async (path: string): Promise<void> => {
  await rm(path, { force: true });
};
