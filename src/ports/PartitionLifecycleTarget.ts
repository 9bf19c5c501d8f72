import type { Partition } from "../core/partition/partition";
import type { KeyRange } from "../core/work/workItem";

/**
 * Statements run against one partition during its lifecycle. Every call
 * must raise `StatementTimeoutError` when its deadline is exceeded.
 */
export interface PartitionLifecycleTarget {
  /** Number of per-partition indexes built during `build-index`. */
  readonly indexCount: number;
  disableAutovacuum(partition: Partition, timeoutMs: number): Promise<void>;
  copyRange(partition: Partition, range: KeyRange, timeoutMs: number): Promise<number>;
  constrain(partition: Partition, timeoutMs: number): Promise<void>;
  buildIndex(partition: Partition, index: number, timeoutMs: number): Promise<void>;
  attach(partition: Partition, timeoutMs: number): Promise<void>;
  dropRangeCheck(partition: Partition, timeoutMs: number): Promise<void>;
  resetAutovacuum(partition: Partition, timeoutMs: number): Promise<void>;
  analyze(partition: Partition, timeoutMs: number): Promise<void>;
}
