import type { Partition } from "../core/partition/partition";

export interface TableSetupTarget {
  readonly parentTable: string;
  partitionTable(partition: Partition): string;
  createParent(timeoutMs: number): Promise<void>;
  createPartition(partition: Partition, timeoutMs: number): Promise<void>;
  dropTable(table: string, timeoutMs: number): Promise<void>;
}
