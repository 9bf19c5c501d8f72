import type { CopyTableSpec } from "../core/tables/tableSpec";
import type { KeyRange } from "../core/work/workItem";

export interface TableCopyTarget {
  /** Copies rows with `key` in `[lo, hi)` and returns how many were inserted. */
  copyRows(table: CopyTableSpec, range: KeyRange, timeoutMs: number): Promise<number>;
}
