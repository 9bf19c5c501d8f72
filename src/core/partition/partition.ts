import type { KeyRange } from "../work/workItem";

/** A child table holding keys `[lo, hi)` of a range-partitioned parent. */
export type Partition = KeyRange & {
  id: number;
};

/**
 * Lifecycle of one partition, in the only order it may run. Attach comes
 * after indexing, and the scaffolding range check is only dropped once the
 * attach has succeeded.
 */
export const partitionPhases = [
  "autovacuum-disable",
  "bulk-copy",
  "constrain",
  "build-index",
  "attach",
  "drop-range-check",
  "autovacuum-reset",
  "analyze"
] as const;

export type PartitionPhase = (typeof partitionPhases)[number];

export const nextPhase = (phase: PartitionPhase): PartitionPhase | undefined => {
  const index = partitionPhases.indexOf(phase);
  return partitionPhases[index + 1];
};

const assertSafeInteger = (name: string, value: number) => {
  if (!Number.isSafeInteger(value)) {
    throw new Error(`${name} must be a safe integer. Received: ${String(value)}`);
  }
};

const assertRange = (lo: number, hi: number, size: number) => {
  assertSafeInteger("lo", lo);
  assertSafeInteger("hi", hi);
  if (!Number.isSafeInteger(size) || size < 1) {
    throw new Error(`size must be an integer >= 1. Received: ${String(size)}`);
  }
  if (hi < lo) {
    throw new Error(`hi must not be below lo. Received: [${lo}, ${hi})`);
  }
};

/**
 * Contiguous, disjoint batches of at most `size` keys covering `[lo, hi)`.
 */
export const rangeBatches = (lo: number, hi: number, size: number): KeyRange[] => {
  assertRange(lo, hi, size);

  const batches: KeyRange[] = [];
  for (let start = lo; start < hi; start += size) {
    batches.push({ lo: start, hi: Math.min(start + size, hi) });
  }
  return batches;
};

/**
 * Partitions of `size` keys covering `[lo, hi)`, numbered from `firstId`.
 */
export const partitionBounds = (lo: number, hi: number, size: number, firstId = 0): Partition[] =>
  rangeBatches(lo, hi, size).map((range, index) => ({ id: firstId + index, ...range }));
