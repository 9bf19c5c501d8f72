import type { Finalize, FinalizeResult } from "../pool/supervisor";
import type { FinalizeSignals } from "../work/signals";
import { isSuccessReply, type KeyRange, type SuccessReply, type WorkItem } from "../work/workItem";

export type DeadlineEscalation = {
  incrementMs: number;   // added to the deadline after every timeout; 0 disables escalation
  maxTimeoutMs?: number; // optional ceiling; unset means escalate indefinitely
};

export type SuccessHandler<T extends WorkItem, P> = (
  reply: SuccessReply<T, P>,
  signals: FinalizeSignals<T>
) => FinalizeResult<T>;

export type PolicyOptions<T extends WorkItem, P> = {
  escalation: DeadlineEscalation;
  onSuccess?: SuccessHandler<T, P>;
};

/**
 * Bounded retry: one follow-up with the budget decremented, or none once
 * the decremented budget would be negative.
 */
export const retryOnError = <T extends WorkItem>(item: T): T[] => {
  const retries = item.retries - 1;
  return retries < 0 ? [] : [{ ...item, retries }];
};

/**
 * Retry the same work with a longer deadline. DDL on a single partition is
 * a fixed-size operation, so given enough time it is expected to finish.
 */
export const escalateDeadline = <T extends WorkItem>(item: T, escalation: DeadlineEscalation): T[] => {
  if (escalation.incrementMs <= 0) return [];

  const timeoutMs = item.timeoutMs + escalation.incrementMs;
  if (escalation.maxTimeoutMs != null && timeoutMs > escalation.maxTimeoutMs) return [];

  return [{ ...item, timeoutMs }];
};

/**
 * Halve a range that timed out. A unit range cannot be split further and
 * falls back to deadline escalation with the same bounds.
 */
export const splitRange = <T extends WorkItem & KeyRange>(item: T, escalation: DeadlineEscalation): T[] => {
  if (item.hi - item.lo <= 1) return escalateDeadline(item, escalation);

  const mid = item.lo + Math.floor((item.hi - item.lo) / 2);
  return [
    { ...item, hi: mid },
    { ...item, lo: mid }
  ];
};

/** Finalize for DDL-style work: escalate deadlines, bounded retry on error. */
export const deadlineEscalationPolicy =
  <T extends WorkItem, P>(options: PolicyOptions<T, P>): Finalize<T, P> =>
  (reply, signals) => {
    if (isSuccessReply(reply)) return options.onSuccess?.(reply, signals) ?? [];
    if (reply.outcome.status === "timeout") return escalateDeadline(reply.item, options.escalation);
    return retryOnError(reply.item);
  };

/** Finalize for bulk copies over `[lo, hi)`: split on timeout, bounded retry on error. */
export const rangeSplittingPolicy =
  <T extends WorkItem & KeyRange, P>(options: PolicyOptions<T, P>): Finalize<T, P> =>
  (reply, signals) => {
    if (isSuccessReply(reply)) return options.onSuccess?.(reply, signals) ?? [];
    if (reply.outcome.status === "timeout") return splitRange(reply.item, options.escalation);
    return retryOnError(reply.item);
  };
