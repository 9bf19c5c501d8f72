/**
 * Orchestration metadata every unit of work carries. Drivers extend it
 * with a `job` tag and their own parameters; follow-up work is always a
 * copy with updated metadata, never a mutation.
 */
export type WorkItem = {
  label: string;
  retries: number;   // remaining retries after this attempt (e.g. 3 means up to 4 attempts)
  timeoutMs: number; // statement deadline for this attempt
};

/** Half-open key range `[lo, hi)`. */
export type KeyRange = {
  lo: number;
  hi: number;
};

export type Outcome<P> =
  | { status: "success"; payload: P }
  | { status: "timeout" }
  | { status: "error"; error: unknown };

export type Reply<T extends WorkItem, P> = {
  item: T;
  outcome: Outcome<P>;
};

export type SuccessReply<T extends WorkItem, P> = {
  item: T;
  outcome: Extract<Outcome<P>, { status: "success" }>;
};

export const isSuccessReply = <T extends WorkItem, P>(reply: Reply<T, P>): reply is SuccessReply<T, P> =>
  reply.outcome.status === "success";

export type TimeoutClassifier = (err: unknown) => boolean;

/**
 * Runs one unit of work and tags its result. Nothing thrown by `fn`
 * escapes: deadline failures become `timeout`, everything else `error`.
 */
export const settle = async <P>(fn: () => Promise<P>, isTimeout: TimeoutClassifier): Promise<Outcome<P>> => {
  try {
    return { status: "success", payload: await fn() };
  } catch (err) {
    if (isTimeout(err)) return { status: "timeout" };
    return { status: "error", error: err };
  }
};

export const describeRange = (range: KeyRange): string => `[${range.lo}, ${range.hi})`;
