export class StatementTimeoutError extends Error {
  readonly code = "statement_timeout";
  readonly timeoutMs: number;

  constructor(args: { timeoutMs: number; message?: string; cause?: unknown }) {
    super(args.message ?? `Statement exceeded its ${args.timeoutMs}ms deadline`, { cause: args.cause });
    this.name = "StatementTimeoutError";
    this.timeoutMs = args.timeoutMs;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const isStatementTimeout = (err: unknown): boolean => err instanceof StatementTimeoutError;
