import type { Channel } from "../../shared/concurrency/channel";
import type { KillReason, KillSwitch } from "../../shared/concurrency/killSwitch";
import type { Log } from "../../shared/logging/logger";
import type { FinalizeSignals, PoolStatus, SignalStore } from "../work/signals";
import type { Reply, WorkItem } from "../work/workItem";

/**
 * Follow-up work to append to the queue, or `false` when continuing would
 * be unsafe and the whole pool should wind down.
 */
export type FinalizeResult<T extends WorkItem> = readonly T[] | false;

export type Finalize<T extends WorkItem, P> = (
  reply: Reply<T, P>,
  signals: FinalizeSignals<T>
) => FinalizeResult<T>;

export type SupervisorMessage<T extends WorkItem, P> =
  | { type: "reply"; reply: Reply<T, P> }
  | { type: "kill"; reason: KillReason };

export type SupervisorDeps<T extends WorkItem, P> = {
  pool: string;
  workers: number;
  signals: SignalStore<T>;
  work: Channel<T>;
  inbox: Channel<SupervisorMessage<T, P>>;
  kill: KillSwitch;
  finalize: Finalize<T, P>;
  log: Log;
};

const finalStatus: Record<KillReason, PoolStatus> = {
  quiescent: "completed",
  external: "killed",
  unrecoverable: "aborted"
};

/**
 * Sole writer of the pool's signals. Everything it reacts to (worker
 * replies, kill notifications) arrives through one FIFO mailbox, so events
 * are handled one at a time in arrival order.
 */
export class Supervisor<T extends WorkItem, P> {
  private stopping = false;
  private finalizing = true;

  constructor(private readonly deps: SupervisorDeps<T, P>) {
    deps.kill.onClose((reason) => {
      deps.inbox.send({ type: "kill", reason });
    });
  }

  async run(): Promise<void> {
    const { pool, signals, inbox, work, kill, log } = this.deps;
    log("info", { event: "supervisor.started", pool, pending: signals.pending.length });

    try {
      while (true) {
        // Nothing new goes out once the switch is closed, even before its message arrives.
        if (!this.stopping && !kill.isClosed) {
          this.dispatch();

          if (signals.pending.length === 0 && signals.inFlight === 0) {
            log("info", { event: "supervisor.no_more_work", pool, landed: signals.landed });
            kill.close("quiescent");
          }
        }

        if (this.stopping && signals.inFlight === 0) break;

        const message = await inbox.receive();
        if (message.done) break;

        if (message.value.type === "kill") {
          this.beginShutdown(message.value.reason);
        } else {
          this.land(message.value.reply);
        }
      }
    } finally {
      inbox.close();
      work.close();
    }

    signals.setStatus(finalStatus[kill.reason ?? "external"]);
    log("info", {
      event: "supervisor.stopped",
      pool,
      status: signals.status,
      landed: signals.landed,
      failed: signals.failed.length,
      cancelled: signals.cancelled.length
    });
  }

  private dispatch(): void {
    const { workers, signals, work } = this.deps;
    while (signals.inFlight < workers) {
      const next = signals.dispatchNext();
      if (next === undefined) return;
      work.send(next);
    }
  }

  private beginShutdown(reason: KillReason): void {
    if (this.stopping) return;
    const { pool, signals, work, log } = this.deps;

    this.stopping = true;
    signals.setStatus("stopping");
    const cancelled = signals.cancelPending();
    work.close();

    log(reason === "quiescent" ? "info" : "warn", {
      event: "supervisor.shutting_down",
      pool,
      reason,
      inFlight: signals.inFlight,
      cancelled
    });
  }

  private land(reply: Reply<T, P>): void {
    const { pool, signals, kill, finalize, log } = this.deps;
    signals.land();

    if (reply.outcome.status !== "success") {
      log("warn", {
        event: "supervisor.work_unsuccessful",
        pool,
        label: reply.item.label,
        status: reply.outcome.status,
        retries: reply.item.retries,
        timeoutMs: reply.item.timeoutMs,
        error: reply.outcome.status === "error" ? reply.outcome.error : undefined
      });
    }

    if (!this.finalizing) {
      signals.recordFailure(reply);
      return;
    }

    let followUps: FinalizeResult<T>;
    try {
      followUps = finalize(reply, signals);
    } catch (err) {
      signals.setError(err);
      log("error", { event: "supervisor.finalize_failed", pool, label: reply.item.label, error: err });
      followUps = false;
    }

    if (followUps === false) {
      signals.recordFailure(reply);
      this.finalizing = false;
      log("error", { event: "supervisor.unrecoverable", pool, label: reply.item.label });
      kill.close("unrecoverable");
      return;
    }

    // Nothing to follow an unsuccessful attempt means its budget is spent.
    if (followUps.length === 0) {
      signals.recordFailure(reply);
      return;
    }

    if (this.stopping) {
      signals.enqueueCancelled(followUps);
    } else {
      signals.enqueue(followUps);
    }
  }
}
