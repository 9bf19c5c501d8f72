import { Channel } from "../../shared/concurrency/channel";
import { KillSwitch } from "../../shared/concurrency/killSwitch";
import { consoleLog, type Log } from "../../shared/logging/logger";
import { SignalStore, type PoolSignals } from "../work/signals";
import { isStatementTimeout } from "../work/timeout";
import type { TimeoutClassifier, WorkItem } from "../work/workItem";
import { Supervisor, type Finalize, type SupervisorMessage } from "./supervisor";
import { runWorker, type WorkerFn } from "./worker";

export type PoolOptions<T extends WorkItem, P> = {
  name: string;
  workers: number;
  pending: Iterable<T>;
  workerFn: WorkerFn<T, P>;
  finalize?: Finalize<T, P>;
  isTimeout?: TimeoutClassifier;
  log?: Log;
};

export type PoolHandle<T extends WorkItem> = {
  name: string;
  signals: PoolSignals<T>;
  /** Stop dispatching, cancel pending work and drain what is in flight. Idempotent. */
  kill: () => void;
  /** Resolves once the supervisor and every worker have stopped. */
  joined: Promise<PoolSignals<T>>;
};

const noFollowUps = (): readonly never[] => [];

/**
 * Starts `workers` workers and one supervisor over `pending`. Returns right
 * away; all work happens asynchronously.
 * Usage:
 *   const pool = startPool({ name: "copy", workers: 4, pending, workerFn, finalize });
 *   const signals = await pool.joined;
 */
export const startPool = <T extends WorkItem, P>(options: PoolOptions<T, P>): PoolHandle<T> => {
  const { name, workers } = options;
  if (!Number.isInteger(workers) || workers < 1) {
    throw new Error("workers must be an integer >= 1");
  }

  const log = options.log ?? consoleLog;
  const signals = new SignalStore<T>(options.pending);
  const work = new Channel<T>();
  const inbox = new Channel<SupervisorMessage<T, P>>();
  const kill = new KillSwitch();

  log("info", { event: "pool.started", pool: name, workers, pending: signals.pending.length });

  const supervisor = new Supervisor<T, P>({
    pool: name,
    workers,
    signals,
    work,
    inbox,
    kill,
    finalize: options.finalize ?? noFollowUps,
    log
  });

  const threads = [supervisor.run()];
  for (let id = 0; id < workers; id += 1) {
    threads.push(
      runWorker<T, P>({
        pool: name,
        id,
        work,
        inbox,
        workerFn: options.workerFn,
        isTimeout: options.isTimeout ?? isStatementTimeout,
        log
      })
    );
  }

  const joined = Promise.all(threads).then((): PoolSignals<T> => {
    log("info", { event: "pool.joined", pool: name, status: signals.status });
    return signals;
  });

  return {
    name,
    signals,
    kill: () => {
      kill.close("external");
    },
    joined
  };
};
