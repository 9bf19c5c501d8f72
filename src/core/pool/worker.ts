import type { Channel } from "../../shared/concurrency/channel";
import type { Log } from "../../shared/logging/logger";
import { settle, type Reply, type TimeoutClassifier, type WorkItem } from "../work/workItem";
import type { SupervisorMessage } from "./supervisor";

export type WorkerFn<T extends WorkItem, P> = (item: T) => Promise<P>;

export type WorkerDeps<T extends WorkItem, P> = {
  pool: string;
  id: number;
  work: Channel<T>;
  inbox: Channel<SupervisorMessage<T, P>>;
  workerFn: WorkerFn<T, P>;
  isTimeout: TimeoutClassifier;
  log: Log;
};

/**
 * Pulls work until the work channel is closed and drained, replying to the
 * supervisor once per item.
 */
export const runWorker = async <T extends WorkItem, P>(deps: WorkerDeps<T, P>): Promise<void> => {
  const { pool, id, work, inbox, workerFn, isTimeout, log } = deps;
  log("info", { event: "worker.started", pool, worker: id });

  while (true) {
    const next = await work.receive();
    if (next.done) break;

    const item = next.value;
    const outcome = await settle(() => workerFn(item), isTimeout);
    const reply: Reply<T, P> = { item, outcome };

    if (!inbox.send({ type: "reply", reply })) {
      log("warn", { event: "worker.reply_dropped", pool, worker: id, label: item.label });
    }
  }

  log("info", { event: "worker.stopped", pool, worker: id });
};
