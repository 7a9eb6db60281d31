// ThreadPool: runs synchronous tools on worker threads (I/O-bound work)

import { availableParallelism } from "node:os";
import { Worker } from "node:worker_threads";
import { AbstractWorkerPool, type PoolOptions, type PoolWorkerHandle, type WorkerEvents } from "./abstract-pool";
import { THREAD_WORKER_SOURCE } from "./worker-source";

export class ThreadPool extends AbstractWorkerPool {
  readonly kind = "thread" as const;

  constructor(options?: PoolOptions) {
    super(availableParallelism(), options);
  }

  protected spawn(events: WorkerEvents): PoolWorkerHandle {
    const worker = new Worker(THREAD_WORKER_SOURCE, { eval: true });

    worker.on("message", (message: unknown) => events.onMessage(message));
    worker.on("error", (error) => events.onExit(error));
    worker.on("exit", (code) => events.onExit(new Error(`Worker thread exited with code ${code}`)));

    return {
      send: (message) => worker.postMessage(message),
      terminate: async () => {
        await worker.terminate();
      },
    };
  }
}
