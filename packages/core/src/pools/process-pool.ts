// ProcessPool: runs synchronous tools in child Node processes (CPU-bound work).
// Messages cross the IPC channel with structured-clone ("advanced") serialization.

import { spawn, type ChildProcess } from "node:child_process";
import { availableParallelism } from "node:os";
import { AbstractWorkerPool, type PoolOptions, type PoolWorkerHandle, type WorkerEvents } from "./abstract-pool";
import { PROCESS_WORKER_SOURCE } from "./worker-source";

function exited(child: ChildProcess): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

export class ProcessPool extends AbstractWorkerPool {
  readonly kind = "process" as const;

  constructor(options?: PoolOptions) {
    const cpus = availableParallelism();
    super(cpus >= 2 ? cpus - 1 : 1, options);
  }

  protected spawn(events: WorkerEvents): PoolWorkerHandle {
    const child = spawn(process.execPath, ["-e", PROCESS_WORKER_SOURCE], {
      stdio: ["ignore", "inherit", "inherit", "ipc"],
      serialization: "advanced",
    });

    child.on("message", (message: unknown) => events.onMessage(message));
    child.on("error", (error) => events.onExit(error));
    child.on("exit", (code, signal) =>
      events.onExit(new Error(`Worker process exited with ${signal ?? `code ${code}`}`)),
    );

    return {
      send: (message) => {
        child.send(message);
      },
      terminate: () =>
        new Promise<void>((resolve) => {
          if (exited(child)) {
            resolve();
            return;
          }
          child.once("exit", () => resolve());
          child.kill();
        }),
    };
  }
}
