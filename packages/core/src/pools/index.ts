export { AbstractWorkerPool, type PoolOptions, type PoolWorkerHandle, type WorkerEvents, type TaskMessage } from "./abstract-pool";
export { ThreadPool } from "./thread-pool";
export { ProcessPool } from "./process-pool";
