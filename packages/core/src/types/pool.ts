// Worker pool contract -- externally owned, injected into the registry

import type { PoolKind } from "./errors";

export interface WorkerPool {
  readonly kind: PoolKind;
  /** Maximum number of concurrent workers. */
  readonly size: number;
  /** Tasks queued or running. */
  readonly pending: number;
  readonly closed: boolean;
  /**
   * Run `fn(...args)` on a worker. The function travels as source text and
   * must be self-contained; args and result must survive serialization.
   */
  run<R>(fn: (...args: never) => R, args: readonly unknown[]): Promise<Awaited<R>>;
  /** Stop accepting work, wait for queued and in-flight tasks, then release workers. */
  shutdown(): Promise<void>;
}
