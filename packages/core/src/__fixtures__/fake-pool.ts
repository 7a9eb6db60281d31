// Test fixture: WorkerPool that runs tasks on the calling thread and records them

import type { PoolKind, WorkerPool } from "../types";
import { PoolClosedError } from "../types";

export class FakePool implements WorkerPool {
  readonly size = 1;
  public runs: Array<{ source: string; args: readonly unknown[] }> = [];
  public shutdownCalls = 0;
  private isClosed = false;

  constructor(readonly kind: PoolKind) {}

  get pending(): number {
    return 0;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  async run<R>(fn: (...args: never) => R, args: readonly unknown[]): Promise<Awaited<R>> {
    if (this.isClosed) throw new PoolClosedError(this.kind);
    this.runs.push({ source: String(fn), args });
    return Reflect.apply(fn, undefined, args);
  }

  async shutdown(): Promise<void> {
    this.shutdownCalls++;
    this.isClosed = true;
  }
}
