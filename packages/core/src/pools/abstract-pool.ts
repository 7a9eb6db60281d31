// Abstract bounded worker pool.
//
// Subclasses only know how to spawn one worker and talk to it; queueing,
// worker reuse, crash recovery and draining shutdown live here.

import type { WorkerPool } from "../types/pool";
import type { Logger } from "../types/logger";
import { silentLogger } from "../types/logger";
import { type PoolKind, PoolClosedError } from "../types/errors";

export interface TaskMessage {
  readonly id: number;
  readonly source: string;
  readonly args: readonly unknown[];
}

interface SerializedError {
  readonly name: string;
  readonly message: string;
  readonly stack?: string;
}

type ResultMessage =
  | { readonly id: number; readonly ok: true; readonly value: unknown }
  | { readonly id: number; readonly ok: false; readonly error: SerializedError };

/** Callbacks a spawned worker reports through. */
export interface WorkerEvents {
  onMessage(message: unknown): void;
  /** The worker is gone (crash, exit, spawn failure). May fire more than once. */
  onExit(error: Error): void;
}

export interface PoolWorkerHandle {
  send(message: TaskMessage): void;
  terminate(): Promise<void>;
}

interface PoolTask extends TaskMessage {
  readonly resolve: (value: unknown) => void;
  readonly reject: (error: Error) => void;
}

interface Slot {
  readonly handle: PoolWorkerHandle;
  task: PoolTask | null;
}

export interface PoolOptions {
  /** Maximum concurrent workers. */
  readonly size?: number;
  readonly logger?: Logger;
}

function isResultMessage(value: unknown): value is ResultMessage {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "number" &&
    "ok" in value &&
    typeof value.ok === "boolean"
  );
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function rebuildError(payload: SerializedError): Error {
  const error = new Error(payload.message);
  error.name = payload.name;
  if (payload.stack) error.stack = payload.stack;
  return error;
}

export abstract class AbstractWorkerPool implements WorkerPool {
  abstract readonly kind: PoolKind;
  readonly size: number;
  protected readonly logger: Logger;

  private readonly queue: PoolTask[] = [];
  private readonly slots = new Set<Slot>();
  private readonly idle: Slot[] = [];
  private nextId = 1;
  private closing = false;
  private shutdownPromise: Promise<void> | null = null;
  private drainWaiters: Array<() => void> = [];

  constructor(defaultSize: number, options: PoolOptions = {}) {
    this.size = Math.max(1, Math.floor(options.size ?? defaultSize));
    this.logger = options.logger ?? silentLogger;
  }

  protected abstract spawn(events: WorkerEvents): PoolWorkerHandle;

  get pending(): number {
    let busy = 0;
    for (const slot of this.slots) if (slot.task) busy++;
    return this.queue.length + busy;
  }

  get closed(): boolean {
    return this.closing;
  }

  get workerCount(): number {
    return this.slots.size;
  }

  run<R>(fn: (...args: never) => R, args: readonly unknown[]): Promise<Awaited<R>> {
    if (this.closing) {
      return Promise.reject(new PoolClosedError(this.kind));
    }

    const source = Function.prototype.toString.call(fn);
    return new Promise<Awaited<R>>((resolve, reject) => {
      this.queue.push({
        id: this.nextId++,
        source,
        args,
        // The worker echoes back whatever fn returned, structurally cloned.
        resolve: (value) => resolve(value as Awaited<R>),
        reject,
      });
      this.pump();
    });
  }

  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.closing = true;
      this.shutdownPromise = this.drainAndTerminate();
    }
    return this.shutdownPromise;
  }

  private async drainAndTerminate(): Promise<void> {
    if (this.pending > 0) {
      await new Promise<void>((resolve) => this.drainWaiters.push(resolve));
    }

    const handles = Array.from(this.slots, (slot) => slot.handle);
    this.slots.clear();
    this.idle.length = 0;
    await Promise.all(handles.map((h) => h.terminate()));
    this.logger.debug("Pool shut down", { pool: this.kind, workers: handles.length });
  }

  private pump(): void {
    while (this.queue.length > 0) {
      let slot = this.idle.pop();
      if (!slot && this.slots.size < this.size) {
        try {
          slot = this.createSlot();
        } catch (error) {
          this.queue.shift()?.reject(toError(error));
          continue;
        }
      }
      if (!slot) return;

      const task = this.queue.shift();
      if (!task) {
        this.idle.push(slot);
        return;
      }

      slot.task = task;
      try {
        slot.handle.send({ id: task.id, source: task.source, args: task.args });
      } catch (error) {
        slot.task = null;
        this.retire(slot, toError(error));
        task.reject(toError(error));
      }
    }
  }

  private createSlot(): Slot {
    let slot: Slot | undefined;
    const handle = this.spawn({
      onMessage: (message) => {
        if (slot) this.settle(slot, message);
      },
      onExit: (error) => {
        if (slot) this.retire(slot, error);
      },
    });
    slot = { handle, task: null };
    this.slots.add(slot);
    this.logger.debug("Spawned pool worker", { pool: this.kind, workers: this.slots.size });
    return slot;
  }

  private settle(slot: Slot, message: unknown): void {
    const task = slot.task;
    if (!task || !isResultMessage(message) || message.id !== task.id) {
      this.logger.warn("Discarding unexpected worker message", { pool: this.kind });
      return;
    }

    slot.task = null;
    this.idle.push(slot);

    if (message.ok) {
      task.resolve(message.value);
    } else {
      task.reject(rebuildError(message.error));
    }

    this.pump();
    this.notifyDrained();
  }

  private retire(slot: Slot, error: Error): void {
    if (!this.slots.delete(slot)) return;

    const idleIndex = this.idle.indexOf(slot);
    if (idleIndex !== -1) this.idle.splice(idleIndex, 1);

    const task = slot.task;
    slot.task = null;
    if (task) {
      this.logger.warn("Pool worker died mid-task", { pool: this.kind, error: error.message });
      task.reject(error);
    }

    this.pump();
    this.notifyDrained();
  }

  private notifyDrained(): void {
    if (!this.closing || this.pending > 0) return;
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
