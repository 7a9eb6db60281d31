// ToolRegistry: deferred tool registration, schema derivation, invocation routing
//
// register() is synchronous and only queues; materialize() asks the model for
// every queued callable's schema concurrently and publishes the results keyed
// by a hash of the callable's source text.

import type {
  CallableInfo,
  InvocationVariant,
  PendingRegistration,
  RegisterOptions,
  RegisteredTool,
} from "./types/tool";
import type { WorkerPool } from "./types/pool";
import type { Logger } from "./types/logger";
import { silentLogger, describeError } from "./types/logger";
import { type PoolKind, PoolNotInitializedError } from "./types/errors";
import type { LlmGateway } from "./llm-gateway";
import { describeCallable, moduleIdentifier, resolveCallerFile, UNKNOWN_SOURCE } from "./introspect";
import { generateId } from "./id";

export const DEFAULT_PREFIX = "/agent/v1";

/** The part of the gateway the registry needs. */
export type ToolDescriber = Pick<LlmGateway, "describeTool">;

export interface ToolRegistryOptions {
  readonly gateway: ToolDescriber;
  readonly logger?: Logger;
  /** Entry-point prefix. Default "/agent/v1". */
  readonly prefix?: string;
  /** Pools to attach up front. More can be attached later. */
  readonly pools?: readonly WorkerPool[];
}

function resolveVariant(info: CallableInfo, options: RegisterOptions): InvocationVariant {
  if (info.isAsync) return { kind: "direct" };
  // Built-ins have no source text to ship to a worker.
  if (info.isNative) return { kind: "inline" };
  const offload = options.offload ?? "thread";
  return offload === "none" ? { kind: "inline" } : { kind: "pooled", pool: offload };
}

function resolveSourceIdentifier(isNative: boolean, options: RegisterOptions, stack: string | undefined): string {
  if (options.source) return options.source;
  if (isNative) return UNKNOWN_SOURCE;
  const file = resolveCallerFile(stack);
  return file ? moduleIdentifier(file) : UNKNOWN_SOURCE;
}

export class ToolRegistry {
  readonly prefix: string;
  private readonly gateway: ToolDescriber;
  private readonly logger: Logger;
  private readonly pools = new Map<PoolKind, WorkerPool>();
  private pending: PendingRegistration[] = [];
  private registered = new Map<string, RegisteredTool>();

  constructor(options: ToolRegistryOptions) {
    this.gateway = options.gateway;
    this.logger = (options.logger ?? silentLogger).child({ component: "ToolRegistry" });
    this.prefix = options.prefix ?? DEFAULT_PREFIX;
    for (const pool of options.pools ?? []) this.attachPool(pool);
  }

  /** Published tools, keyed by code id. */
  get tools(): ReadonlyMap<string, RegisteredTool> {
    return this.registered;
  }

  get size(): number {
    return this.registered.size;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Queue `fn` for schema derivation and return its uniformly-async wrapper.
   *
   * Async functions are awaited where they are called. Synchronous ones run
   * on the pool named by `options.offload` (default "thread"), or inline with
   * "none"; built-ins always run inline. Pooled functions must be
   * self-contained: they are shipped to the worker as source text.
   *
   * Throws InvalidInputError when `fn` is not a function.
   */
  register<A extends unknown[], R>(
    fn: (...args: A) => R,
    options: RegisterOptions = {},
  ): (...args: A) => Promise<Awaited<R>> {
    const info = describeCallable(fn, options.name);
    const variant = resolveVariant(info, options);
    const sourceIdentifier = resolveSourceIdentifier(info.isNative, options, new Error().stack);

    const wrapped = this.bindInvoker(fn, variant);

    this.pending.push({ original: fn, wrapped, variant, options, sourceIdentifier });
    this.logger.debug("Tool queued", { name: info.name, variant: variant.kind, sourceIdentifier });

    return wrapped;
  }

  /**
   * Derive schemas for every queued callable and publish them.
   *
   * The queue is emptied up front whatever the outcome. Callables whose code
   * id is already published (or repeated in the batch) are skipped. All
   * derivations must succeed for any of them to be published.
   */
  async materialize(): Promise<ReadonlyMap<string, RegisteredTool>> {
    if (this.pending.length === 0) return this.registered;

    const batch = this.pending;
    this.pending = [];

    const seen = new Set<string>();
    const work: Array<{ entry: PendingRegistration; codeId: string }> = [];
    for (const entry of batch) {
      const codeId = generateId(describeCallable(entry.original, entry.options.name).source);
      if (this.registered.has(codeId) || seen.has(codeId)) continue;
      seen.add(codeId);
      work.push({ entry, codeId });
    }

    let built: RegisteredTool[];
    try {
      built = await Promise.all(work.map(({ entry, codeId }) => this.build(entry, codeId)));
    } catch (error) {
      this.logger.error("Tool materialization failed", { batch: batch.length, ...describeError(error) });
      throw error;
    }

    for (const tool of built) this.registered.set(tool.codeId, tool);
    this.logger.info("Tools materialized", {
      added: built.length,
      skipped: batch.length - built.length,
      total: this.registered.size,
    });
    return this.registered;
  }

  get(codeId: string): RegisteredTool | undefined {
    return this.registered.get(codeId);
  }

  /** First published tool whose schema carries `name`. */
  findByName(name: string): RegisteredTool | undefined {
    for (const tool of this.registered.values()) {
      if (tool.schema.name === name) return tool;
    }
    return undefined;
  }

  /** Drop everything: published tools and the pending queue. */
  clear(): void {
    this.registered = new Map();
    this.pending = [];
  }

  /** Route pooled invocations of `pool.kind` to `pool`. Replaces any pool of that kind. */
  attachPool(pool: WorkerPool): void {
    this.pools.set(pool.kind, pool);
    this.logger.debug("Pool attached", { pool: pool.kind, size: pool.size });
  }

  /** Stop routing to the pool of `kind`. The pool itself is left running. */
  detachPool(kind: PoolKind): WorkerPool | undefined {
    const pool = this.pools.get(kind);
    this.pools.delete(kind);
    return pool;
  }

  private async build(entry: PendingRegistration, codeId: string): Promise<RegisteredTool> {
    const schema = await this.gateway.describeTool(entry.original, {
      name: entry.options.name,
      description: entry.options.description,
    });

    return {
      invoke: entry.wrapped,
      source: entry.original,
      entryPoint: `${this.prefix}/${entry.sourceIdentifier}/${schema.name}`,
      codeId,
      variant: entry.variant,
      schema,
    };
  }

  private bindInvoker<A extends unknown[], R>(
    fn: (...args: A) => R,
    variant: InvocationVariant,
  ): (...args: A) => Promise<Awaited<R>> {
    if (variant.kind === "pooled") {
      const kind = variant.pool;
      return (...args: A) => this.runPooled(kind, fn, args);
    }
    // async: a synchronous throw becomes a rejection
    return async (...args: A): Promise<Awaited<R>> => await fn(...args);
  }

  private runPooled<R>(kind: PoolKind, fn: (...args: never) => R, args: readonly unknown[]): Promise<Awaited<R>> {
    const pool = this.pools.get(kind);
    if (!pool) return Promise.reject(new PoolNotInitializedError(kind));
    return pool.run(fn, args);
  }
}
