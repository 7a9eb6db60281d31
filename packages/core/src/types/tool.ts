// Tool system types -- schemas, registrations, invocation

import type { PoolKind } from "./errors";

/** One parameter of a tool, as described by the model. */
export interface ToolParameter {
  readonly name: string;
  /** Semantic type tag ("string", "int", "list[int]", ...). */
  readonly type: string;
  readonly description: string;
  readonly required: boolean;
}

/**
 * Structured description of a tool, derived by the model from the
 * callable's name, signature and documentation (or source).
 */
export interface ToolSchema {
  readonly name: string;
  readonly description: string;
  /** Up to three tags, most relevant first. */
  readonly tags: readonly string[];
  readonly parameters: readonly ToolParameter[];
}

/** Any function the registry accepts. Arguments are never inspected here. */
export type ToolCallable = (...args: never) => unknown;

/**
 * Uniformly asynchronous entry point of a registered tool, with its argument
 * types erased. Declared with method syntax so the typed wrapper returned by
 * register() is stored as is.
 */
export interface ToolInvoker {
  invoke(...args: unknown[]): Promise<unknown>;
}

/**
 * Where a synchronous callable runs when invoked:
 * - "none": inline on the event loop
 * - "thread": worker thread pool (I/O-bound work)
 * - "process": child process pool (CPU-bound work)
 *
 * Async callables are always awaited directly.
 */
export type OffloadStrategy = "none" | PoolKind;

export interface RegisterOptions {
  /** Default "thread" for synchronous callables. Ignored for async ones. */
  readonly offload?: OffloadStrategy;
  /** Human documentation for the callable. When absent the source text is sent instead. */
  readonly description?: string;
  /** Name override, for anonymous functions. */
  readonly name?: string;
  /** Source identifier used in the entry point. Defaults to the registering module's file name. */
  readonly source?: string;
}

/** How a registered callable gets executed, resolved once at registration. */
export type InvocationVariant =
  | { readonly kind: "direct" }
  | { readonly kind: "inline" }
  | { readonly kind: "pooled"; readonly pool: PoolKind };

/** A registration waiting for materialize(). Consumed exactly once. */
export interface PendingRegistration {
  readonly original: ToolCallable;
  /** The same function register() returned to the caller. */
  wrapped(...args: unknown[]): Promise<unknown>;
  readonly variant: InvocationVariant;
  readonly options: RegisterOptions;
  /** Source identifier resolved at registration time. */
  readonly sourceIdentifier: string;
}

export interface RegisteredTool extends ToolInvoker {
  /** The original callable, kept for metadata only. */
  readonly source: ToolCallable;
  /** `{prefix}/{sourceIdentifier}/{schema.name}` */
  readonly entryPoint: string;
  /** Content hash of the callable's source text; the deduplication key. */
  readonly codeId: string;
  readonly variant: InvocationVariant;
  readonly schema: ToolSchema;
}

/** Parameter as parsed from a function's source text. */
export interface CallableParameter {
  readonly name: string;
  readonly required: boolean;
  readonly rest: boolean;
}

export interface CallableInfo {
  readonly name: string;
  readonly parameters: readonly CallableParameter[];
  /** `name(a, b = 2)` */
  readonly signature: string;
  readonly source: string;
  readonly isAsync: boolean;
  readonly isNative: boolean;
}

/** Function declaration sent to the model for function calling. */
export interface FunctionDeclaration {
  readonly name: string;
  readonly description: string;
  readonly parameters: {
    readonly type: "object";
    readonly properties: Record<string, { readonly type: string; readonly description: string }>;
    readonly required: readonly string[];
  };
}

/** A tool invocation requested by the model. */
export interface ToolCall {
  readonly id: string;
  readonly name: string;
  readonly args: Record<string, unknown>;
}
