// Error types and Result monad for explicit error handling

export type Result<T, E = ToolplanError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export type PoolKind = "thread" | "process";

/**
 * Normalized failure categories for the language-model transport.
 * Assigned by the transport when it classifies an error.
 */
export type GatewayErrorCode =
  | "throttled"
  | "auth_failed"
  | "invalid_request"
  | "context_length_exceeded"
  | "transient_network"
  | "no_output"
  | "cancelled"
  | "unknown";

export class ToolplanError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ToolplanError";
  }
}

/** A value that must be callable was not. */
export class InvalidInputError extends ToolplanError {
  constructor(message: string) {
    super(message, "INVALID_INPUT");
    this.name = "InvalidInputError";
  }
}

/** A pooled tool was invoked before its pool was attached. */
export class PoolNotInitializedError extends ToolplanError {
  constructor(public readonly pool: PoolKind) {
    super(`${pool === "thread" ? "Thread" : "Process"} pool not initialized`, "POOL_NOT_INITIALIZED");
    this.name = "PoolNotInitializedError";
  }
}

export class PoolClosedError extends ToolplanError {
  constructor(public readonly pool: PoolKind) {
    super(`${pool === "thread" ? "Thread" : "Process"} pool has been shut down`, "POOL_CLOSED");
    this.name = "PoolClosedError";
  }
}

/** The model declined the request, or the request blew its token budget. Never retried. */
export class RefusalError extends ToolplanError {
  constructor(public readonly reason: string, cause?: unknown) {
    super(`Refusal error occurred: ${reason}`, "REFUSAL", cause);
    this.name = "RefusalError";
  }
}

/** Raised by transports when a request exceeds the model's token limit. */
export class TokenLimitError extends ToolplanError {
  constructor(message: string, cause?: unknown) {
    super(message, "TOKEN_LIMIT", cause);
    this.name = "TokenLimitError";
  }
}

export class TransientGatewayError extends ToolplanError {
  constructor(
    message: string,
    public readonly providerCode: GatewayErrorCode = "unknown",
    cause?: unknown,
  ) {
    super(message, "GATEWAY_ERROR", cause);
    this.name = "TransientGatewayError";
  }
}

export class PlanGenerationError extends ToolplanError {
  constructor(message: string, cause?: unknown) {
    super(message, "PLAN_GENERATION", cause);
    this.name = "PlanGenerationError";
  }
}

export class ConfigError extends ToolplanError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.name = "ConfigError";
  }
}
