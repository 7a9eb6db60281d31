// Transport contract: the abstract request/response shape the gateway talks to.
// Wire details (URLs, headers, vendor JSON) belong to the transport implementation.

import type { AssistantMessage, ChatMessage } from "./message";
import type { FunctionDeclaration } from "./tool";

export interface ResponseFormat {
  /** Name of the target shape, e.g. "ToolSchema". */
  readonly name: string;
  /** JSON Schema the payload must conform to. */
  readonly schema: Record<string, unknown>;
}

export interface ChatRequest {
  readonly messages: readonly ChatMessage[];
  readonly model: string;
  readonly maxTokens?: number;
  readonly responseFormat?: ResponseFormat;
  readonly tools?: readonly FunctionDeclaration[];
  /** Constrain tool usage: "auto" (default), "none" (force text), or "required" (force tool call) */
  readonly toolChoice?: "auto" | "none" | "required";
  readonly signal?: AbortSignal;
}

export interface ChatChoice {
  readonly message: AssistantMessage;
  /** "stop", "length", "tool_calls", ... as reported by the provider. */
  readonly finishReason: string | null;
}

export interface ChatCompletion {
  readonly choices: readonly ChatChoice[];
}

/**
 * Failure signals a transport may raise:
 * - TokenLimitError when the request exceeds the model's context or output budget
 * - anything else (TransientGatewayError for classified provider failures)
 *
 * Refusals are not thrown; they arrive as `message.refusal` on a choice.
 */
export interface ChatTransport {
  readonly name: string;
  complete(request: ChatRequest): Promise<ChatCompletion>;
  embed(input: string, model: string, signal?: AbortSignal): Promise<number[]>;
}
