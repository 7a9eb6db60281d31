// LlmGateway: the single funnel for every language-model request.
//
// Owns the retry policy (exponential backoff, 2^n × unit), turns refusals and
// token-limit failures into RefusalError (never retried), and validates
// structured output against a zod-backed shape before handing it back.

import type { ChatTransport, ChatCompletion, ChatChoice, ChatRequest } from "./types/transport";
import type { AssistantMessage, ChatInput, ChatMessage } from "./types/message";
import type { FunctionDeclaration, ToolCall, ToolSchema } from "./types/tool";
import type { Logger } from "./types/logger";
import { silentLogger, describeError } from "./types/logger";
import { RefusalError, TokenLimitError, TransientGatewayError } from "./types/errors";
import type { StructuredShape } from "./schemas";
import { TOOL_SCHEMA_SHAPE } from "./schemas";
import { describeCallable } from "./introspect";
import {
  CODE_SUMMARY_INSTRUCTION,
  STRUCTURED_OUTPUT_INSTRUCTION,
  TOOL_CALLING_INSTRUCTION,
  buildFunctionPrompt,
} from "./prompts";

export interface GatewayModels {
  /** Used for tool description and as the structured-output default. */
  readonly describe: string;
  readonly plan: string;
  readonly embedding: string;
}

export const DEFAULT_MODELS: GatewayModels = {
  describe: "openai/gpt-4o-mini",
  plan: "openai/gpt-4o-2024-11-20",
  embedding: "openai/text-embedding-ada-002",
};

export interface LlmGatewayOptions {
  readonly transport: ChatTransport;
  readonly logger?: Logger;
  /** Attempts per retried request. Default 3. */
  readonly maxAttempts?: number;
  /** Backoff after failed attempt n is 2^n × this. Default 1000. */
  readonly backoffUnitMs?: number;
  /** Injectable for tests. */
  readonly sleep?: (ms: number) => Promise<void>;
  readonly models?: Partial<GatewayModels>;
}

export interface GatewayRequestOptions {
  readonly model?: string;
  readonly maxTokens?: number;
  readonly maxAttempts?: number;
  readonly signal?: AbortSignal;
}

export interface DescribeToolHints {
  /** Overrides the function's own name. */
  readonly name?: string;
  /** Documentation; the source text is sent when absent. */
  readonly description?: string;
  readonly model?: string;
  readonly signal?: AbortSignal;
}

export type FunctionCallOutcome =
  | { readonly kind: "tool_calls"; readonly toolCalls: readonly ToolCall[] }
  | { readonly kind: "message"; readonly content: string | null };

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toMessages(input: ChatInput, system?: string): ChatMessage[] {
  if (typeof input === "string") {
    const user: ChatMessage = { role: "user", content: input };
    return system ? [{ role: "system", content: system }, user] : [user];
  }
  return [...input];
}

function firstChoice(completion: ChatCompletion): ChatChoice {
  const choice = completion.choices[0];
  if (!choice) {
    throw new TransientGatewayError("No choices in the completion response", "no_output");
  }
  return choice;
}

/** Refusals and truncated completions end the request; nothing else is decided here. */
function assertAnswered(choice: ChatChoice): AssistantMessage {
  if (choice.message.refusal) {
    throw new RefusalError(choice.message.refusal);
  }
  if (choice.finishReason === "length") {
    throw new RefusalError("Too many tokens: the completion reached its max_tokens limit");
  }
  return choice.message;
}

/** Function-calling declaration for a tool schema. */
export function toFunctionDeclaration(schema: ToolSchema): FunctionDeclaration {
  const properties: Record<string, { type: string; description: string }> = {};
  for (const param of schema.parameters) {
    properties[param.name] = { type: param.type, description: param.description };
  }
  return {
    name: schema.name,
    description: schema.description,
    parameters: {
      type: "object",
      properties,
      required: schema.parameters.filter((p) => p.required).map((p) => p.name),
    },
  };
}

export class LlmGateway {
  readonly models: GatewayModels;
  private readonly transport: ChatTransport;
  private readonly logger: Logger;
  private readonly maxAttempts: number;
  private readonly backoffUnitMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: LlmGatewayOptions) {
    this.transport = options.transport;
    this.logger = (options.logger ?? silentLogger).child({ component: "LlmGateway" });
    this.maxAttempts = options.maxAttempts ?? 3;
    this.backoffUnitMs = options.backoffUnitMs ?? 1000;
    this.sleep = options.sleep ?? defaultSleep;
    this.models = { ...DEFAULT_MODELS, ...options.models };
  }

  /**
   * Ask for a payload matching `shape`. A bare string is sent as the user
   * message under the default JSON-assistant system prompt.
   *
   * Retries everything except refusals; the last error is rethrown as is.
   */
  async requestStructuredOutput<T>(
    input: ChatInput,
    shape: StructuredShape<T>,
    options: GatewayRequestOptions = {},
  ): Promise<T> {
    const request: ChatRequest = {
      messages: toMessages(input, STRUCTURED_OUTPUT_INSTRUCTION),
      model: options.model ?? this.models.describe,
      maxTokens: options.maxTokens,
      responseFormat: { name: shape.name, schema: shape.jsonSchema },
      signal: options.signal,
    };

    return this.withRetry(`structured:${shape.name}`, options, async () => {
      const message = assertAnswered(firstChoice(await this.complete(request)));
      if (!message.content) {
        throw new TransientGatewayError("No structured output found in the completion response", "no_output");
      }

      let payload: unknown;
      try {
        payload = JSON.parse(message.content);
      } catch (cause) {
        throw new TransientGatewayError("Structured output is not valid JSON", "no_output", cause);
      }

      const decoded = shape.decode(payload);
      if (!decoded.ok) {
        throw new TransientGatewayError(
          `Structured output does not match ${shape.name}: ${decoded.error.message}`,
          "no_output",
          decoded.error,
        );
      }
      return decoded.value;
    });
  }

  /** Plain completion, single attempt. */
  async requestChat(input: ChatInput, options: GatewayRequestOptions = {}): Promise<AssistantMessage> {
    const completion = await this.complete({
      messages: toMessages(input),
      model: options.model ?? this.models.describe,
      maxTokens: options.maxTokens,
      signal: options.signal,
    });
    const choice = firstChoice(completion);
    if (choice.finishReason === "length") {
      throw new RefusalError("Too many tokens: the completion reached its max_tokens limit");
    }
    return choice.message;
  }

  /** Single attempt; transport errors propagate unchanged. */
  requestEmbedding(text: string, options: Pick<GatewayRequestOptions, "model" | "signal"> = {}): Promise<number[]> {
    return this.transport.embed(text, options.model ?? this.models.embedding, options.signal);
  }

  /**
   * Offer `tools` to the model under the tool-calling instruction. Same retry
   * policy as structured output.
   */
  async requestFunctionCall(
    input: ChatInput,
    tools: readonly ToolSchema[],
    options: GatewayRequestOptions = {},
  ): Promise<FunctionCallOutcome> {
    const request: ChatRequest = {
      messages: [{ role: "system", content: TOOL_CALLING_INSTRUCTION }, ...toMessages(input)],
      model: options.model ?? this.models.describe,
      maxTokens: options.maxTokens,
      tools: tools.map(toFunctionDeclaration),
      toolChoice: "auto",
      signal: options.signal,
    };

    return this.withRetry<FunctionCallOutcome>("function_call", options, async () => {
      const message = assertAnswered(firstChoice(await this.complete(request)));
      if (message.toolCalls && message.toolCalls.length > 0) {
        return { kind: "tool_calls", toolCalls: message.toolCalls };
      }
      return { kind: "message", content: message.content };
    });
  }

  /** Derive a ToolSchema for `fn` from its name, signature and docs or source. */
  describeTool(fn: unknown, hints: DescribeToolHints = {}): Promise<ToolSchema> {
    const info = describeCallable(fn, hints.name);
    const prompt = buildFunctionPrompt({
      name: info.name,
      signature: info.signature,
      docstring: hints.description,
      source: info.source,
    });

    return this.requestStructuredOutput(
      [
        { role: "system", content: CODE_SUMMARY_INSTRUCTION },
        { role: "user", content: prompt },
      ],
      TOOL_SCHEMA_SHAPE,
      { model: hints.model ?? this.models.describe, signal: hints.signal },
    );
  }

  private async complete(request: ChatRequest): Promise<ChatCompletion> {
    try {
      return await this.transport.complete(request);
    } catch (error) {
      if (error instanceof TokenLimitError) {
        throw new RefusalError(`Too many tokens: ${error.message}`, error);
      }
      throw error;
    }
  }

  private async withRetry<T>(
    operation: string,
    options: GatewayRequestOptions,
    attemptOnce: () => Promise<T>,
  ): Promise<T> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? this.maxAttempts);

    for (let attempt = 1; ; attempt++) {
      try {
        return await attemptOnce();
      } catch (error) {
        if (error instanceof RefusalError || options.signal?.aborted) throw error;

        if (attempt >= maxAttempts) {
          this.logger.warn("Model request failed, giving up", {
            operation,
            attempt,
            maxAttempts,
            ...describeError(error),
          });
          throw error;
        }

        const delayMs = 2 ** attempt * this.backoffUnitMs;
        this.logger.warn("Model request failed, retrying", {
          operation,
          attempt,
          maxAttempts,
          delayMs,
          ...describeError(error),
        });
        await this.sleep(delayMs);
      }
    }
  }
}
