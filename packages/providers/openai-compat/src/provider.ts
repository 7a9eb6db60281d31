// OpenAICompatibleTransport: ChatTransport over any OpenAI-style HTTP API
// (OpenAI itself, OpenRouter, LM Studio, llamacpp).
//
// Handles:
//   • Base URL normalization (with or without /v1, full endpoint URLs)
//   • Structured-output and function-calling request fields
//   • Tolerant response parsing
//   • Unified error classification

import { z } from "zod";
import type { ChatChoice, ChatCompletion, ChatMessage, ChatRequest, ChatTransport } from "@toolplan/core";
import { TokenLimitError, TransientGatewayError } from "@toolplan/core";
import {
  type WireChatRequest,
  type WireChatResponse,
  type WireMessage,
  WireChatResponseSchema,
  WireEmbeddingResponseSchema,
} from "./wire";
import { buildErrorHint, classifyHttpFailure, classifyNetworkError } from "./errors";

// ── Config ───────────────────────────────────────────────────────────────────

export interface OpenAICompatibleConfig {
  /** Name used in error messages. Default "openai". */
  readonly name?: string;
  /**
   * Base URL for the API. Accepts any of:
   *   http://127.0.0.1:8080
   *   http://127.0.0.1:8080/v1
   *   http://127.0.0.1:8080/v1/chat/completions   (trailing endpoint stripped)
   * All are normalized to http://127.0.0.1:8080/v1 internally.
   */
  readonly baseUrl: string;
  /** API key. If empty/undefined, the Authorization header is omitted. */
  readonly apiKey?: string;
  /** Extra headers merged into every request (e.g. HTTP-Referer for OpenRouter). */
  readonly extraHeaders?: Record<string, string>;
}

// ── Helpers ──────────────────────────────────────────────────────────────────

export function normalizeBaseUrl(raw: string): string {
  let url = raw.replace(/\/+$/, "");
  // Strip full endpoint path if user pasted the complete URL
  url = url.replace(/\/(chat\/completions|embeddings)$/, "");
  if (!url.endsWith("/v1")) url += "/v1";
  return url;
}

function toWireMessage(message: ChatMessage): WireMessage {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "tool":
      return { role: "tool", tool_call_id: message.toolCallId ?? "", content: message.content };
    default:
      return { role: "user", content: message.content };
  }
}

export function toWireRequest(request: ChatRequest): WireChatRequest {
  const body: WireChatRequest = {
    model: request.model,
    messages: request.messages.map(toWireMessage),
  };

  if (request.maxTokens !== undefined) body.max_tokens = request.maxTokens;

  if (request.responseFormat) {
    body.response_format = {
      type: "json_schema",
      json_schema: { name: request.responseFormat.name, schema: request.responseFormat.schema, strict: true },
    };
  }

  if (request.tools && request.tools.length > 0) {
    body.tools = request.tools.map((t) => ({
      type: "function",
      function: { name: t.name, description: t.description, parameters: t.parameters },
    }));
    if (request.toolChoice) body.tool_choice = request.toolChoice;
  }

  return body;
}

const ArgumentsSchema = z.record(z.string(), z.unknown());

/** Tool-call arguments arrive as a JSON string; anything but an object becomes `{}`. */
function parseArguments(raw: string): Record<string, unknown> {
  let value: unknown;
  try {
    value = JSON.parse(raw || "{}");
  } catch {
    // emit with empty args rather than dropping the tool call
    return {};
  }
  const parsed = ArgumentsSchema.safeParse(value);
  return parsed.success ? parsed.data : {};
}

function toChoice(choice: WireChatResponse["choices"][number]): ChatChoice {
  const message = choice.message;
  const toolCalls = (message?.tool_calls ?? []).map((tc) => ({
    id: tc.id,
    name: tc.function.name,
    args: parseArguments(tc.function.arguments),
  }));

  return {
    message: {
      content: message?.content ?? null,
      refusal: message?.refusal ?? null,
      ...(toolCalls.length > 0 && { toolCalls }),
    },
    finishReason: choice.finish_reason ?? null,
  };
}

// ── Transport ────────────────────────────────────────────────────────────────

export class OpenAICompatibleTransport implements ChatTransport {
  readonly name: string;
  readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly extraHeaders: Record<string, string>;

  constructor(config: OpenAICompatibleConfig) {
    this.name = config.name ?? "openai";
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.apiKey = config.apiKey ?? "";
    this.extraHeaders = config.extraHeaders ?? {};
  }

  async complete(request: ChatRequest): Promise<ChatCompletion> {
    const payload = await this.post("/chat/completions", toWireRequest(request), request.signal);
    const parsed = WireChatResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TransientGatewayError(`${this.name} returned a malformed completion`, "no_output", parsed.error);
    }
    return { choices: parsed.data.choices.map(toChoice) };
  }

  async embed(input: string, model: string, signal?: AbortSignal): Promise<number[]> {
    const payload = await this.post("/embeddings", { model, input }, signal);
    const parsed = WireEmbeddingResponseSchema.safeParse(payload);
    const first = parsed.success ? parsed.data.data[0] : undefined;
    if (!first) {
      throw new TransientGatewayError(
        `${this.name} returned no embedding`,
        "no_output",
        parsed.success ? undefined : parsed.error,
      );
    }
    return first.embedding;
  }

  private async post(path: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      ...this.extraHeaders,
    };
    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }

    let response: Response;
    let text: string;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal,
      });
      text = await response.text();
    } catch (err) {
      throw this.networkError(err);
    }

    if (!response.ok) {
      throw this.httpError(response.status, text);
    }

    try {
      return JSON.parse(text);
    } catch (err) {
      throw new TransientGatewayError(`${this.name} returned a non-JSON body`, "no_output", err);
    }
  }

  private httpError(status: number, body: string): TokenLimitError | TransientGatewayError {
    const code = classifyHttpFailure(status, body);
    const message = `${this.name} API error: Status ${status}\nBody: ${body}`;
    if (code === "context_length_exceeded") {
      return new TokenLimitError(message);
    }
    return new TransientGatewayError(message, code);
  }

  private networkError(err: unknown): TransientGatewayError {
    const code = classifyNetworkError(err);
    const message = err instanceof Error ? err.message : String(err);
    const hint = buildErrorHint(code, this.name, this.baseUrl);
    return new TransientGatewayError(`${this.name} error: ${message}${hint}`, code, err);
  }
}
