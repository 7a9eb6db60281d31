// Wire types for the OpenAI-compatible Chat Completions and Embeddings APIs (snake_case).

import { z } from "zod";

export interface WireToolDef {
  type: "function";
  function: { name: string; description: string; parameters: Record<string, unknown> };
}

export interface WireToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

export type WireMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string | null }
  | { role: "tool"; tool_call_id: string; content: string };

export interface WireResponseFormat {
  type: "json_schema";
  json_schema: { name: string; schema: Record<string, unknown>; strict: boolean };
}

export interface WireChatRequest {
  model: string;
  messages: WireMessage[];
  max_tokens?: number;
  response_format?: WireResponseFormat;
  tools?: WireToolDef[];
  tool_choice?: "auto" | "none" | "required";
}

// Responses are validated rather than trusted: "compatible" servers vary in
// which fields they omit.

const WireToolCallSchema = z.object({
  id: z.string(),
  type: z.literal("function").optional(),
  function: z.object({ name: z.string(), arguments: z.string().default("") }),
});

export const WireChatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullish(),
            refusal: z.string().nullish(),
            tool_calls: z.array(WireToolCallSchema).nullish(),
          })
          .optional(),
        finish_reason: z.string().nullish(),
      }),
    )
    .default([]),
});

export type WireChatResponse = z.output<typeof WireChatResponseSchema>;

export const WireEmbeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })),
});

/** Error envelope. OpenAI sends a string `code`; llama.cpp sends the status as `code` and names the kind in `type`. */
export const WireErrorBodySchema = z.object({
  error: z.object({
    message: z.string().optional(),
    type: z.string().nullish(),
    code: z.union([z.string(), z.number()]).nullish(),
  }),
});
