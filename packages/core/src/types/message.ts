// Chat message types exchanged with the language model

import type { ToolCall } from "./tool";

export type ChatRole = "system" | "user" | "assistant" | "tool";

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
  /** Links a tool result message back to its call (present when role === "tool") */
  readonly toolCallId?: string;
}

/** What the model sent back in one choice. */
export interface AssistantMessage {
  readonly content: string | null;
  /** Set when the model explicitly declined to answer. */
  readonly refusal?: string | null;
  readonly toolCalls?: readonly ToolCall[];
}

/** A conversation, or a bare user prompt. */
export type ChatInput = string | readonly ChatMessage[];
