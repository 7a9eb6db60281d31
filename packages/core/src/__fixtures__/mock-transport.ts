// Test fixture: transport that replays queued completions or errors

import type {
  ChatCompletion,
  ChatRequest,
  ChatTransport,
  ToolCall,
} from "../types";

export type MockReply = ChatCompletion | Error;

export class MockTransport implements ChatTransport {
  readonly name = "mock";
  public callHistory: ChatRequest[] = [];
  public embedHistory: Array<{ input: string; model: string }> = [];

  /**
   * @param replies consumed in order, one per complete() call
   * @param responder used once `replies` is exhausted
   */
  constructor(
    private replies: MockReply[] = [],
    private responder?: (request: ChatRequest) => MockReply,
  ) {}

  async complete(request: ChatRequest): Promise<ChatCompletion> {
    this.callHistory.push(request);
    const next = this.replies.shift() ?? this.responder?.(request);
    if (!next) throw new Error("MockTransport: no reply queued");
    if (next instanceof Error) throw next;
    return next;
  }

  async embed(input: string, model: string): Promise<number[]> {
    this.embedHistory.push({ input, model });
    return [0.25, 0.5, 0.75];
  }

  enqueue(...replies: MockReply[]): void {
    this.replies.push(...replies);
  }

  lastCall(): ChatRequest | undefined {
    return this.callHistory.at(-1);
  }
}

export interface CompletionExtras {
  readonly finishReason?: string | null;
  readonly refusal?: string | null;
  readonly toolCalls?: readonly ToolCall[];
}

export function completion(content: string | null, extras: CompletionExtras = {}): ChatCompletion {
  return {
    choices: [
      {
        message: { content, refusal: extras.refusal ?? null, toolCalls: extras.toolCalls },
        finishReason: extras.finishReason ?? "stop",
      },
    ],
  };
}

export function jsonCompletion(payload: unknown): ChatCompletion {
  return completion(JSON.stringify(payload));
}

/** Wire-format ToolSchema payload, as the model would send it. */
export function toolSchemaPayload(name: string, description = `${name} tool`) {
  return {
    name,
    description,
    tags: ["test"],
    parameters: [{ name: "value", type: "number", description: "Input value", required: true }],
  };
}

/** Answers every tool-description request with a schema named after the function. */
export function describingResponder(request: ChatRequest): MockReply {
  const prompt = request.messages.at(-1)?.content ?? "";
  const match = /<Function name>\n(.*)\n<\/Function name>/.exec(prompt);
  if (!match) return new Error("MockTransport: not a tool-description request");
  return jsonCompletion(toolSchemaPayload(match[1]));
}
