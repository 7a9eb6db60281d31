import { describe, test, expect, vi, afterEach } from "vitest";
import { LlmGateway, RefusalError, TOOL_SCHEMA_SHAPE, TokenLimitError, TransientGatewayError } from "@toolplan/core";
import { OpenAICompatibleTransport, normalizeBaseUrl, toWireRequest } from "../provider";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function stubFetch(...outcomes: Array<Response | Error>) {
  const fetchMock = vi.fn<typeof fetch>();
  for (const outcome of outcomes) {
    if (outcome instanceof Error) fetchMock.mockRejectedValueOnce(outcome);
    else fetchMock.mockResolvedValueOnce(outcome);
  }
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function sentRequest(fetchMock: ReturnType<typeof stubFetch>, index = 0) {
  const call = fetchMock.mock.calls[index];
  if (!call) throw new Error(`fetch was not called ${index + 1} time(s)`);
  const [input, init] = call;
  const body: unknown = JSON.parse(String(init?.body));
  return { url: String(input), headers: new Headers(init?.headers), body };
}

function makeTransport(overrides: Partial<ConstructorParameters<typeof OpenAICompatibleTransport>[0]> = {}) {
  return new OpenAICompatibleTransport({ name: "test", baseUrl: "http://localhost/v1", ...overrides });
}

// The token count "140129" contains "401".
const CONTEXT_LENGTH_ERROR = {
  error: {
    message:
      "This model's maximum context length is 128000 tokens. However, your messages resulted in 140129 tokens. " +
      "Please reduce the length of the messages.",
    type: "invalid_request_error",
    param: "messages",
    code: "context_length_exceeded",
  },
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("normalizeBaseUrl", () => {
  test("appends /v1 when missing", () => {
    expect(normalizeBaseUrl("http://127.0.0.1:8080")).toBe("http://127.0.0.1:8080/v1");
  });

  test("keeps /v1 when already present", () => {
    expect(normalizeBaseUrl("https://openrouter.ai/api/v1")).toBe("https://openrouter.ai/api/v1");
  });

  test("strips trailing slashes", () => {
    expect(normalizeBaseUrl("http://127.0.0.1:8080/v1///")).toBe("http://127.0.0.1:8080/v1");
  });

  test("strips a pasted endpoint path", () => {
    expect(normalizeBaseUrl("http://127.0.0.1:8080/v1/chat/completions")).toBe("http://127.0.0.1:8080/v1");
    expect(normalizeBaseUrl("http://127.0.0.1:8080/v1/embeddings")).toBe("http://127.0.0.1:8080/v1");
  });
});

describe("toWireRequest", () => {
  test("maps a structured-output request", () => {
    const wire = toWireRequest({
      model: "m1",
      maxTokens: 100,
      messages: [
        { role: "system", content: "be terse" },
        { role: "user", content: "hi" },
      ],
      responseFormat: { name: "ToolSchema", schema: { type: "object" } },
    });

    expect(wire).toEqual({
      model: "m1",
      max_tokens: 100,
      messages: [
        { role: "system", content: "be terse" },
        { role: "user", content: "hi" },
      ],
      response_format: {
        type: "json_schema",
        json_schema: { name: "ToolSchema", schema: { type: "object" }, strict: true },
      },
    });
  });

  test("maps function declarations and tool choice", () => {
    const parameters = {
      type: "object" as const,
      properties: { a: { type: "number", description: "first" } },
      required: ["a"],
    };
    const wire = toWireRequest({
      model: "m1",
      messages: [{ role: "user", content: "add" }],
      tools: [{ name: "add", description: "Adds", parameters }],
      toolChoice: "auto",
    });

    expect(wire.tools).toEqual([{ type: "function", function: { name: "add", description: "Adds", parameters } }]);
    expect(wire.tool_choice).toBe("auto");
  });

  test("omits tools and tool choice when no tools are given", () => {
    const wire = toWireRequest({ model: "m1", messages: [{ role: "user", content: "hi" }], tools: [], toolChoice: "auto" });
    expect(wire).toEqual({ model: "m1", messages: [{ role: "user", content: "hi" }] });
  });

  test("links tool results to their call", () => {
    const wire = toWireRequest({
      model: "m1",
      messages: [
        { role: "assistant", content: "calling" },
        { role: "tool", content: "3", toolCallId: "call_1" },
      ],
    });
    expect(wire.messages).toEqual([
      { role: "assistant", content: "calling" },
      { role: "tool", tool_call_id: "call_1", content: "3" },
    ]);
  });
});

describe("OpenAICompatibleTransport.complete", () => {
  test("posts to the chat completions endpoint with bearer auth", async () => {
    const fetchMock = stubFetch(jsonResponse({ choices: [{ message: { content: "hello" }, finish_reason: "stop" }] }));
    const transport = makeTransport({ apiKey: "test-secret" });

    await transport.complete({ model: "m1", messages: [{ role: "user", content: "hi" }] });

    const sent = sentRequest(fetchMock);
    expect(sent.url).toBe("http://localhost/v1/chat/completions");
    expect(sent.headers.get("Authorization")).toBe("Bearer test-secret");
    expect(sent.headers.get("Content-Type")).toBe("application/json");
    expect(sent.body).toEqual({ model: "m1", messages: [{ role: "user", content: "hi" }] });
  });

  test("omits Authorization without an api key and merges extra headers", async () => {
    const fetchMock = stubFetch(jsonResponse({ choices: [] }));
    const transport = makeTransport({ extraHeaders: { "HTTP-Referer": "https://example.com" } });

    await transport.complete({ model: "m1", messages: [{ role: "user", content: "hi" }] });

    const sent = sentRequest(fetchMock);
    expect(sent.headers.get("Authorization")).toBeNull();
    expect(sent.headers.get("HTTP-Referer")).toBe("https://example.com");
  });

  test("maps content, refusal and finish reason", async () => {
    stubFetch(
      jsonResponse({
        choices: [
          { message: { content: "hello", refusal: null }, finish_reason: "stop" },
          { message: { content: null, refusal: "I can't help with that" }, finish_reason: "stop" },
        ],
      }),
    );

    const completion = await makeTransport().complete({ model: "m1", messages: [] });

    expect(completion).toEqual({
      choices: [
        { message: { content: "hello", refusal: null }, finishReason: "stop" },
        { message: { content: null, refusal: "I can't help with that" }, finishReason: "stop" },
      ],
    });
  });

  test("parses tool call arguments", async () => {
    stubFetch(
      jsonResponse({
        choices: [
          {
            message: {
              content: null,
              tool_calls: [
                { id: "call_1", type: "function", function: { name: "search", arguments: '{"query":"test"}' } },
                { id: "call_2", type: "function", function: { name: "broken", arguments: "{oops" } },
              ],
            },
            finish_reason: "tool_calls",
          },
        ],
      }),
    );

    const completion = await makeTransport().complete({ model: "m1", messages: [] });

    expect(completion.choices[0]?.message.toolCalls).toEqual([
      { id: "call_1", name: "search", args: { query: "test" } },
      { id: "call_2", name: "broken", args: {} },
    ]);
    expect(completion.choices[0]?.finishReason).toBe("tool_calls");
  });

  test("treats a missing choices array as empty", async () => {
    stubFetch(jsonResponse({}));
    await expect(makeTransport().complete({ model: "m1", messages: [] })).resolves.toEqual({ choices: [] });
  });

  test("throws TransientGatewayError on a non-OK response", async () => {
    stubFetch(new Response("Server Error", { status: 500 }));

    const error = await makeTransport().complete({ model: "m1", messages: [] }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientGatewayError);
    expect(error).toMatchObject({
      providerCode: "unknown",
      message: "test API error: Status 500\nBody: Server Error",
    });
  });

  test("classifies rate limiting", async () => {
    stubFetch(jsonResponse({ error: { message: "slow down" } }, 429));
    await expect(makeTransport().complete({ model: "m1", messages: [] })).rejects.toMatchObject({
      name: "TransientGatewayError",
      providerCode: "throttled",
    });
  });

  test("raises TokenLimitError when the context length is exceeded", async () => {
    stubFetch(jsonResponse(CONTEXT_LENGTH_ERROR, 400));
    await expect(makeTransport().complete({ model: "m1", messages: [] })).rejects.toBeInstanceOf(TokenLimitError);
  });

  test("classifies a 401 as auth_failed", async () => {
    stubFetch(jsonResponse({ error: { message: "Incorrect API key provided", code: "invalid_api_key" } }, 401));
    await expect(makeTransport().complete({ model: "m1", messages: [] })).rejects.toMatchObject({
      name: "TransientGatewayError",
      providerCode: "auth_failed",
    });
  });

  test("reads the errno from the cause of undici's fetch failed", async () => {
    stubFetch(new TypeError("fetch failed", { cause: { code: "ECONNREFUSED" } }));
    await expect(makeTransport().complete({ model: "m1", messages: [] })).rejects.toMatchObject({
      providerCode: "transient_network",
    });
  });

  test("adds a reachability hint on network failure", async () => {
    stubFetch(new Error("fetch failed"));

    const error = await makeTransport().complete({ model: "m1", messages: [] }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientGatewayError);
    expect(error).toMatchObject({
      providerCode: "transient_network",
      message: "test error: fetch failed (is test reachable at http://localhost/v1?)",
    });
  });

  test("classifies an aborted request as cancelled", async () => {
    stubFetch(new DOMException("The operation was aborted", "AbortError"));
    await expect(makeTransport().complete({ model: "m1", messages: [] })).rejects.toMatchObject({
      providerCode: "cancelled",
    });
  });

  test("rejects a body that is not JSON", async () => {
    stubFetch(new Response("<html>oops</html>", { status: 200 }));
    await expect(makeTransport().complete({ model: "m1", messages: [] })).rejects.toMatchObject({
      name: "TransientGatewayError",
      providerCode: "no_output",
      message: "test returned a non-JSON body",
    });
  });

  test("rejects a malformed completion", async () => {
    stubFetch(jsonResponse({ choices: "nope" }));
    await expect(makeTransport().complete({ model: "m1", messages: [] })).rejects.toMatchObject({
      providerCode: "no_output",
      message: "test returned a malformed completion",
    });
  });
});

describe("OpenAICompatibleTransport.embed", () => {
  test("posts model and input to the embeddings endpoint", async () => {
    const fetchMock = stubFetch(jsonResponse({ data: [{ embedding: [0.1, 0.2] }] }));

    const vector = await makeTransport().embed("hello", "embed-model");

    expect(vector).toEqual([0.1, 0.2]);
    const sent = sentRequest(fetchMock);
    expect(sent.url).toBe("http://localhost/v1/embeddings");
    expect(sent.body).toEqual({ model: "embed-model", input: "hello" });
  });

  test("throws when no embedding comes back", async () => {
    stubFetch(jsonResponse({ data: [] }));
    await expect(makeTransport().embed("hello", "embed-model")).rejects.toMatchObject({
      providerCode: "no_output",
      message: "test returned no embedding",
    });
  });
});

describe("with LlmGateway", () => {
  test("decodes a structured tool schema end to end", async () => {
    const fetchMock = stubFetch(
      jsonResponse({
        choices: [
          {
            message: {
              content: JSON.stringify({
                name: "add",
                description: "Adds two numbers",
                tags: ["math"],
                parameters: [{ name: "a", type: "number", description: "first", required: true }],
              }),
            },
            finish_reason: "stop",
          },
        ],
      }),
    );
    const gateway = new LlmGateway({ transport: makeTransport({ apiKey: "test-secret" }) });

    const schema = await gateway.requestStructuredOutput("describe add", TOOL_SCHEMA_SHAPE, { model: "m1" });

    expect(schema.name).toBe("add");
    expect(schema.tags).toEqual(["math"]);
    expect(sentRequest(fetchMock).body).toMatchObject({
      model: "m1",
      response_format: { type: "json_schema", json_schema: { name: "ToolSchema", strict: true } },
    });
  });

  test("an oversized prompt is refused on the first attempt", async () => {
    const fetchMock = stubFetch(jsonResponse(CONTEXT_LENGTH_ERROR, 400));
    const sleep = vi.fn(async () => {});
    const gateway = new LlmGateway({ transport: makeTransport(), maxAttempts: 3, sleep });

    const error = await gateway
      .requestStructuredOutput("describe add", TOOL_SCHEMA_SHAPE, { model: "m1" })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RefusalError);
    expect(error).toMatchObject({ message: expect.stringContaining("Too many tokens: test API error: Status 400") });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
