import { describe, it, expect, afterEach, vi } from "vitest";
import { ProviderClient } from "../../src/contract/client.js";
import { GeminiAdapter } from "../../src/providers/gemini/index.js";
import {
  modelPath,
  translateEmbeddingRequests,
  translateRequest,
} from "../../src/providers/gemini/translate-request.js";
import {
  translateModelList,
  translateResponse,
} from "../../src/providers/gemini/translate-response.js";
import { translateStream } from "../../src/providers/gemini/stream.js";
import { ResiliencePolicy } from "../../src/resilience/policy.js";
import type { SSEEvent } from "../../src/transport/sse.js";
import { createMessage } from "../../src/types/message.js";
import type { UnifiedChatRequest } from "../../src/types/request.js";
import { collect, fetchCall, jsonResponse, sseResponse, stubFetch } from "../helpers.js";

async function* mockSSEStream(payloads: unknown[]): AsyncIterableIterator<SSEEvent> {
  for (const payload of payloads) {
    yield { data: JSON.stringify(payload) };
  }
}

const hello: UnifiedChatRequest = {
  model: "gemini-2.0-flash",
  messages: [createMessage("user", "Hello")],
};

// ===========================================================================
// Request Translation Tests
// ===========================================================================

describe("Gemini translate-request", () => {
  it("prefixes model paths once", () => {
    expect(modelPath("gemini-2.0-flash")).toBe("models/gemini-2.0-flash");
    expect(modelPath("models/gemini-2.0-flash")).toBe("models/gemini-2.0-flash");
  });

  it("maps roles, system instruction and generation config", () => {
    const body = translateRequest({
      model: "gemini-2.0-flash",
      messages: [
        createMessage("system", "Be terse."),
        createMessage("user", "Hi"),
        createMessage("assistant", "Hello"),
        createMessage("user", "Bye"),
      ],
      temperature: 0.2,
      top_k: 40,
      max_tokens: 256,
      stop: ["###"],
    });

    expect(body).toEqual({
      contents: [
        { role: "user", parts: [{ text: "Hi" }] },
        { role: "model", parts: [{ text: "Hello" }] },
        { role: "user", parts: [{ text: "Bye" }] },
      ],
      systemInstruction: { parts: [{ text: "Be terse." }] },
      generationConfig: { temperature: 0.2, topK: 40, maxOutputTokens: 256, stopSequences: ["###"] },
    });
  });

  it("names function responses after the call they answer", () => {
    const body = translateRequest({
      model: "gemini-2.0-flash",
      messages: [
        createMessage("user", "Weather?"),
        {
          role: "assistant",
          content: { kind: "text", text: "" },
          tool_calls: [
            { id: "call-1", type: "function", function: { name: "get_weather", arguments: '{"city":"Lima"}' } },
          ],
        },
        { role: "tool", content: { kind: "text", text: "22C" }, tool_call_id: "call-1" },
      ],
    });

    expect(body.contents).toEqual([
      { role: "user", parts: [{ text: "Weather?" }] },
      { role: "model", parts: [{ functionCall: { name: "get_weather", args: { city: "Lima" } } }] },
      {
        role: "user",
        parts: [{ functionResponse: { name: "get_weather", response: { content: "22C" } } }],
      },
    ]);
  });

  it("translates images to inline data or file references", () => {
    const body = translateRequest({
      model: "gemini-2.0-flash",
      messages: [
        {
          role: "user",
          content: {
            kind: "blocks",
            blocks: [
              { type: "text", text: "What is this?" },
              { type: "image_url", url: "data:image/jpeg;base64,AAAA" },
              { type: "image_url", url: "https://img.example.test/a.png" },
            ],
          },
        },
      ],
    });

    expect(body.contents[0]?.parts).toEqual([
      { text: "What is this?" },
      { inlineData: { mimeType: "image/jpeg", data: "AAAA" } },
      { fileData: { fileUri: "https://img.example.test/a.png" } },
    ]);
  });

  it("maps tools and tool choice", () => {
    const body = translateRequest({
      ...hello,
      tools: [{ type: "function", function: { name: "lookup", parameters: { type: "object" } } }],
      tool_choice: { name: "lookup" },
    });

    expect(body.tools).toEqual([{ functionDeclarations: [{ name: "lookup", parameters: { type: "object" } }] }]);
    expect(body.toolConfig).toEqual({
      functionCallingConfig: { mode: "ANY", allowedFunctionNames: ["lookup"] },
    });
    expect(
      translateRequest({
        ...hello,
        tools: [{ type: "function", function: { name: "lookup" } }],
        tool_choice: "none",
      }).toolConfig,
    ).toEqual({ functionCallingConfig: { mode: "NONE" } });
  });

  it("builds one embedding request per input", () => {
    expect(
      translateEmbeddingRequests({ model: "text-embedding-004", input: ["a", "b"], dimensions: 64 }),
    ).toEqual([
      { model: "models/text-embedding-004", content: { parts: [{ text: "a" }] }, outputDimensionality: 64 },
      { model: "models/text-embedding-004", content: { parts: [{ text: "b" }] }, outputDimensionality: 64 },
    ]);
  });
});

// ===========================================================================
// Response Translation Tests
// ===========================================================================

describe("Gemini translate-response", () => {
  it("joins text parts and skips thoughts", () => {
    const response = translateResponse(
      {
        candidates: [
          {
            content: { parts: [{ text: "plan", thought: true }, { text: "Hel" }, { text: "lo" }] },
            finishReason: "STOP",
          },
        ],
        usageMetadata: { promptTokenCount: 4, candidatesTokenCount: 2, totalTokenCount: 6 },
        modelVersion: "gemini-2.0-flash-001",
        responseId: "resp-g1",
      },
      hello,
      "gemini",
    );

    expect(response.id).toBe("resp-g1");
    expect(response.model).toBe("gemini-2.0-flash-001");
    expect(response.choices[0]?.message.content).toEqual({ kind: "text", text: "Hello" });
    expect(response.choices[0]?.finish_reason).toBe("stop");
    expect(response.usage).toEqual({ prompt_tokens: 4, completion_tokens: 2, total_tokens: 6 });
  });

  it("reports tool_calls when the candidate calls a function", () => {
    const response = translateResponse(
      {
        candidates: [
          { content: { parts: [{ functionCall: { name: "lookup", args: { q: "x" } } }] }, finishReason: "STOP" },
        ],
      },
      hello,
      "gemini",
    );

    const call = response.choices[0]?.message.tool_calls?.[0];
    expect(call?.id).toMatch(/^call-/);
    expect(call?.function).toEqual({ name: "lookup", arguments: '{"q":"x"}' });
    expect(response.choices[0]?.finish_reason).toBe("tool_calls");
    expect(response.model).toBe("gemini-2.0-flash");
  });

  it("maps safety stops to content_filter", () => {
    const response = translateResponse(
      { candidates: [{ finishReason: "SAFETY" }] },
      hello,
      "gemini",
    );
    expect(response.choices[0]?.finish_reason).toBe("content_filter");
    expect(response.choices[0]?.message.content).toEqual({ kind: "text", text: "" });
  });

  it("strips the models/ prefix from listings", () => {
    expect(translateModelList({ models: [{ name: "models/gemini-2.0-flash" }] }, "gemini")).toEqual([
      { id: "gemini-2.0-flash", provider: "gemini", owned_by: "google" },
    ]);
  });
});

// ===========================================================================
// Streaming Tests
// ===========================================================================

describe("Gemini streaming", () => {
  it("translates partial responses into events", async () => {
    const events = await collect(
      translateStream(
        mockSSEStream([
          { candidates: [{ content: { parts: [{ text: "Hi" }] } }], responseId: "resp-s1" },
          {
            candidates: [{ content: { parts: [{ text: " there" }] }, finishReason: "STOP" }],
            usageMetadata: { promptTokenCount: 3, candidatesTokenCount: 2 },
          },
        ]),
        "gemini",
      ),
    );

    expect(events).toEqual([
      { type: "start", id: "resp-s1", model: undefined },
      { type: "content_delta", text: "Hi" },
      { type: "content_delta", text: " there" },
      { type: "usage", usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 } },
      { type: "finish", reason: "stop" },
    ]);
  });

  it("emits each function call as one whole delta", async () => {
    const events = await collect(
      translateStream(
        mockSSEStream([
          {
            candidates: [
              {
                content: {
                  parts: [
                    { functionCall: { name: "a", args: {} } },
                    { functionCall: { name: "b", args: { n: 1 } } },
                  ],
                },
                finishReason: "STOP",
              },
            ],
          },
        ]),
        "gemini",
      ),
    );

    const calls = events.filter((event) => event.type === "tool_call_delta");
    expect(calls).toHaveLength(2);
    expect(calls[0]).toMatchObject({ index: 0, name: "a", arguments: "{}" });
    expect(calls[1]).toMatchObject({ index: 1, name: "b", arguments: '{"n":1}' });
    expect(events.at(-1)).toEqual({ type: "finish", reason: "tool_calls" });
  });
});

// ===========================================================================
// Adapter
// ===========================================================================

describe("GeminiAdapter", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function client() {
    return new ProviderClient({
      adapter: new GeminiAdapter(),
      credentials: { apiKey: "test-secret" },
      policy: ResiliencePolicy.none(),
    });
  }

  it("sends the key as a query parameter", async () => {
    const fetchMock = stubFetch(
      jsonResponse({ candidates: [{ content: { parts: [{ text: "Hi" }] }, finishReason: "STOP" }] }),
    );
    await client().createChatCompletion(hello);

    const call = fetchCall(fetchMock);
    expect(call.url).toBe(
      "https://generativelanguage.googleapis.com/v1beta/models/gemini-2.0-flash:generateContent?key=test-secret",
    );
    expect(call.headers["authorization"]).toBeUndefined();
  });

  it("streams with alt=sse", async () => {
    const fetchMock = stubFetch(
      sseResponse([{ candidates: [{ content: { parts: [{ text: "Yo" }] }, finishReason: "STOP" }] }]),
    );
    const chunks = await collect(client().streamChatCompletion(hello));

    const url = new URL(fetchCall(fetchMock).url);
    expect(url.pathname).toBe("/v1beta/models/gemini-2.0-flash:streamGenerateContent");
    expect(url.searchParams.get("alt")).toBe("sse");
    expect(url.searchParams.get("key")).toBe("test-secret");
    expect(chunks.map((c) => c.choices[0]?.delta.content)).toEqual(["Yo", undefined]);
  });

  it("embeds a single input with embedContent", async () => {
    const fetchMock = stubFetch(jsonResponse({ embedding: { values: [0.5, 0.25] } }));
    const response = await client().createEmbedding({ model: "text-embedding-004", input: "hi" });

    const call = fetchCall(fetchMock);
    expect(new URL(call.url).pathname).toBe("/v1beta/models/text-embedding-004:embedContent");
    expect(call.body).toEqual({ content: { parts: [{ text: "hi" }] } });
    expect(response).toEqual({
      model: "text-embedding-004",
      data: [{ index: 0, embedding: [0.5, 0.25] }],
      usage: { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 },
    });
  });

  it("embeds several inputs with batchEmbedContents", async () => {
    const fetchMock = stubFetch(jsonResponse({ embeddings: [{ values: [1] }, { values: [2] }] }));
    const response = await client().createEmbedding({ model: "text-embedding-004", input: ["a", "b"] });

    expect(new URL(fetchCall(fetchMock).url).pathname).toBe(
      "/v1beta/models/text-embedding-004:batchEmbedContents",
    );
    expect(response.data).toEqual([
      { index: 0, embedding: [1] },
      { index: 1, embedding: [2] },
    ]);
  });
});
