import { describe, it, expect, afterEach, vi } from "vitest";
import { ProviderClient } from "../../src/contract/client.js";
import { OpenAICompatibleAdapter } from "../../src/providers/openai-compatible/index.js";
import {
  translateImageRequest,
  translateRequest,
} from "../../src/providers/openai-compatible/translate-request.js";
import {
  translateImageResponse,
  translateResponse,
} from "../../src/providers/openai-compatible/translate-response.js";
import { translateStream } from "../../src/providers/openai-compatible/stream.js";
import { ResiliencePolicy } from "../../src/resilience/policy.js";
import type { SSEEvent } from "../../src/transport/sse.js";
import { CommunicationError } from "../../src/types/errors.js";
import { createMessage } from "../../src/types/message.js";
import type { UnifiedChatRequest } from "../../src/types/request.js";
import { collect, fetchCall, jsonResponse, stubFetch } from "../helpers.js";

async function* mockSSEStream(payloads: string[]): AsyncIterableIterator<SSEEvent> {
  for (const data of payloads) {
    yield { data };
  }
}

const hello: UnifiedChatRequest = {
  model: "gpt-4o",
  messages: [createMessage("user", "Hello")],
};

// ===========================================================================
// Request Translation Tests
// ===========================================================================

describe("OpenAI-compatible translate-request", () => {
  it("passes text content as a plain string", () => {
    expect(translateRequest(hello)).toEqual({
      model: "gpt-4o",
      messages: [{ role: "user", content: "Hello" }],
    });
  });

  it("translates blocks into content parts", () => {
    const body = translateRequest({
      model: "gpt-4o",
      messages: [
        {
          role: "user",
          content: {
            kind: "blocks",
            blocks: [
              { type: "text", text: "Describe" },
              { type: "image_url", url: "https://img.example.test/x.png", detail: "low" },
            ],
          },
        },
      ],
    });

    expect(body.messages[0]?.content).toEqual([
      { type: "text", text: "Describe" },
      { type: "image_url", image_url: { url: "https://img.example.test/x.png", detail: "low" } },
    ]);
  });

  it("sends null content for tool-only assistant turns", () => {
    const body = translateRequest({
      model: "gpt-4o",
      messages: [
        createMessage("user", "Weather?"),
        {
          role: "assistant",
          content: { kind: "text", text: "" },
          tool_calls: [{ id: "call_1", type: "function", function: { name: "weather", arguments: "{}" } }],
        },
        { role: "tool", content: { kind: "text", text: "sunny" }, tool_call_id: "call_1" },
      ],
    });

    expect(body.messages.slice(1)).toEqual([
      {
        role: "assistant",
        content: null,
        tool_calls: [{ id: "call_1", type: "function", function: { name: "weather", arguments: "{}" } }],
      },
      { role: "tool", content: "sunny", tool_call_id: "call_1" },
    ]);
  });

  it("maps a named tool choice and asks for usage when streaming", () => {
    const body = translateRequest({
      ...hello,
      tools: [{ type: "function", function: { name: "weather" } }],
      tool_choice: { name: "weather" },
      stream: true,
    });

    expect(body.tool_choice).toEqual({ type: "function", function: { name: "weather" } });
    expect(body.stream).toBe(true);
    expect(body.stream_options).toEqual({ include_usage: true });
  });

  it("drops tool_choice when no tools are given", () => {
    expect(translateRequest({ ...hello, tool_choice: "required" }).tool_choice).toBeUndefined();
  });

  it("defaults image count to one", () => {
    expect(translateImageRequest({ model: "dall-e-3", prompt: "a fox", size: "1024x1024" })).toEqual({
      model: "dall-e-3",
      prompt: "a fox",
      n: 1,
      size: "1024x1024",
    });
  });
});

// ===========================================================================
// Response Translation Tests
// ===========================================================================

describe("OpenAI-compatible translate-response", () => {
  it("translates tool calls and computes the total when missing", () => {
    const response = translateResponse(
      {
        id: "chatcmpl-1",
        created: 1700000000,
        model: "gpt-4o",
        choices: [
          {
            message: {
              role: "assistant",
              content: null,
              tool_calls: [{ id: "call_9", type: "function", function: { name: "weather", arguments: "{}" } }],
            },
            finish_reason: "tool_calls",
          },
        ],
        usage: { prompt_tokens: 10, completion_tokens: 3 },
      },
      hello,
      "openai",
    );

    expect(response.choices[0]).toEqual({
      index: 0,
      message: {
        role: "assistant",
        content: { kind: "text", text: "" },
        tool_calls: [{ id: "call_9", type: "function", function: { name: "weather", arguments: "{}" } }],
      },
      finish_reason: "tool_calls",
    });
    expect(response.usage.total_tokens).toBe(13);
  });

  it("keeps an upstream total", () => {
    const response = translateResponse(
      {
        choices: [{ message: { content: "ok" }, finish_reason: "length" }],
        usage: { prompt_tokens: 1, completion_tokens: 1, total_tokens: 5 },
      },
      hello,
      "openai",
    );
    expect(response.usage.total_tokens).toBe(5);
    expect(response.choices[0]?.finish_reason).toBe("length");
    expect(response.model).toBe("gpt-4o");
  });

  it("rejects a body without choices", () => {
    expect(() => translateResponse({ id: "x" }, hello, "openai")).toThrow(
      "Unexpected response from openai at choices: Required",
    );
  });

  it("passes image data through", () => {
    expect(
      translateImageResponse(
        { created: 1700000000, data: [{ url: "https://cdn.example.test/i.png", revised_prompt: "a red fox" }] },
        "openai",
      ),
    ).toEqual({
      created: 1700000000,
      data: [{ url: "https://cdn.example.test/i.png", revised_prompt: "a red fox" }],
    });
  });
});

// ===========================================================================
// Streaming Tests
// ===========================================================================

describe("OpenAI-compatible streaming", () => {
  it("accumulates tool call fragments by index", async () => {
    const events = await collect(
      translateStream(
        mockSSEStream([
          JSON.stringify({
            id: "c1",
            choices: [
              { delta: { tool_calls: [{ index: 0, id: "call_1", function: { name: "weather", arguments: "" } }] } },
            ],
          }),
          JSON.stringify({ choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: '{"c":1}' } }] } }] }),
          JSON.stringify({ choices: [{ delta: {}, finish_reason: "tool_calls" }] }),
          "[DONE]",
          JSON.stringify({ choices: [{ delta: { content: "ignored" } }] }),
        ]),
        "openai",
      ),
    );

    expect(events).toEqual([
      { type: "start", id: "c1", model: undefined },
      { type: "tool_call_delta", index: 0, id: "call_1", name: "weather", arguments: "" },
      { type: "tool_call_delta", index: 0, id: undefined, name: undefined, arguments: '{"c":1}' },
      { type: "finish", reason: "tool_calls" },
    ]);
  });

  it("raises an in-stream error payload", async () => {
    const pending = collect(
      translateStream(mockSSEStream([JSON.stringify({ error: { message: "context too long" } })]), "openai"),
    );
    await expect(pending).rejects.toThrow(CommunicationError);
  });

  it("reports malformed JSON as a CommunicationError", async () => {
    const pending = collect(translateStream(mockSSEStream(["{not json"]), "openai"));
    await expect(pending).rejects.toThrow("Malformed stream event from openai");
  });
});

// ===========================================================================
// Adapter
// ===========================================================================

describe("OpenAICompatibleAdapter", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("targets a compatible server with its own name and headers", async () => {
    const fetchMock = stubFetch(jsonResponse({ choices: [{ message: { content: "hi" }, finish_reason: "stop" }] }));
    const client = new ProviderClient({
      adapter: new OpenAICompatibleAdapter({
        name: "local",
        baseUrl: "http://localhost:11434/v1",
        defaultHeaders: { "X-Org": "team-a" },
      }),
      credentials: { apiKey: "test-secret" },
      policy: ResiliencePolicy.none(),
    });

    const response = await client.createChatCompletion({ ...hello, model: "llama3.1" });

    const call = fetchCall(fetchMock);
    expect(call.url).toBe("http://localhost:11434/v1/chat/completions");
    expect(call.headers["x-org"]).toBe("team-a");
    expect(call.headers["authorization"]).toBe("Bearer test-secret");
    expect(client.name).toBe("local");
    expect(response.choices[0]?.message.content).toEqual({ kind: "text", text: "hi" });
  });

  it("synthesizes speech as raw audio bytes", async () => {
    const fetchMock = stubFetch(
      new Response(new Uint8Array([73, 68, 51]), {
        status: 200,
        headers: { "Content-Type": "audio/mpeg" },
      }),
    );
    const client = new ProviderClient({
      adapter: new OpenAICompatibleAdapter(),
      credentials: { apiKey: "test-secret" },
      policy: ResiliencePolicy.none(),
    });

    const response = await client.createSpeech({ model: "tts-1", input: "Hello there", voice: "nova", speed: 1.25 });

    const call = fetchCall(fetchMock);
    expect(call.url).toBe("https://api.openai.com/v1/audio/speech");
    expect(call.headers["accept"]).toBe("audio/mpeg");
    expect(call.body).toEqual({
      model: "tts-1",
      input: "Hello there",
      voice: "nova",
      response_format: "mp3",
      speed: 1.25,
    });
    expect(response).toEqual({
      audio: new Uint8Array([73, 68, 51]),
      format: "mp3",
      content_type: "audio/mpeg",
    });
  });

  it("generates images", async () => {
    const fetchMock = stubFetch(jsonResponse({ created: 1, data: [{ url: "https://cdn.example.test/i.png" }] }));
    const client = new ProviderClient({
      adapter: new OpenAICompatibleAdapter(),
      credentials: { apiKey: "test-secret" },
      policy: ResiliencePolicy.none(),
    });

    const response = await client.createImage({ model: "dall-e-3", prompt: "a fox", n: 1 });

    expect(fetchCall(fetchMock).url).toBe("https://api.openai.com/v1/images/generations");
    expect(response).toEqual({ created: 1, data: [{ url: "https://cdn.example.test/i.png" }] });
  });
});
