import { describe, it, expect } from "vitest";
import { normalizeStream } from "../src/streaming/normalizer.js";
import type { UpstreamEvent } from "../src/streaming/events.js";
import type { ChatCompletionChunk } from "../src/types/chunk.js";
import { FinishReason } from "../src/types/enums.js";
import { CanceledError, CommunicationError } from "../src/types/errors.js";
import { createUsage } from "../src/types/response.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function* fromArray(events: UpstreamEvent[]): AsyncGenerator<UpstreamEvent> {
  for (const event of events) {
    yield event;
  }
}

async function collect(iter: AsyncIterable<ChatCompletionChunk>): Promise<ChatCompletionChunk[]> {
  const chunks: ChatCompletionChunk[] = [];
  for await (const chunk of iter) {
    chunks.push(chunk);
  }
  return chunks;
}

const options = { id: "chatcmpl-test", model: "gpt-4o", created: 1700000000 };

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("normalizeStream", () => {
  it("emits content chunks and one terminal chunk with usage", async () => {
    const chunks = await collect(
      normalizeStream(
        fromArray([
          { type: "start", id: "upstream-1", model: "gpt-4o-2024-08-06" },
          { type: "content_delta", text: "Hel" },
          { type: "content_delta", text: "lo" },
          { type: "finish", reason: FinishReason.STOP },
          { type: "usage", usage: createUsage(5, 1) },
        ]),
        { ...options, alias: "gpt-4o-latest" },
      ),
    );

    expect(chunks).toEqual([
      {
        id: "upstream-1",
        object: "chat.completion.chunk",
        created: 1700000000,
        model: "gpt-4o-2024-08-06",
        choices: [{ index: 0, delta: { role: "assistant", content: "Hel" }, finish_reason: null }],
        original_model_alias: "gpt-4o-latest",
      },
      {
        id: "upstream-1",
        object: "chat.completion.chunk",
        created: 1700000000,
        model: "gpt-4o-2024-08-06",
        choices: [{ index: 0, delta: { content: "lo" }, finish_reason: null }],
        original_model_alias: "gpt-4o-latest",
      },
      {
        id: "upstream-1",
        object: "chat.completion.chunk",
        created: 1700000000,
        model: "gpt-4o-2024-08-06",
        choices: [{ index: 0, delta: {}, finish_reason: "stop" }],
        usage: { prompt_tokens: 5, completion_tokens: 1, total_tokens: 6 },
        original_model_alias: "gpt-4o-latest",
      },
    ]);
  });

  it("defaults the finish reason to stop and puts the role on the terminal chunk of an empty stream", async () => {
    const chunks = await collect(normalizeStream(fromArray([]), options));
    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.id).toBe("chatcmpl-test");
    expect(chunks[0]?.choices[0]).toEqual({
      index: 0,
      delta: { role: "assistant" },
      finish_reason: "stop",
    });
  });

  it("announces the role immediately and keeps the id stable afterwards", async () => {
    const chunks = await collect(
      normalizeStream(
        fromArray([
          { type: "start", id: "job-1", announce: true },
          { type: "start", id: "job-1-response" },
          { type: "content_delta", text: "done" },
        ]),
        options,
      ),
    );
    expect(chunks.map((c) => c.choices[0]?.delta)).toEqual([
      { role: "assistant" },
      { content: "done" },
      {},
    ]);
    expect(new Set(chunks.map((c) => c.id))).toEqual(new Set(["job-1"]));
  });

  it("keys tool call deltas by index", async () => {
    const chunks = await collect(
      normalizeStream(
        fromArray([
          { type: "tool_call_delta", index: 0, id: "call_1", name: "get_weather" },
          { type: "tool_call_delta", index: 0, arguments: '{"city":' },
          { type: "tool_call_delta", index: 0, arguments: '"Paris"}' },
          { type: "finish", reason: FinishReason.TOOL_CALLS },
        ]),
        options,
      ),
    );
    expect(chunks.map((c) => c.choices[0]?.delta.tool_calls)).toEqual([
      [{ index: 0, id: "call_1", type: "function", function: { name: "get_weather" } }],
      [{ index: 0, function: { arguments: '{"city":' } }],
      [{ index: 0, function: { arguments: '"Paris"}' } }],
      undefined,
    ]);
    expect(chunks.at(-1)?.choices[0]?.finish_reason).toBe("tool_calls");
  });

  it("skips empty content deltas", async () => {
    const chunks = await collect(
      normalizeStream(fromArray([{ type: "content_delta", text: "" }]), options),
    );
    expect(chunks).toHaveLength(1);
  });

  it("surfaces a mid-stream failure as CommunicationError after the delivered chunks", async () => {
    async function* failing(): AsyncGenerator<UpstreamEvent> {
      yield { type: "content_delta", text: "partial" };
      throw new TypeError("socket hang up");
    }

    const received: ChatCompletionChunk[] = [];
    const error = await (async () => {
      for await (const chunk of normalizeStream(failing(), { ...options, provider: "openai" })) {
        received.push(chunk);
      }
    })().catch((err: unknown) => err);

    expect(received.map((c) => c.choices[0]?.delta.content)).toEqual(["partial"]);
    expect(error).toBeInstanceOf(CommunicationError);
    expect(error).toMatchObject({ provider: "openai", operation: "streamChatCompletion" });
  });

  it("stops with CanceledError and releases the upstream when the signal fires", async () => {
    const controller = new AbortController();
    let released = false;
    async function* upstream(): AsyncGenerator<UpstreamEvent> {
      try {
        yield { type: "content_delta", text: "one" };
        yield { type: "content_delta", text: "two" };
        yield { type: "content_delta", text: "three" };
      } finally {
        released = true;
      }
    }

    const received: string[] = [];
    const error = await (async () => {
      for await (const chunk of normalizeStream(upstream(), { ...options, signal: controller.signal })) {
        received.push(chunk.choices[0]?.delta.content ?? "");
        controller.abort();
      }
    })().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CanceledError);
    expect(received).toEqual(["one"]);
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(released).toBe(true);
  });

  it("rejects a pending upstream read as soon as the signal fires", async () => {
    const controller = new AbortController();
    const never: AsyncIterable<UpstreamEvent> = {
      [Symbol.asyncIterator]: () => ({
        next: () => new Promise<IteratorResult<UpstreamEvent>>(() => undefined),
      }),
    };
    const pending = collect(normalizeStream(never, { ...options, signal: controller.signal }));
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(CanceledError);
  });
});
