import { describe, it, expect } from "vitest";
import { ChunkAccumulator } from "../src/streaming/accumulator.js";
import { normalizeStream } from "../src/streaming/normalizer.js";
import type { UpstreamEvent } from "../src/streaming/events.js";
import { FinishReason } from "../src/types/enums.js";
import { createUsage } from "../src/types/response.js";

async function* fromArray(events: UpstreamEvent[]): AsyncGenerator<UpstreamEvent> {
  for (const event of events) yield event;
}

describe("ChunkAccumulator", () => {
  it("folds a normalized stream into a response", async () => {
    const acc = new ChunkAccumulator();
    const stream = normalizeStream(
      fromArray([
        { type: "content_delta", text: "Let me " },
        { type: "content_delta", text: "check." },
        { type: "tool_call_delta", index: 1, id: "call_b", name: "second" },
        { type: "tool_call_delta", index: 0, id: "call_a", name: "first" },
        { type: "tool_call_delta", index: 0, arguments: '{"q":' },
        { type: "tool_call_delta", index: 0, arguments: "1}" },
        { type: "usage", usage: createUsage(10, 4) },
        { type: "finish", reason: FinishReason.TOOL_CALLS },
      ]),
      { id: "chatcmpl-acc", model: "claude-sonnet-4-5", alias: "smart", created: 1700000000 },
    );
    for await (const chunk of stream) acc.process(chunk);

    expect(acc.text).toBe("Let me check.");
    expect(acc.response()).toEqual({
      id: "chatcmpl-acc",
      object: "chat.completion",
      created: 1700000000,
      model: "claude-sonnet-4-5",
      choices: [
        {
          index: 0,
          message: {
            role: "assistant",
            content: { kind: "text", text: "Let me check." },
            tool_calls: [
              { id: "call_a", type: "function", function: { name: "first", arguments: '{"q":1}' } },
              { id: "call_b", type: "function", function: { name: "second", arguments: "" } },
            ],
          },
          finish_reason: "tool_calls",
        },
      ],
      usage: { prompt_tokens: 10, completion_tokens: 4, total_tokens: 14 },
      original_model_alias: "smart",
    });
  });

  it("reports other and zero usage for an unterminated stream", () => {
    const acc = new ChunkAccumulator();
    acc.process({
      id: "x",
      object: "chat.completion.chunk",
      created: 1,
      model: "m",
      choices: [{ index: 0, delta: { content: "hi" }, finish_reason: null }],
    });
    const response = acc.response();
    expect(response.choices[0]?.finish_reason).toBe("other");
    expect(response.usage).toEqual({ prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 });
  });
});
