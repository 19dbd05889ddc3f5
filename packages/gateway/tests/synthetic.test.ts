import { describe, it, expect, vi, afterEach } from "vitest";
import { splitIntoChunks, syntheticEvents } from "../src/streaming/synthetic.js";
import type { UpstreamEvent } from "../src/streaming/events.js";
import { FinishReason, Role } from "../src/types/enums.js";
import { CanceledError } from "../src/types/errors.js";
import { textContent } from "../src/types/message.js";
import { createUsage, type UnifiedChatResponse } from "../src/types/response.js";

afterEach(() => {
  vi.useRealTimers();
});

function response(text: string, extra: Partial<UnifiedChatResponse["choices"][number]["message"]> = {}): UnifiedChatResponse {
  return {
    id: "resp-1",
    object: "chat.completion",
    created: 1700000000,
    model: "meta/meta-llama-3-8b-instruct",
    choices: [
      {
        index: 0,
        message: { role: Role.ASSISTANT, content: textContent(text), ...extra },
        finish_reason: FinishReason.STOP,
      },
    ],
    usage: createUsage(3, 5),
  };
}

async function collect(iter: AsyncIterable<UpstreamEvent>): Promise<UpstreamEvent[]> {
  const events: UpstreamEvent[] = [];
  for await (const event of iter) events.push(event);
  return events;
}

describe("splitIntoChunks", () => {
  it("splits on word boundaries", () => {
    expect(splitIntoChunks("The quick brown fox jumps", 2)).toEqual([
      "The quick ",
      "brown fox ",
      "jumps",
    ]);
  });

  it("concatenates back to the original text", () => {
    const text = "  Hello,\n\nworld!  This   has odd   spacing. ";
    for (const n of [1, 2, 3, 10]) {
      expect(splitIntoChunks(text, n).join("")).toBe(text);
    }
  });

  it("is deterministic", () => {
    const text = "one two three four five six seven";
    expect(splitIntoChunks(text, 3)).toEqual(splitIntoChunks(text, 3));
    expect(splitIntoChunks(text, 3)).toEqual(["one two three ", "four five six ", "seven"]);
  });

  it("handles empty and whitespace-only text", () => {
    expect(splitIntoChunks("", 4)).toEqual([]);
    expect(splitIntoChunks("   ", 4)).toEqual(["   "]);
  });
});

describe("syntheticEvents", () => {
  it("emits start, content, tool calls, usage, then finish", async () => {
    const events = await collect(
      syntheticEvents(
        response("The quick brown fox jumps", {
          tool_calls: [{ id: "call_1", type: "function", function: { name: "f", arguments: "{}" } }],
        }),
        { wordsPerChunk: 2 },
      ),
    );
    expect(events).toEqual([
      { type: "start", id: "resp-1", model: "meta/meta-llama-3-8b-instruct" },
      { type: "content_delta", text: "The quick " },
      { type: "content_delta", text: "brown fox " },
      { type: "content_delta", text: "jumps" },
      { type: "tool_call_delta", index: 0, id: "call_1", name: "f", arguments: "{}" },
      { type: "usage", usage: { prompt_tokens: 3, completion_tokens: 5, total_tokens: 8 } },
      { type: "finish", reason: "stop" },
    ]);
  });

  it("waits between chunks when a delay is set", async () => {
    vi.useFakeTimers();
    const seen: string[] = [];
    const done = (async () => {
      for await (const event of syntheticEvents(response("a b c"), { wordsPerChunk: 1, delayMs: 100 })) {
        if (event.type === "content_delta") seen.push(event.text);
      }
    })();

    await vi.advanceTimersByTimeAsync(0);
    expect(seen).toEqual(["a "]);
    await vi.advanceTimersByTimeAsync(100);
    expect(seen).toEqual(["a ", "b "]);
    await vi.advanceTimersByTimeAsync(100);
    await done;
    expect(seen).toEqual(["a ", "b ", "c"]);
  });

  it("aborts the delay on cancellation", async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = collect(
      syntheticEvents(response("a b c"), { wordsPerChunk: 1, delayMs: 1000, signal: controller.signal }),
    );
    await vi.advanceTimersByTimeAsync(10);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(CanceledError);
  });
});
