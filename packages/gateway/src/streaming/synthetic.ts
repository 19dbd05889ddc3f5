/**
 * Synthetic streaming for providers without an incremental transport.
 *
 * The full response is computed first, then replayed as upstream events:
 * start, content in word-boundary chunks, tool calls, usage, finish.
 */

import { sleep } from "../resilience/sleep.js";
import { getContentText } from "../types/message.js";
import type { UnifiedChatResponse } from "../types/response.js";
import { FinishReason } from "../types/enums.js";
import type { UpstreamEvent } from "./events.js";

export interface SyntheticCadence {
  /** Words per content chunk. Default: 4. */
  wordsPerChunk?: number;
  /** Milliseconds between content chunks. Default: 0. */
  delayMs?: number;
  signal?: AbortSignal;
}

/**
 * Split `text` into chunks of `wordsPerChunk` words. Each word keeps its
 * trailing whitespace and leading whitespace stays on the first chunk, so
 * the chunks concatenate back to `text` exactly.
 *
 * @example splitIntoChunks("The quick brown fox jumps", 2)
 *   // ["The quick ", "brown fox ", "jumps"]
 */
export function splitIntoChunks(text: string, wordsPerChunk: number): string[] {
  if (text === "") return [];
  const size = Math.max(1, Math.floor(wordsPerChunk));
  const words = text.match(/\S+\s*/g);
  if (!words) return [text];

  const chunks: string[] = [];
  for (let i = 0; i < words.length; i += size) {
    chunks.push(words.slice(i, i + size).join(""));
  }
  const leading = text.length - text.trimStart().length;
  if (leading > 0) {
    chunks[0] = text.slice(0, leading) + (chunks[0] ?? "");
  }
  return chunks;
}

/** Replay a finished response as upstream events. */
export async function* syntheticEvents(
  response: UnifiedChatResponse,
  cadence: SyntheticCadence = {},
): AsyncGenerator<UpstreamEvent, void, undefined> {
  const choice = response.choices[0];
  yield { type: "start", id: response.id, model: response.model };

  const text = choice ? getContentText(choice.message.content) : "";
  const chunks = splitIntoChunks(text, cadence.wordsPerChunk ?? 4);
  for (const [i, part] of chunks.entries()) {
    if (i > 0 && cadence.delayMs) {
      await sleep(cadence.delayMs, cadence.signal);
    }
    yield { type: "content_delta", text: part };
  }

  for (const [index, call] of (choice?.message.tool_calls ?? []).entries()) {
    yield {
      type: "tool_call_delta",
      index,
      id: call.id,
      name: call.function.name,
      arguments: call.function.arguments,
    };
  }

  yield { type: "usage", usage: response.usage };
  yield { type: "finish", reason: choice?.finish_reason ?? FinishReason.STOP };
}
