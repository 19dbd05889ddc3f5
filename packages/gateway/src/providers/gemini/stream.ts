/**
 * Gemini streaming translation (`streamGenerateContent?alt=sse`).
 *
 * Every SSE payload is a partial GenerateContentResponse. Function calls
 * arrive whole, so each becomes a single tool call delta.
 */

import type { UpstreamEvent } from "../../streaming/events.js";
import type { SSEEvent } from "../../transport/sse.js";
import { parseStreamPayload } from "../shared.js";
import {
  generateResponseSchema,
  mapGeminiFinishReason,
  toToolCall,
  toUsage,
} from "./translate-response.js";

export async function* translateStream(
  sseStream: AsyncIterable<SSEEvent>,
  provider: string,
): AsyncGenerator<UpstreamEvent, void, undefined> {
  let started = false;
  let toolIndex = 0;

  for await (const sse of sseStream) {
    if (sse.data.trim() === "") continue;
    const chunk = parseStreamPayload(generateResponseSchema, sse.data, provider);

    if (!started) {
      started = true;
      yield { type: "start", id: chunk.responseId, model: chunk.modelVersion };
    }

    const candidate = chunk.candidates[0];
    for (const part of candidate?.content?.parts ?? []) {
      if (part.thought) continue;
      if (part.text) yield { type: "content_delta", text: part.text };
      if (part.functionCall) {
        const call = toToolCall(part.functionCall);
        yield {
          type: "tool_call_delta",
          index: toolIndex++,
          id: call.id,
          name: call.function.name,
          arguments: call.function.arguments,
        };
      }
    }

    if (chunk.usageMetadata) {
      yield { type: "usage", usage: toUsage(chunk.usageMetadata) };
    }
    if (candidate?.finishReason) {
      yield { type: "finish", reason: mapGeminiFinishReason(candidate.finishReason, toolIndex > 0) };
    }
  }
}
