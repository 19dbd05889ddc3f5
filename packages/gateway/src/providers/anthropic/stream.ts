/**
 * Anthropic streaming translation.
 *
 *   message_start        -> start (+ input token count)
 *   content_block_start  -> tool call header for tool_use blocks
 *   content_block_delta  -> text or partial tool arguments
 *   message_delta        -> stop reason and output token count
 *   message_stop         -> end of stream
 *   error                -> CommunicationError
 */

import { z } from "zod";
import type { UpstreamEvent } from "../../streaming/events.js";
import type { SSEEvent } from "../../transport/sse.js";
import { CommunicationError } from "../../types/errors.js";
import { createUsage } from "../../types/response.js";
import { mapFinishReason, parseStreamPayload } from "../shared.js";

const eventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("message_start"),
    message: z.object({
      id: z.string().optional(),
      model: z.string().optional(),
      usage: z.object({ input_tokens: z.number().default(0) }).optional(),
    }),
  }),
  z.object({
    type: z.literal("content_block_start"),
    index: z.number(),
    content_block: z.object({
      type: z.string(),
      id: z.string().optional(),
      name: z.string().optional(),
    }),
  }),
  z.object({
    type: z.literal("content_block_delta"),
    index: z.number(),
    delta: z.object({
      type: z.string(),
      text: z.string().optional(),
      partial_json: z.string().optional(),
    }),
  }),
  z.object({ type: z.literal("content_block_stop"), index: z.number() }),
  z.object({
    type: z.literal("message_delta"),
    delta: z.object({ stop_reason: z.string().nullish() }),
    usage: z.object({ output_tokens: z.number().default(0) }).optional(),
  }),
  z.object({ type: z.literal("message_stop") }),
  z.object({ type: z.literal("ping") }),
  z.object({
    type: z.literal("error"),
    error: z.object({ type: z.string().optional(), message: z.string() }),
  }),
]);

export async function* translateStream(
  sseStream: AsyncIterable<SSEEvent>,
  provider: string,
): AsyncGenerator<UpstreamEvent, void, undefined> {
  let inputTokens = 0;
  // Anthropic block index -> position among tool calls.
  const toolIndex = new Map<number, number>();

  for await (const sse of sseStream) {
    if (sse.data.trim() === "") continue;
    const event = parseStreamPayload(eventSchema, sse.data, provider);

    switch (event.type) {
      case "message_start":
        inputTokens = event.message.usage?.input_tokens ?? 0;
        yield { type: "start", id: event.message.id, model: event.message.model };
        break;

      case "content_block_start":
        if (event.content_block.type === "tool_use") {
          const index = toolIndex.size;
          toolIndex.set(event.index, index);
          yield {
            type: "tool_call_delta",
            index,
            id: event.content_block.id,
            name: event.content_block.name,
          };
        }
        break;

      case "content_block_delta":
        if (event.delta.type === "text_delta" && event.delta.text) {
          yield { type: "content_delta", text: event.delta.text };
        } else if (event.delta.type === "input_json_delta" && event.delta.partial_json) {
          yield {
            type: "tool_call_delta",
            index: toolIndex.get(event.index) ?? 0,
            arguments: event.delta.partial_json,
          };
        }
        break;

      case "message_delta":
        if (event.usage) {
          yield { type: "usage", usage: createUsage(inputTokens, event.usage.output_tokens) };
        }
        if (event.delta.stop_reason) {
          yield { type: "finish", reason: mapFinishReason(event.delta.stop_reason) };
        }
        break;

      case "message_stop":
        return;

      case "error":
        throw new CommunicationError(event.error.message, {
          provider,
          error_code: event.error.type,
          retryable: false,
        });

      case "content_block_stop":
      case "ping":
        break;
    }
  }
}
