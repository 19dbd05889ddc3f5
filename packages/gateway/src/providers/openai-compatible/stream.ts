/**
 * OpenAI-compatible streaming translation.
 *
 *   data: {"choices":[{"delta":{"content":"text"},"finish_reason":null}]}
 *   data: {"choices":[{"delta":{"tool_calls":[{"index":0,...}]}}]}
 *   data: {"choices":[],"usage":{...}}
 *   data: [DONE]
 */

import { z } from "zod";
import type { UpstreamEvent } from "../../streaming/events.js";
import type { SSEEvent } from "../../transport/sse.js";
import { CommunicationError } from "../../types/errors.js";
import { createUsage } from "../../types/response.js";
import { extractMessage } from "../../transport/error-mapping.js";
import { mapFinishReason, parseStreamPayload } from "../shared.js";
import { usageSchema } from "./translate-response.js";

const chunkSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  index: z.number().default(0),
                  id: z.string().optional(),
                  function: z
                    .object({ name: z.string().optional(), arguments: z.string().optional() })
                    .optional(),
                }),
              )
              .optional(),
          })
          .default({}),
        finish_reason: z.string().nullish(),
      }),
    )
    .default([]),
  usage: usageSchema.nullish(),
  error: z.unknown().optional(),
});

export async function* translateStream(
  sseStream: AsyncIterable<SSEEvent>,
  provider: string,
): AsyncGenerator<UpstreamEvent, void, undefined> {
  let started = false;

  for await (const sse of sseStream) {
    const data = sse.data.trim();
    if (data === "") continue;
    if (data === "[DONE]") return;

    const chunk = parseStreamPayload(chunkSchema, data, provider);
    if (chunk.error !== undefined) {
      throw new CommunicationError(extractMessage({ error: chunk.error }), {
        provider,
        retryable: false,
      });
    }

    if (!started) {
      started = true;
      yield { type: "start", id: chunk.id, model: chunk.model };
    }

    if (chunk.usage) {
      yield {
        type: "usage",
        usage: createUsage(
          chunk.usage.prompt_tokens,
          chunk.usage.completion_tokens,
          chunk.usage.total_tokens,
        ),
      };
    }

    const choice = chunk.choices[0];
    if (!choice) continue;

    if (choice.delta.content) {
      yield { type: "content_delta", text: choice.delta.content };
    }
    for (const call of choice.delta.tool_calls ?? []) {
      yield {
        type: "tool_call_delta",
        index: call.index,
        id: call.id,
        name: call.function?.name,
        arguments: call.function?.arguments,
      };
    }
    if (choice.finish_reason) {
      yield { type: "finish", reason: mapFinishReason(choice.finish_reason) };
    }
  }
}
