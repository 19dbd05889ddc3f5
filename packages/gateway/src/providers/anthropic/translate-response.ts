/**
 * Translate Anthropic Messages API responses into unified responses.
 */

import { z } from "zod";
import { Role } from "../../types/enums.js";
import { textContent, type ToolCall } from "../../types/message.js";
import type { UnifiedChatRequest } from "../../types/request.js";
import { createUsage, type ModelInfo, type UnifiedChatResponse } from "../../types/response.js";
import { generateId, mapFinishReason, nowSeconds, parseBody } from "../shared.js";

const contentBlockSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("text"), text: z.string() }),
  z.object({
    type: z.literal("tool_use"),
    id: z.string(),
    name: z.string(),
    input: z.unknown(),
  }),
  z.object({ type: z.literal("thinking"), thinking: z.string() }),
  z.object({ type: z.literal("redacted_thinking") }),
]);

export const anthropicUsageSchema = z.object({
  input_tokens: z.number().default(0),
  output_tokens: z.number().default(0),
});

const messageResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  content: z.array(contentBlockSchema),
  stop_reason: z.string().nullish(),
  usage: anthropicUsageSchema.optional(),
});

const modelListSchema = z.object({
  data: z.array(z.object({ id: z.string() })),
});

export function translateResponse(
  raw: unknown,
  request: UnifiedChatRequest,
  provider: string,
): UnifiedChatResponse {
  const data = parseBody(messageResponseSchema, raw, provider);

  const text: string[] = [];
  const toolCalls: ToolCall[] = [];
  for (const block of data.content) {
    switch (block.type) {
      case "text":
        text.push(block.text);
        break;
      case "tool_use":
        toolCalls.push({
          id: block.id,
          type: "function",
          function: { name: block.name, arguments: JSON.stringify(block.input ?? {}) },
        });
        break;
      case "thinking":
      case "redacted_thinking":
        break;
    }
  }

  const inputTokens = data.usage?.input_tokens ?? 0;
  const outputTokens = data.usage?.output_tokens ?? 0;

  return {
    id: data.id || generateId("msg"),
    object: "chat.completion",
    created: nowSeconds(),
    model: data.model || request.model,
    choices: [
      {
        index: 0,
        message: {
          role: Role.ASSISTANT,
          content: textContent(text.join("")),
          ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
        },
        finish_reason: data.stop_reason ? mapFinishReason(data.stop_reason) : null,
      },
    ],
    usage: createUsage(inputTokens, outputTokens),
  };
}

export function translateModelList(raw: unknown, provider: string): ModelInfo[] {
  const data = parseBody(modelListSchema, raw, provider);
  return data.data.map((model) => ({ id: model.id, provider, owned_by: "anthropic" }));
}
