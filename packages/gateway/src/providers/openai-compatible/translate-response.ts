/**
 * Translate OpenAI-compatible API responses into unified responses.
 */

import { z } from "zod";
import { Role } from "../../types/enums.js";
import { textContent, type ToolCall } from "../../types/message.js";
import type { UnifiedChatRequest } from "../../types/request.js";
import {
  createUsage,
  type EmbeddingResponse,
  type ImageGenerationResponse,
  type ModelInfo,
  type UnifiedChatResponse,
} from "../../types/response.js";
import { generateId, mapFinishReason, nowSeconds, parseBody } from "../shared.js";

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

export const toolCallSchema = z.object({
  id: z.string(),
  type: z.string().default("function"),
  function: z.object({ name: z.string(), arguments: z.string().default("") }),
});

export const usageSchema = z.object({
  prompt_tokens: z.number().default(0),
  completion_tokens: z.number().default(0),
  total_tokens: z.number().optional(),
});

const chatResponseSchema = z.object({
  id: z.string().optional(),
  created: z.number().optional(),
  model: z.string().optional(),
  choices: z.array(
    z.object({
      index: z.number().optional(),
      message: z.object({
        role: z.string().optional(),
        content: z.string().nullish(),
        tool_calls: z.array(toolCallSchema).optional(),
      }),
      finish_reason: z.string().nullish(),
    }),
  ),
  usage: usageSchema.optional(),
});

const embeddingResponseSchema = z.object({
  model: z.string().optional(),
  data: z.array(z.object({ index: z.number(), embedding: z.array(z.number()) })),
  usage: z.object({ prompt_tokens: z.number().default(0), total_tokens: z.number().optional() }).optional(),
});

const imageResponseSchema = z.object({
  created: z.number().optional(),
  data: z.array(
    z.object({
      url: z.string().optional(),
      b64_json: z.string().optional(),
      revised_prompt: z.string().optional(),
    }),
  ),
});

const modelListSchema = z.object({
  data: z.array(z.object({ id: z.string(), owned_by: z.string().optional() })),
});

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function translateResponse(
  raw: unknown,
  request: UnifiedChatRequest,
  provider: string,
): UnifiedChatResponse {
  const data = parseBody(chatResponseSchema, raw, provider);
  const usage = data.usage;

  return {
    id: data.id || generateId("chatcmpl"),
    object: "chat.completion",
    created: data.created ?? nowSeconds(),
    model: data.model || request.model,
    choices: data.choices.map((choice, i) => {
      const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map((call) => ({
        id: call.id,
        type: "function",
        function: { name: call.function.name, arguments: call.function.arguments },
      }));
      return {
        index: choice.index ?? i,
        message: {
          role: Role.ASSISTANT,
          content: textContent(choice.message.content ?? ""),
          ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
        },
        finish_reason: choice.finish_reason ? mapFinishReason(choice.finish_reason) : null,
      };
    }),
    usage: createUsage(
      usage?.prompt_tokens ?? 0,
      usage?.completion_tokens ?? 0,
      usage?.total_tokens,
    ),
  };
}

export function translateEmbeddingResponse(
  raw: unknown,
  model: string,
  provider: string,
): EmbeddingResponse {
  const data = parseBody(embeddingResponseSchema, raw, provider);
  const promptTokens = data.usage?.prompt_tokens ?? 0;
  return {
    model: data.model || model,
    data: data.data.map((item) => ({ index: item.index, embedding: item.embedding })),
    usage: createUsage(promptTokens, 0, data.usage?.total_tokens),
  };
}

export function translateImageResponse(raw: unknown, provider: string): ImageGenerationResponse {
  const data = parseBody(imageResponseSchema, raw, provider);
  return { created: data.created ?? nowSeconds(), data: data.data };
}

export function translateModelList(raw: unknown, provider: string): ModelInfo[] {
  const data = parseBody(modelListSchema, raw, provider);
  return data.data.map((model) => ({
    id: model.id,
    provider,
    ...(model.owned_by ? { owned_by: model.owned_by } : {}),
  }));
}
