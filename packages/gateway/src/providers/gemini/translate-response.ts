/**
 * Translate Gemini responses into unified responses.
 */

import { z } from "zod";
import { FinishReason, Role } from "../../types/enums.js";
import { textContent, type ToolCall } from "../../types/message.js";
import type { UnifiedChatRequest } from "../../types/request.js";
import {
  createUsage,
  type EmbeddingResponse,
  type ModelInfo,
  type UnifiedChatResponse,
  type Usage,
} from "../../types/response.js";
import { generateId, nowSeconds, parseBody } from "../shared.js";

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

const partSchema = z.object({
  text: z.string().optional(),
  thought: z.boolean().optional(),
  functionCall: z.object({ name: z.string(), args: z.unknown() }).optional(),
});

export const candidateSchema = z.object({
  content: z.object({ parts: z.array(partSchema).default([]) }).optional(),
  finishReason: z.string().optional(),
});

export const usageMetadataSchema = z.object({
  promptTokenCount: z.number().default(0),
  candidatesTokenCount: z.number().default(0),
  totalTokenCount: z.number().optional(),
});

export const generateResponseSchema = z.object({
  candidates: z.array(candidateSchema).default([]),
  usageMetadata: usageMetadataSchema.optional(),
  modelVersion: z.string().optional(),
  responseId: z.string().optional(),
});

export type GeminiGenerateResponse = z.output<typeof generateResponseSchema>;
export type GeminiPartOutput = z.output<typeof partSchema>;

const embedContentSchema = z.object({ embedding: z.object({ values: z.array(z.number()) }) });
const batchEmbedSchema = z.object({
  embeddings: z.array(z.object({ values: z.array(z.number()) })),
});

const modelListSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function mapGeminiFinishReason(raw: string | undefined, hasToolCalls: boolean): FinishReason {
  if (hasToolCalls) return FinishReason.TOOL_CALLS;
  switch (raw) {
    case "STOP":
      return FinishReason.STOP;
    case "MAX_TOKENS":
      return FinishReason.LENGTH;
    case "SAFETY":
    case "RECITATION":
    case "BLOCKLIST":
    case "PROHIBITED_CONTENT":
    case "SPII":
      return FinishReason.CONTENT_FILTER;
    default:
      return FinishReason.OTHER;
  }
}

export function toUsage(metadata: z.output<typeof usageMetadataSchema> | undefined): Usage {
  if (!metadata) return createUsage(0, 0);
  return createUsage(
    metadata.promptTokenCount,
    metadata.candidatesTokenCount,
    metadata.totalTokenCount,
  );
}

/** Function call part -> unified tool call. Gemini assigns no call ids. */
export function toToolCall(call: { name: string; args?: unknown }): ToolCall {
  return {
    id: generateId("call"),
    type: "function",
    function: { name: call.name, arguments: JSON.stringify(call.args ?? {}) },
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function translateResponse(
  raw: unknown,
  request: UnifiedChatRequest,
  provider: string,
): UnifiedChatResponse {
  const data = parseBody(generateResponseSchema, raw, provider);
  const candidate = data.candidates[0];

  const text: string[] = [];
  const toolCalls: ToolCall[] = [];
  for (const part of candidate?.content?.parts ?? []) {
    if (part.thought) continue;
    if (part.text !== undefined) text.push(part.text);
    if (part.functionCall) toolCalls.push(toToolCall(part.functionCall));
  }

  return {
    id: data.responseId ?? generateId("chatcmpl"),
    object: "chat.completion",
    created: nowSeconds(),
    model: data.modelVersion ?? request.model,
    choices: [
      {
        index: 0,
        message: {
          role: Role.ASSISTANT,
          content: textContent(text.join("")),
          ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
        },
        finish_reason: candidate
          ? mapGeminiFinishReason(candidate.finishReason, toolCalls.length > 0)
          : null,
      },
    ],
    usage: toUsage(data.usageMetadata),
  };
}

export function translateEmbeddingResponse(
  raw: unknown,
  model: string,
  batch: boolean,
  provider: string,
): EmbeddingResponse {
  const vectors = batch
    ? parseBody(batchEmbedSchema, raw, provider).embeddings
    : [parseBody(embedContentSchema, raw, provider).embedding];
  return {
    model,
    data: vectors.map((vector, index) => ({ index, embedding: vector.values })),
    // Gemini does not report token counts for embeddings.
    usage: createUsage(0, 0),
  };
}

export function translateModelList(raw: unknown, provider: string): ModelInfo[] {
  const data = parseBody(modelListSchema, raw, provider);
  return data.models.map((model) => ({
    id: model.name.replace(/^models\//, ""),
    provider,
    owned_by: "google",
  }));
}
