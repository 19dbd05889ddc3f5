/**
 * Replicate input/output mapping for chat, image and video predictions.
 *
 * Replicate models take free-form `input` objects. Llama-family models
 * take a separate `system_prompt`; other text models get the whole
 * conversation as one transcript prompt.
 */

import { FinishReason, Role } from "../../types/enums.js";
import { jobCreatedSeconds, type PredictionJob } from "../../jobs/job.js";
import { estimateTokens, extractOutputText, extractOutputUrls } from "../../jobs/output.js";
import { getContentText, textContent, type Message } from "../../types/message.js";
import type {
  ImageGenerationRequest,
  UnifiedChatRequest,
  VideoGenerationRequest,
} from "../../types/request.js";
import {
  createUsage,
  type ImageGenerationResponse,
  type UnifiedChatResponse,
  type VideoGenerationResponse,
} from "../../types/response.js";
import { parseSize, systemPrompt } from "../shared.js";

// ---------------------------------------------------------------------------
// Chat
// ---------------------------------------------------------------------------

const SPEAKER: Record<Message["role"], string> = {
  system: "System",
  user: "User",
  assistant: "Assistant",
  tool: "Tool",
};

export function isLlamaModel(model: string): boolean {
  return model.toLowerCase().includes("llama");
}

/**
 * A lone user turn is sent as-is. Anything longer becomes a
 * "Speaker: text" transcript ending with an open assistant turn.
 */
export function buildPrompt(messages: readonly Message[]): string {
  const [only, ...rest] = messages;
  if (only && rest.length === 0 && only.role === "user") {
    return getContentText(only.content);
  }
  const lines = messages.map((message) => `${SPEAKER[message.role]}: ${getContentText(message.content)}`);
  return [...lines, "Assistant: "].join("\n");
}

export function toChatInput(request: UnifiedChatRequest): Record<string, unknown> {
  const input: Record<string, unknown> = {};

  if (isLlamaModel(request.model)) {
    const system = systemPrompt(request.messages);
    input["prompt"] = buildPrompt(request.messages.filter((m) => m.role !== Role.SYSTEM));
    if (system !== undefined) input["system_prompt"] = system;
  } else {
    input["prompt"] = buildPrompt(request.messages);
  }

  if (request.temperature !== undefined) input["temperature"] = request.temperature;
  if (request.top_p !== undefined) input["top_p"] = request.top_p;
  if (request.top_k !== undefined) input["top_k"] = request.top_k;
  if (request.max_tokens !== undefined) input["max_tokens"] = request.max_tokens;
  if (request.stop && request.stop.length > 0) input["stop_sequences"] = request.stop.join(",");
  return input;
}

/** Replicate reports no token counts; both sides are estimated. */
export function toChatResponse(job: PredictionJob, request: UnifiedChatRequest): UnifiedChatResponse {
  const text = extractOutputText(job.output);
  const promptText = request.messages.map((m) => getContentText(m.content)).join("\n");
  return {
    id: job.id,
    object: "chat.completion",
    created: jobCreatedSeconds(job),
    model: request.model,
    choices: [
      {
        index: 0,
        message: { role: Role.ASSISTANT, content: textContent(text) },
        finish_reason: FinishReason.STOP,
      },
    ],
    usage: createUsage(estimateTokens(promptText), estimateTokens(text)),
  };
}

// ---------------------------------------------------------------------------
// Images & video
// ---------------------------------------------------------------------------

export function toImageInput(request: ImageGenerationRequest): Record<string, unknown> {
  const input: Record<string, unknown> = { prompt: request.prompt };
  const size = parseSize(request.size);
  if (size) {
    input["width"] = size.width;
    input["height"] = size.height;
  }
  if (request.quality !== undefined) input["quality"] = request.quality;
  if (request.style !== undefined) input["style"] = request.style;
  if (request.n !== undefined && request.n > 1) input["num_outputs"] = request.n;
  return input;
}

export function toVideoInput(request: VideoGenerationRequest): Record<string, unknown> {
  const input: Record<string, unknown> = { prompt: request.prompt };
  const size = parseSize(request.size);
  if (size) {
    input["width"] = size.width;
    input["height"] = size.height;
  }
  if (request.duration !== undefined) input["duration"] = request.duration;
  if (request.fps !== undefined) input["fps"] = request.fps;
  if (request.seed !== undefined) input["seed"] = request.seed;
  if (request.n !== undefined && request.n > 1) input["num_outputs"] = request.n;
  return input;
}

export function toMediaResponse(job: PredictionJob): ImageGenerationResponse & VideoGenerationResponse {
  return {
    created: jobCreatedSeconds(job),
    data: extractOutputUrls(job.output).map((url) => ({ url })),
  };
}
