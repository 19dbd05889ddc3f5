/**
 * Translate unified requests into OpenAI-compatible API bodies.
 */

import type { Content, Message } from "../../types/message.js";
import { getContentText } from "../../types/message.js";
import type {
  EmbeddingRequest,
  ImageGenerationRequest,
  SpeechRequest,
  ToolChoice,
  ToolDefinition,
  UnifiedChatRequest,
} from "../../types/request.js";

// ---------------------------------------------------------------------------
// Chat Completions native types
// ---------------------------------------------------------------------------

export type ChatCompletionContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string; detail?: string } };

export interface ChatCompletionMessage {
  role: "system" | "user" | "assistant" | "tool";
  content: string | ChatCompletionContentPart[] | null;
  name?: string;
  tool_calls?: Array<{
    id: string;
    type: "function";
    function: { name: string; arguments: string };
  }>;
  tool_call_id?: string;
}

export interface ChatCompletionRequestBody {
  model: string;
  messages: ChatCompletionMessage[];
  temperature?: number;
  top_p?: number;
  max_tokens?: number;
  stop?: readonly string[];
  stream?: boolean;
  stream_options?: { include_usage: boolean };
  tools?: readonly ToolDefinition[];
  tool_choice?: "auto" | "none" | "required" | { type: "function"; function: { name: string } };
  user?: string;
}

// ---------------------------------------------------------------------------
// Message translation
// ---------------------------------------------------------------------------

function translateContent(content: Content): string | ChatCompletionContentPart[] {
  switch (content.kind) {
    case "text":
      return content.text;
    case "blocks":
      return content.blocks.map((block): ChatCompletionContentPart => {
        switch (block.type) {
          case "text":
            return { type: "text", text: block.text };
          case "image_url":
            return {
              type: "image_url",
              image_url: { url: block.url, ...(block.detail ? { detail: block.detail } : {}) },
            };
        }
      });
  }
}

function translateMessage(message: Message): ChatCompletionMessage {
  const name = message.name ? { name: message.name } : {};
  switch (message.role) {
    case "system":
      return { role: "system", content: getContentText(message.content), ...name };
    case "user":
      return { role: "user", content: translateContent(message.content), ...name };
    case "assistant": {
      const text = getContentText(message.content);
      return {
        role: "assistant",
        content: text === "" && message.tool_calls?.length ? null : text,
        ...name,
        ...(message.tool_calls?.length
          ? {
              tool_calls: message.tool_calls.map((call) => ({
                id: call.id,
                type: "function" as const,
                function: { name: call.function.name, arguments: call.function.arguments },
              })),
            }
          : {}),
      };
    }
    case "tool":
      return {
        role: "tool",
        content: getContentText(message.content),
        tool_call_id: message.tool_call_id,
      };
  }
}

function translateToolChoice(
  choice: ToolChoice | undefined,
): ChatCompletionRequestBody["tool_choice"] {
  if (choice === undefined || typeof choice === "string") return choice;
  return { type: "function", function: { name: choice.name } };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function translateRequest(request: UnifiedChatRequest): ChatCompletionRequestBody {
  const body: ChatCompletionRequestBody = {
    model: request.model,
    messages: request.messages.map(translateMessage),
  };

  if (request.temperature !== undefined) body.temperature = request.temperature;
  if (request.top_p !== undefined) body.top_p = request.top_p;
  if (request.max_tokens !== undefined) body.max_tokens = request.max_tokens;
  if (request.stop && request.stop.length > 0) body.stop = request.stop;
  if (request.user !== undefined) body.user = request.user;

  if (request.tools && request.tools.length > 0) {
    body.tools = request.tools;
    const toolChoice = translateToolChoice(request.tool_choice);
    if (toolChoice !== undefined) body.tool_choice = toolChoice;
  }

  if (request.stream) {
    body.stream = true;
    body.stream_options = { include_usage: true };
  }

  return body;
}

export function translateEmbeddingRequest(request: EmbeddingRequest): Record<string, unknown> {
  return {
    model: request.model,
    input: request.input,
    ...(request.dimensions !== undefined ? { dimensions: request.dimensions } : {}),
    ...(request.encoding_format !== undefined ? { encoding_format: request.encoding_format } : {}),
  };
}

export function translateImageRequest(request: ImageGenerationRequest): Record<string, unknown> {
  return {
    model: request.model,
    prompt: request.prompt,
    n: request.n ?? 1,
    ...(request.size !== undefined ? { size: request.size } : {}),
    ...(request.quality !== undefined ? { quality: request.quality } : {}),
    ...(request.style !== undefined ? { style: request.style } : {}),
    ...(request.response_format !== undefined ? { response_format: request.response_format } : {}),
  };
}

export function translateSpeechRequest(request: SpeechRequest): Record<string, unknown> {
  return {
    model: request.model,
    input: request.input,
    voice: request.voice,
    response_format: request.response_format ?? "mp3",
    ...(request.speed !== undefined ? { speed: request.speed } : {}),
  };
}
