/**
 * Translate unified requests into the Gemini generateContent format.
 *
 * - system messages -> `systemInstruction`
 * - assistant -> role "model"; tool calls -> `functionCall` parts
 * - tool results -> user turns with `functionResponse` parts, named after
 *   the call they answer
 */

import type { Content, Message } from "../../types/message.js";
import { getContentText } from "../../types/message.js";
import type { EmbeddingRequest, ToolChoice, UnifiedChatRequest } from "../../types/request.js";
import { ValidationError } from "../../types/errors.js";
import { systemPrompt } from "../shared.js";

// ---------------------------------------------------------------------------
// Gemini native types
// ---------------------------------------------------------------------------

export type GeminiPart =
  | { text: string }
  | { inlineData: { mimeType: string; data: string } }
  | { fileData: { fileUri: string } }
  | { functionCall: { name: string; args: Record<string, unknown> } }
  | { functionResponse: { name: string; response: Record<string, unknown> } };

export interface GeminiContent {
  role: "user" | "model";
  parts: GeminiPart[];
}

export interface GeminiGenerateRequest {
  contents: GeminiContent[];
  systemInstruction?: { parts: Array<{ text: string }> };
  generationConfig?: {
    temperature?: number;
    topP?: number;
    topK?: number;
    maxOutputTokens?: number;
    stopSequences?: readonly string[];
  };
  tools?: Array<{
    functionDeclarations: Array<{
      name: string;
      description?: string;
      parameters?: Record<string, unknown>;
    }>;
  }>;
  toolConfig?: {
    functionCallingConfig: { mode: "AUTO" | "ANY" | "NONE"; allowedFunctionNames?: string[] };
  };
}

/** "gemini-2.0-flash" and "models/gemini-2.0-flash" both name the same model. */
export function modelPath(model: string): string {
  return model.startsWith("models/") ? model : `models/${model}`;
}

// ---------------------------------------------------------------------------
// Chat
// ---------------------------------------------------------------------------

const DATA_URL = /^data:([^;,]+);base64,(.*)$/s;

function translateContent(content: Content): GeminiPart[] {
  switch (content.kind) {
    case "text":
      return content.text === "" ? [] : [{ text: content.text }];
    case "blocks":
      return content.blocks.map((block): GeminiPart => {
        switch (block.type) {
          case "text":
            return { text: block.text };
          case "image_url": {
            const match = DATA_URL.exec(block.url);
            if (match?.[1] && match[2] !== undefined) {
              return { inlineData: { mimeType: match[1], data: match[2] } };
            }
            return { fileData: { fileUri: block.url } };
          }
        }
      });
  }
}

function parseArgs(raw: string, callId: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = raw === "" ? {} : JSON.parse(raw);
  } catch (err: unknown) {
    throw new ValidationError(`Tool call ${callId} has malformed arguments`, { cause: err });
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError(`Tool call ${callId} arguments must be a JSON object`);
  }
  return { ...parsed };
}

function translateMessages(messages: readonly Message[]): GeminiContent[] {
  // Gemini matches function responses by name, not id.
  const callNames = new Map<string, string>();
  const contents: GeminiContent[] = [];

  const push = (role: GeminiContent["role"], parts: GeminiPart[]): void => {
    if (parts.length === 0) return;
    const last = contents[contents.length - 1];
    if (last && last.role === role) {
      last.parts.push(...parts);
    } else {
      contents.push({ role, parts });
    }
  };

  for (const message of messages) {
    switch (message.role) {
      case "system":
        break;
      case "user":
        push("user", translateContent(message.content));
        break;
      case "assistant": {
        const calls = (message.tool_calls ?? []).map((call): GeminiPart => {
          callNames.set(call.id, call.function.name);
          return {
            functionCall: { name: call.function.name, args: parseArgs(call.function.arguments, call.id) },
          };
        });
        push("model", [...translateContent(message.content), ...calls]);
        break;
      }
      case "tool": {
        const name =
          message.name ?? (message.tool_call_id ? callNames.get(message.tool_call_id) : undefined);
        push("user", [
          {
            functionResponse: {
              name: name ?? "unknown",
              response: { content: getContentText(message.content) },
            },
          },
        ]);
        break;
      }
    }
  }
  return contents;
}

function translateToolChoice(choice: ToolChoice | undefined): GeminiGenerateRequest["toolConfig"] {
  if (choice === undefined) return undefined;
  if (typeof choice !== "string") {
    return { functionCallingConfig: { mode: "ANY", allowedFunctionNames: [choice.name] } };
  }
  switch (choice) {
    case "auto":
      return { functionCallingConfig: { mode: "AUTO" } };
    case "required":
      return { functionCallingConfig: { mode: "ANY" } };
    case "none":
      return { functionCallingConfig: { mode: "NONE" } };
  }
}

export function translateRequest(request: UnifiedChatRequest): GeminiGenerateRequest {
  const body: GeminiGenerateRequest = { contents: translateMessages(request.messages) };

  const system = systemPrompt(request.messages);
  if (system !== undefined) body.systemInstruction = { parts: [{ text: system }] };

  const generationConfig: NonNullable<GeminiGenerateRequest["generationConfig"]> = {};
  if (request.temperature !== undefined) generationConfig.temperature = request.temperature;
  if (request.top_p !== undefined) generationConfig.topP = request.top_p;
  if (request.top_k !== undefined) generationConfig.topK = request.top_k;
  if (request.max_tokens !== undefined) generationConfig.maxOutputTokens = request.max_tokens;
  if (request.stop && request.stop.length > 0) generationConfig.stopSequences = request.stop;
  if (Object.keys(generationConfig).length > 0) body.generationConfig = generationConfig;

  if (request.tools && request.tools.length > 0) {
    body.tools = [
      {
        functionDeclarations: request.tools.map((tool) => ({
          name: tool.function.name,
          ...(tool.function.description ? { description: tool.function.description } : {}),
          ...(tool.function.parameters ? { parameters: tool.function.parameters } : {}),
        })),
      },
    ];
    const toolConfig = translateToolChoice(request.tool_choice);
    if (toolConfig) body.toolConfig = toolConfig;
  }

  return body;
}

// ---------------------------------------------------------------------------
// Embeddings
// ---------------------------------------------------------------------------

export interface GeminiEmbedContentRequest {
  model: string;
  content: { parts: Array<{ text: string }> };
  outputDimensionality?: number;
}

export function translateEmbeddingRequests(request: EmbeddingRequest): GeminiEmbedContentRequest[] {
  const inputs = typeof request.input === "string" ? [request.input] : request.input;
  return inputs.map((text) => ({
    model: modelPath(request.model),
    content: { parts: [{ text }] },
    ...(request.dimensions !== undefined ? { outputDimensionality: request.dimensions } : {}),
  }));
}
