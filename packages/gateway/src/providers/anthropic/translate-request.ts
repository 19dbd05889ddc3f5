/**
 * Translate a unified chat request into the Anthropic Messages API format.
 *
 * - system messages -> top-level `system`
 * - tool messages -> user turns carrying `tool_result` blocks
 * - consecutive same-role turns are merged (strict alternation)
 */

import { ValidationError } from "../../types/errors.js";
import type { Content, Message, ToolCall } from "../../types/message.js";
import { getContentText } from "../../types/message.js";
import type { ToolChoice, UnifiedChatRequest } from "../../types/request.js";
import { systemPrompt } from "../shared.js";

// ---------------------------------------------------------------------------
// Anthropic native types
// ---------------------------------------------------------------------------

export type AnthropicImageSource =
  | { type: "url"; url: string }
  | { type: "base64"; media_type: string; data: string };

export type AnthropicContentBlock =
  | { type: "text"; text: string }
  | { type: "image"; source: AnthropicImageSource }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> }
  | { type: "tool_result"; tool_use_id: string; content: string };

export interface AnthropicMessage {
  role: "user" | "assistant";
  content: AnthropicContentBlock[];
}

export interface AnthropicRequestBody {
  model: string;
  messages: AnthropicMessage[];
  max_tokens: number;
  system?: string;
  temperature?: number;
  top_p?: number;
  top_k?: number;
  stop_sequences?: readonly string[];
  stream?: boolean;
  tools?: Array<{ name: string; description?: string; input_schema: Record<string, unknown> }>;
  tool_choice?: { type: "auto" | "any" | "tool"; name?: string };
  metadata?: { user_id: string };
}

/** Anthropic requires max_tokens; used when the caller sets none. */
export const DEFAULT_MAX_TOKENS = 4096;

// ---------------------------------------------------------------------------
// Content translation
// ---------------------------------------------------------------------------

const DATA_URL = /^data:([^;,]+);base64,(.*)$/s;

function imageSource(url: string): AnthropicImageSource {
  const match = DATA_URL.exec(url);
  if (match?.[1] && match[2] !== undefined) {
    return { type: "base64", media_type: match[1], data: match[2] };
  }
  return { type: "url", url };
}

function translateContent(content: Content): AnthropicContentBlock[] {
  switch (content.kind) {
    case "text":
      return content.text === "" ? [] : [{ type: "text", text: content.text }];
    case "blocks":
      return content.blocks.map((block): AnthropicContentBlock => {
        switch (block.type) {
          case "text":
            return { type: "text", text: block.text };
          case "image_url":
            return { type: "image", source: imageSource(block.url) };
        }
      });
  }
}

function parseArguments(call: ToolCall): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = call.function.arguments === "" ? {} : JSON.parse(call.function.arguments);
  } catch (err: unknown) {
    throw new ValidationError(`Tool call ${call.id} has malformed arguments`, { cause: err });
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError(`Tool call ${call.id} arguments must be a JSON object`);
  }
  return { ...parsed };
}

function translateMessage(message: Message): AnthropicMessage | undefined {
  switch (message.role) {
    case "system":
      return undefined;
    case "user":
      return { role: "user", content: translateContent(message.content) };
    case "assistant":
      return {
        role: "assistant",
        content: [
          ...translateContent(message.content),
          ...(message.tool_calls ?? []).map(
            (call): AnthropicContentBlock => ({
              type: "tool_use",
              id: call.id,
              name: call.function.name,
              input: parseArguments(call),
            }),
          ),
        ],
      };
    case "tool":
      return {
        role: "user",
        content: [
          {
            type: "tool_result",
            tool_use_id: message.tool_call_id ?? "",
            content: getContentText(message.content),
          },
        ],
      };
  }
}

function translateMessages(messages: readonly Message[]): AnthropicMessage[] {
  const result: AnthropicMessage[] = [];
  for (const message of messages) {
    const translated = translateMessage(message);
    if (!translated) continue;
    const last = result[result.length - 1];
    if (last && last.role === translated.role) {
      last.content.push(...translated.content);
    } else {
      result.push(translated);
    }
  }
  return result;
}

function translateToolChoice(choice: ToolChoice | undefined): AnthropicRequestBody["tool_choice"] {
  if (choice === undefined) return undefined;
  if (typeof choice !== "string") return { type: "tool", name: choice.name };
  switch (choice) {
    case "auto":
      return { type: "auto" };
    case "required":
      return { type: "any" };
    case "none":
      return undefined;
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function translateRequest(request: UnifiedChatRequest): AnthropicRequestBody {
  const body: AnthropicRequestBody = {
    model: request.model,
    messages: translateMessages(request.messages),
    max_tokens: request.max_tokens ?? DEFAULT_MAX_TOKENS,
  };

  const system = systemPrompt(request.messages);
  if (system !== undefined) body.system = system;
  if (request.temperature !== undefined) body.temperature = request.temperature;
  if (request.top_p !== undefined) body.top_p = request.top_p;
  if (request.top_k !== undefined) body.top_k = request.top_k;
  if (request.stop && request.stop.length > 0) body.stop_sequences = request.stop;
  if (request.user !== undefined) body.metadata = { user_id: request.user };
  if (request.stream) body.stream = true;

  // Anthropic has no "none" tool choice: leave the tools out instead.
  if (request.tools && request.tools.length > 0 && request.tool_choice !== "none") {
    body.tools = request.tools.map((tool) => ({
      name: tool.function.name,
      ...(tool.function.description ? { description: tool.function.description } : {}),
      input_schema: tool.function.parameters ?? { type: "object", properties: {} },
    }));
    const toolChoice = translateToolChoice(request.tool_choice);
    if (toolChoice) body.tool_choice = toolChoice;
  }

  return body;
}
